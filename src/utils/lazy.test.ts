import { describe, expect, it, vi } from "vitest";
import { lazy } from "./lazy.js";

describe("lazy", () => {
  it("does not build until first call", () => {
    const init = vi.fn(() => 1);
    lazy(init);
    expect(init).not.toHaveBeenCalled();
  });

  it("builds once and returns the same value", () => {
    const init = vi.fn(() => ({ id: 1 }));
    const get = lazy(init);

    const first = get();
    const second = get();

    expect(first).toBe(second);
    expect(init).toHaveBeenCalledTimes(1);
  });

  it("remembers an undefined result", () => {
    const init = vi.fn((): string | undefined => undefined);
    const get = lazy(init);

    expect(get()).toBeUndefined();
    expect(get()).toBeUndefined();
    expect(init).toHaveBeenCalledTimes(1);
  });
});
