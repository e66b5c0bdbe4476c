import { createRequire } from "node:module";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { lazy } from "./lazy.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Find the identifier of the application hosting this process.
 *
 * npm exports the running package's name as `npm_package_name`; failing that,
 * walk a list of relative `package.json` candidate paths and return the first
 * non-empty `.name` found.
 *
 * @param baseUrl     URL the candidates are resolved against (`createRequire` base);
 *                    `undefined` skips the file lookup.
 * @param candidates  Relative paths to `package.json` files to try.
 * @param env         Environment to read `npm_package_name` from.
 */
export function resolveAppIdentifier(
  baseUrl: string | undefined,
  candidates: string[],
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const fromEnv = env.npm_package_name?.trim();
  if (fromEnv) return fromEnv;
  if (baseUrl === undefined) return undefined;

  const req = createRequire(baseUrl);
  for (const candidate of candidates) {
    try {
      const pkg: unknown = req(candidate);
      if (isRecord(pkg) && typeof pkg.name === "string" && pkg.name.length > 0) {
        return pkg.name;
      }
    } catch {
      // Try next path candidate.
    }
  }
  return undefined;
}

/** File URL inside the working directory, or `undefined` when the directory is gone. */
export function cwdBaseUrl(): string | undefined {
  try {
    return pathToFileURL(join(process.cwd(), "index.js")).href;
  } catch {
    // cwd() throws ENOENT once the working directory has been removed
    return undefined;
  }
}

/** The host identifier for this process, resolved from the working directory once. */
export const hostAppIdentifier = lazy(() => resolveAppIdentifier(cwdBaseUrl(), ["./package.json"]));
