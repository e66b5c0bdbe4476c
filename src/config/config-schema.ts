import { z } from "zod";
import { LEVEL_NAME_LIST } from "../core/log-level.js";

export const sinkConfigSchema = z
  .object({
    format: z.enum(["json", "console"]).optional(),
    level: z.enum(LEVEL_NAME_LIST).optional(),
    revealPrivate: z.boolean().optional(),
  })
  .strict();
