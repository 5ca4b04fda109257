import { z } from "zod";

const nonEmpty = z.string().min(1);

export const processConfigSchema = z
  .object({
    name: nonEmpty,
    command: nonEmpty,
    args: z.array(z.string()).optional(),
    alwaysRestart: z.boolean().optional(),
    cwd: nonEmpty.optional(),
    env: z.record(z.string()).optional(),
    stdio: z.enum(["inherit", "ignore"]).optional(),
    logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
  })
  .strict();

export type ProcessConfigInput = z.input<typeof processConfigSchema>;
