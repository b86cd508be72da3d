import { z } from "zod";
import { ConfigError } from "./errors";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value.trim()));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  DATABASE_URL: optionalString,
  LEDGER_URL: optionalString.pipe(z.string().url().optional()),
  WALLET_ADDRESSES: z
    .string()
    .default("")
    .transform((value) =>
      value
        .split(",")
        .map((address) => address.trim())
        .filter((address) => address.length > 0),
    ),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LEDGER_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  LEDGER_RETRIES: z.coerce.number().int().nonnegative().default(2),
  ROLLBACK_POLICY: z.enum(["undo-log", "rescan"]).default("undo-log"),
  UNDO_DEPTH: optionalString.pipe(z.coerce.number().int().positive().optional()),
});

export type Config = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${problems.join("; ")}`);
  }
  return parsed.data;
}
