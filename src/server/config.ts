import { z } from "zod";
import { ValidationError, formatIssues } from "../catalog/types";

/** Settings read once from the environment at process start. */
export interface AppConfig {
  port: number;
  databaseUrl?: string;
  databaseName?: string;
  /** MongoDB server-selection timeout. Unset leaves the driver default in place. */
  databaseTimeoutMs?: number;
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  DATABASE_URL: z.string().optional(),
  DATABASE_NAME: z.string().optional(),
  DATABASE_TIMEOUT_MS: z.coerce.number().int().positive().optional()
});

/** Empty variables count as unset, matching how most deploy dashboards clear a value. */
function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse({
    PORT: nonEmpty(env.PORT),
    DATABASE_URL: nonEmpty(env.DATABASE_URL),
    DATABASE_NAME: nonEmpty(env.DATABASE_NAME),
    DATABASE_TIMEOUT_MS: nonEmpty(env.DATABASE_TIMEOUT_MS)
  });
  if (!result.success) {
    throw new ValidationError(`Invalid environment: ${formatIssues(result.error.issues)}`);
  }
  return {
    port: result.data.PORT,
    databaseUrl: result.data.DATABASE_URL,
    databaseName: result.data.DATABASE_NAME,
    databaseTimeoutMs: result.data.DATABASE_TIMEOUT_MS
  };
}
