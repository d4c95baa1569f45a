import { z } from "zod";
import { DOWNLOADS_PAGE_URL, PYTHON_ORG_ORIGIN } from "../endpoints.js";

export const pyvmConfigSchema = z.object({
  maxRetries: z.coerce.number().int().min(1).default(3),
  retryDelayMs: z.coerce.number().int().nonnegative().default(2_000),
  requestTimeoutMs: z.coerce.number().int().positive().default(15_000),
  downloadTimeoutMs: z.coerce.number().int().positive().default(120_000),
  downloadsPageUrl: z.string().url().default(DOWNLOADS_PAGE_URL),
  siteOrigin: z.string().url().default(PYTHON_ORG_ORIGIN),
});

export type PyvmConfig = z.infer<typeof pyvmConfigSchema>;

export const DEFAULT_CONFIG: PyvmConfig = pyvmConfigSchema.parse({});

/**
 * Build the configuration from `PYVM_*` environment variables.
 * Throws a ZodError when a variable is present but malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PyvmConfig {
  return pyvmConfigSchema.parse({
    maxRetries: env.PYVM_MAX_RETRIES,
    retryDelayMs: env.PYVM_RETRY_DELAY_MS,
    requestTimeoutMs: env.PYVM_REQUEST_TIMEOUT_MS,
    downloadTimeoutMs: env.PYVM_DOWNLOAD_TIMEOUT_MS,
    downloadsPageUrl: env.PYVM_DOWNLOADS_URL,
  });
}
