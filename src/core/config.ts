import path from "node:path";
import { z } from "zod";
import { DEFAULT_MAX_AGE_DAYS, DEFAULT_YEAR_PIVOT } from "./date.js";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS } from "./logger.js";

export const RunConfigSchema = z.object({
  scanDir: z.string().min(1),
  destDir: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  dryRun: z.boolean().default(false),
  maxAgeDays: z.coerce.number().int().nonnegative().default(DEFAULT_MAX_AGE_DAYS),
  yearPivot: z.coerce.number().int().min(0).max(99).default(DEFAULT_YEAR_PIVOT),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

export type ConfigFlags = {
  scanDir?: string;
  destDir?: string;
  logLevel?: string;
  dryRun?: boolean;
  maxAgeDays?: string;
  yearPivot?: string;
};

/**
 * Flags win over PDF_REFILE_* environment variables, which win over the
 * defaults. The scan dir defaults to `cwd`, the destination to the scan dir.
 */
export function loadConfig(
  flags: ConfigFlags,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): RunConfig {
  const scanDir = path.resolve(cwd, flags.scanDir ?? env.PDF_REFILE_SCAN_DIR ?? ".");
  const destDir = path.resolve(cwd, flags.destDir ?? env.PDF_REFILE_DEST_DIR ?? scanDir);

  const parsed = RunConfigSchema.safeParse({
    scanDir,
    destDir,
    logLevel: flags.logLevel ?? env.PDF_REFILE_LOG_LEVEL,
    dryRun: flags.dryRun,
    maxAgeDays: flags.maxAgeDays ?? env.PDF_REFILE_MAX_AGE_DAYS,
    yearPivot: flags.yearPivot ?? env.PDF_REFILE_YEAR_PIVOT,
  });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return parsed.data;
}
