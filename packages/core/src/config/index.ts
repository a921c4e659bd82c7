/**
 * Report configuration, read from environment variables and validated with Zod.
 *
 * | key                | env var              | default    |
 * |--------------------|----------------------|------------|
 * | `logfile`          | `WEBLOG_FILE`        | `demo.log` |
 * | `onMissing`        | `WEBLOG_ON_MISSING`  | `throw`    |
 * | `simulatedEntries` | `WEBLOG_ENTRIES`     | `100`      |
 * | `seed`             | `WEBLOG_SEED`        | `42`       |
 * | `singlePass`       | `WEBLOG_SINGLE_PASS` | `false`    |
 */

import { z } from 'zod';
import { DEFAULT_SEED, MAX_SEED } from '../log/creator.js';
import { ConfigError } from '../log/errors.js';
import { DEFAULT_LOGFILE, DEFAULT_SIMULATED_ENTRIES } from '../log/reader.js';

/**
 * Schema for a complete configuration.
 */
export const weblogConfigSchema = z.object({
  logfile: z.string().min(1),
  onMissing: z.enum(['throw', 'simulate']),
  simulatedEntries: z.number().int().min(0),
  seed: z.number().int().min(0).max(MAX_SEED),
  singlePass: z.boolean(),
});

export type WeblogConfig = z.infer<typeof weblogConfigSchema>;

/**
 * A non-blank string holding an integer. Blank values are rejected rather
 * than coerced to 0.
 */
const integerStringSchema = z
  .string()
  .trim()
  .min(1, 'must not be empty')
  .pipe(z.coerce.number().int());

const booleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Schema for the environment variables. Unset variables take their defaults.
 */
export const weblogEnvSchema = z.object({
  WEBLOG_FILE: z.string().min(1).default(DEFAULT_LOGFILE),
  WEBLOG_ON_MISSING: z.enum(['throw', 'simulate']).default('throw'),
  WEBLOG_ENTRIES: integerStringSchema.optional(),
  WEBLOG_SEED: integerStringSchema.optional(),
  WEBLOG_SINGLE_PASS: booleanFlagSchema.default('false'),
});

export type Environment = Record<string, string | undefined>;

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Builds the configuration from environment variables, then applies
 * overrides (typically command-line options). Undefined overrides are ignored.
 *
 * @throws ConfigError listing every invalid value
 */
export function loadConfig(
  env: Environment = process.env,
  overrides: Partial<WeblogConfig> = {},
): WeblogConfig {
  const parsedEnv = weblogEnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    const issues = describeIssues(parsedEnv.error);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`, issues);
  }

  const definedOverrides = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  const parsed = weblogConfigSchema.safeParse({
    logfile: parsedEnv.data.WEBLOG_FILE,
    onMissing: parsedEnv.data.WEBLOG_ON_MISSING,
    simulatedEntries: parsedEnv.data.WEBLOG_ENTRIES ?? DEFAULT_SIMULATED_ENTRIES,
    seed: parsedEnv.data.WEBLOG_SEED ?? DEFAULT_SEED,
    singlePass: parsedEnv.data.WEBLOG_SINGLE_PASS,
    ...definedOverrides,
  });
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}
