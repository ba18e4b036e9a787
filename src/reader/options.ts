import { z } from 'zod';
import { ConfigError } from '../errors/index.js';

export const ReaderOptionsSchema = z.object({
  readCond: z.enum(['allow', 'disallow']).default('allow'),
  features: z.array(z.string().min(1)).default(['clj']),
});

export interface ReaderOptions {
  readonly readCond: 'allow' | 'disallow';
  /** Feature keywords (without the colon) selected by reader conditionals */
  readonly features: readonly string[];
}

/**
 * Build reader options from environment variables:
 * NSSCAN_READ_COND (`allow` | `disallow`) and NSSCAN_FEATURES (comma-separated).
 */
export function resolveReaderOptions(env: NodeJS.ProcessEnv = process.env): ReaderOptions {
  const features = env.NSSCAN_FEATURES
    ?.split(',')
    .map(f => f.trim().replace(/^:/, ''))
    .filter(Boolean);

  const parsed = ReaderOptionsSchema.safeParse({
    readCond: env.NSSCAN_READ_COND || undefined,
    features: features && features.length > 0 ? features : undefined,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid reader settings in environment: ${issue.path.join('.')}: ${issue.message}`);
  }
  return Object.freeze({ ...parsed.data, features: Object.freeze([...parsed.data.features]) });
}

let processOptions: ReaderOptions | undefined;

/** Reader options for this process, resolved from the environment on first use. */
export function processReaderOptions(): ReaderOptions {
  processOptions ??= resolveReaderOptions();
  return processOptions;
}
