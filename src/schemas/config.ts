import { z } from 'zod';

const ScanConfigSchema = z.object({
  exclude: z.array(z.string()).default([]),
  archive_extensions: z.array(z.string().regex(/^\.\w+$/)).default(['.jar']),
});

const ReaderConfigSchema = z.object({
  read_cond: z.enum(['allow', 'disallow']).default('allow'),
  features: z.array(z.string().min(1)).default(['clj']),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0.0'),
  classpath: z.array(z.string()).default([]),
  prefix: z.string().nullable().default(null),
  ignore_unreadable: z.boolean().default(true),
  mode: z.enum(['first', 'all']).default('first'),
  scan: ScanConfigSchema.default({
    exclude: [],
    archive_extensions: ['.jar'],
  }),
  // Absent means: take reader settings from the environment
  reader: ReaderConfigSchema.optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export function parseConfig(data: unknown): Config {
  return ConfigSchema.parse(data);
}
