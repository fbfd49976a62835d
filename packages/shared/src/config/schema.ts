import { z } from 'zod';

function isSupportedEncoding(label: string): boolean {
  try {
    new TextDecoder(label);
    return true;
  } catch {
    return false;
  }
}

function isValidRegExp(pattern: string, flags: string): boolean {
  try {
    new RegExp(pattern, flags);
    return true;
  } catch {
    return false;
  }
}

export const ScanConfigSchema = z.object({
  /** Files scanned concurrently per batch; also the ceiling of open files */
  concurrency: z.number().int().min(1).default(100),
  encoding: z
    .string()
    .refine(isSupportedEncoding, { message: 'Unsupported text encoding' })
    .default('utf-8'),
  /** Characters of the matched line kept in each record */
  previewLength: z.number().int().min(1).default(50),
  skipBinaryExtensions: z.boolean().default(false),
});

export const RetryConfigSchema = z.object({
  /** Total attempts per file, the first one included; a file is retried at most once */
  maxAttempts: z.number().int().min(1).max(2).default(2),
  delayMs: z.number().int().min(0).default(5000),
  /** What to do once a file is still exhausted after its last attempt */
  onExhausted: z.enum(['skip', 'abort']).default('skip'),
});

export const IgnoreConfigSchema = z.object({
  /** Ignore source, relative to the scanned root */
  file: z.string().default('.gitignore'),
  patterns: z.array(z.string().min(1)).default([]),
  /** Also exclude names that merely contain a slash-free rule's text */
  substringMatch: z.boolean().default(true),
});

export const CustomRuleSchema = z
  .object({
    id: z.string().min(1),
    pattern: z.string().min(1),
    flags: z
      .string()
      .regex(/^[imsu]*$/, 'Only the i, m, s and u flags are allowed')
      .default(''),
    description: z.string().optional(),
  })
  .refine((rule) => isValidRegExp(rule.pattern, rule.flags), {
    message: 'Invalid regular expression',
    path: ['pattern'],
  });

export const RulesConfigSchema = z.object({
  useDefaults: z.boolean().default(true),
  custom: z.array(CustomRuleSchema).default([]),
});

export const OutputFormatSchema = z.enum(['json', 'csv']);

export const OutputConfigSchema = z.object({
  /** Directory for result files, relative to the scanned root */
  dir: z.string().default('.'),
  /** Result files are named `<basename>.<format>` */
  basename: z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, 'basename must not contain path separators')
    .default('secrets'),
  formats: z.array(OutputFormatSchema).default(['json', 'csv']),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  scan: ScanConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  ignore: IgnoreConfigSchema.default({}),
  rules: RulesConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
});

export type ScanConfig = z.infer<typeof ScanConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type IgnoreConfig = z.infer<typeof IgnoreConfigSchema>;
export type CustomRule = z.infer<typeof CustomRuleSchema>;
export type RulesConfig = z.infer<typeof RulesConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
/** Config as written in YAML files or passed as CLI flags, before defaults are applied */
export type ConfigInput = z.input<typeof ConfigSchema>;
