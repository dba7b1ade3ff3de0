import { z } from 'zod';
import { ModuleKindSchema } from '../registry/schema.js';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Module file discovery patterns. */
export const DiscoverySettingsSchema = z.object({
  /** Glob patterns for module files */
  include: z.array(z.string()).default(['**/*.module.ts']),
  /** Glob patterns to skip */
  exclude: z.array(z.string()).default([
    '**/node_modules/**',
    '**/dist/**',
    '**/*.spec.ts',
  ]),
  /** Files read per batch */
  concurrency: z.number().int().min(1).max(256).default(16),
});

/** NgModule extraction settings. */
export const ExtractionSettingsSchema = z.object({
  /** Package import prefixes never treated as dependencies */
  ignore_import_prefixes: z.array(z.string()).default(['@angular/', 'rxjs']),
  /** Add non-relative `import ... from` specifiers to the declared dependencies */
  include_package_imports: z.boolean().default(true),
});

/** Glob override pinning matching origin paths to a kind. */
export const KindOverrideSchema = z.object({
  pattern: z.string().min(1),
  kind: ModuleKindSchema,
});

/** Classification heuristics. */
export const ClassificationSettingsSchema = z.object({
  core_segments: z.array(z.string()).default(['core']),
  shared_segments: z.array(z.string()).default(['shared']),
  feature_segments: z.array(z.string()).default(['features', 'feature']),
  overrides: z.array(KindOverrideSchema).default([]),
});

export const CycleModeSchema = z.enum(['components', 'elementary']);

/** Circular dependency reporting. */
export const CycleSettingsSchema = z.object({
  mode: CycleModeSchema.default('components'),
  /** Longest cycle enumerated in elementary mode */
  max_length: z.number().int().min(1).max(64).default(8),
});

export const OutputFormatSchema = z.enum(['console', 'json']);

/** Output defaults for the CLI. */
export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('console'),
  graph_file: z.string().default('dependency-graph.dot'),
});

/** Exit codes configuration. */
export const ExitCodesSchema = z.object({
  success: z.number().default(0),
  violations: z.number().default(1),
  error: z.number().default(2),
});

/** Findings that make `analyze` exit with `exit_codes.violations`. */
export const FailOnSchema = z.enum(['violations', 'cycles']);

/** Root configuration schema. */
export const ConfigSchema = z.object({
  discovery: withDefaults(DiscoverySettingsSchema),
  extraction: withDefaults(ExtractionSettingsSchema),
  classification: withDefaults(ClassificationSettingsSchema),
  cycles: withDefaults(CycleSettingsSchema),
  output: withDefaults(OutputSettingsSchema),
  exit_codes: withDefaults(ExitCodesSchema),
  fail_on: z.array(FailOnSchema).default(['violations', 'cycles']),
});

export type Config = z.infer<typeof ConfigSchema>;
export type DiscoverySettings = z.infer<typeof DiscoverySettingsSchema>;
export type ExtractionSettings = z.infer<typeof ExtractionSettingsSchema>;
export type ClassificationSettings = z.infer<typeof ClassificationSettingsSchema>;
export type CycleSettings = z.infer<typeof CycleSettingsSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type FailOn = z.infer<typeof FailOnSchema>;
