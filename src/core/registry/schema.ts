import { z } from 'zod';

/** Architectural kind of a module. */
export const ModuleKindSchema = z.enum(['Core', 'Shared', 'Feature', 'Unknown']);

export type ModuleKind = z.infer<typeof ModuleKindSchema>;

/** Kinds in reporting order. */
export const MODULE_KINDS: readonly ModuleKind[] = ModuleKindSchema.options;

/**
 * One discovered module, as handed over by an extractor.
 */
export const ModuleRecordSchema = z.object({
  /** Stable unique name */
  identity: z.string().min(1),
  /** Source location, used for reporting and path-based classification */
  originPath: z.string(),
  /** Kind stated explicitly by the source (e.g. an `@layer` tag) */
  declaredKind: ModuleKindSchema.optional(),
  /** Dependency identifiers as written in source */
  declaredDependencies: z.array(z.string()),
  /** Raw NgModule metadata, kept for reporting */
  imports: z.array(z.string()).optional(),
  exports: z.array(z.string()).optional(),
  providers: z.array(z.string()).optional(),
  declarations: z.array(z.string()).optional(),
});

export type ModuleRecord = z.infer<typeof ModuleRecordSchema>;

/**
 * A records file holds either a bare array or `{ modules: [...] }`.
 */
export const ModuleRecordsFileSchema = z.union([
  z.array(ModuleRecordSchema),
  z.object({ modules: z.array(ModuleRecordSchema) }),
]);
