/**
 * Module registry - the classified, identity-indexed set of module records.
 * Built once per analysis and never mutated afterwards.
 */
import { RegistryError, ErrorCodes } from '../../utils/errors.js';
import { createClassifier, type Classifier } from '../classify/classifier.js';
import { normalizeIdentifier } from './normalize.js';
import type { ModuleKind, ModuleRecord } from './schema.js';
import type { ClassifiedModule, ModuleLookup } from './types.js';

function freezeModule(record: ModuleRecord, classifier: Classifier): ClassifiedModule {
  const { kind, source } = classifier.explain(record);
  return Object.freeze({
    ...record,
    declaredDependencies: [...record.declaredDependencies],
    kind,
    classifiedBy: source,
  });
}

export class ModuleRegistry implements ModuleLookup {
  readonly modules: readonly ClassifiedModule[];
  private readonly byIdentity: ReadonlyMap<string, ClassifiedModule>;
  private readonly byNormalizedKey: ReadonlyMap<string, readonly string[]>;

  private constructor(modules: ClassifiedModule[]) {
    this.modules = Object.freeze(modules);

    const byIdentity = new Map<string, ClassifiedModule>();
    const byNormalizedKey = new Map<string, string[]>();
    for (const mod of modules) {
      byIdentity.set(mod.identity, mod);

      const key = normalizeIdentifier(mod.identity);
      if (key.length === 0) continue;
      const bucket = byNormalizedKey.get(key);
      if (bucket) {
        bucket.push(mod.identity);
      } else {
        byNormalizedKey.set(key, [mod.identity]);
      }
    }

    this.byIdentity = byIdentity;
    this.byNormalizedKey = byNormalizedKey;
  }

  /**
   * Classify the records and index them by identity.
   * Throws DuplicateModuleIdentity when two records share an identity.
   */
  static build(
    records: readonly ModuleRecord[],
    classifier: Classifier = createClassifier()
  ): ModuleRegistry {
    const seen = new Map<string, string>();
    for (const record of records) {
      const previous = seen.get(record.identity);
      if (previous !== undefined) {
        throw new RegistryError(
          ErrorCodes.DUPLICATE_MODULE_IDENTITY,
          `Duplicate module identity '${record.identity}' (${previous}, ${record.originPath})`,
          { identity: record.identity, paths: [previous, record.originPath] }
        );
      }
      seen.set(record.identity, record.originPath);
    }

    return new ModuleRegistry(records.map((record) => freezeModule(record, classifier)));
  }

  get size(): number {
    return this.modules.length;
  }

  get(identity: string): ClassifiedModule | undefined {
    return this.byIdentity.get(identity);
  }

  has(identity: string): boolean {
    return this.byIdentity.has(identity);
  }

  /** Identities in registration order. */
  identities(): string[] {
    return this.modules.map((m) => m.identity);
  }

  findByNormalizedKey(key: string): readonly string[] {
    return this.byNormalizedKey.get(key) ?? [];
  }

  countByKind(kind: ModuleKind): number {
    return this.modules.filter((m) => m.kind === kind).length;
  }
}
