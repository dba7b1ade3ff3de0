/**
 * Module kind classification as an ordered chain of pure rules.
 * The first rule that returns a kind wins; a record no rule matches is Unknown.
 */
import { minimatch } from 'minimatch';
import type { ModuleKind, ModuleRecord } from '../registry/schema.js';
import type { Classification, ClassificationSource } from '../registry/types.js';

/**
 * A single classification heuristic.
 */
export interface ClassificationRule {
  readonly source: ClassificationSource;
  match(record: ModuleRecord): ModuleKind | null;
}

/**
 * Glob pattern that pins every matching origin path to a kind.
 */
export interface KindOverride {
  pattern: string;
  kind: ModuleKind;
}

export interface ClassifierOptions {
  coreSegments: string[];
  sharedSegments: string[];
  featureSegments: string[];
  overrides: KindOverride[];
}

export const DEFAULT_CLASSIFIER_OPTIONS: ClassifierOptions = {
  coreSegments: ['core'],
  sharedSegments: ['shared'],
  featureSegments: ['features', 'feature'],
  overrides: [],
};

const SUFFIX_KINDS = new Map<string, ModuleKind>([
  ['core', 'Core'],
  ['shared', 'Shared'],
  ['feature', 'Feature'],
  ['features', 'Feature'],
]);

function normalizePath(originPath: string): string {
  return originPath.replace(/\\/g, '/');
}

/**
 * Split an identity into lower-case tokens on case changes and separators.
 * `UserFeatureModule` -> ['user', 'feature', 'module'].
 */
export function tokenizeIdentity(identity: string): string[] {
  return identity
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .split(/[^A-Za-z0-9]+/)
    .filter((token) => token.length > 0)
    .map((token) => token.toLowerCase());
}

/** Kind stated by the source itself. `Unknown` is not a statement. */
export function declaredKindRule(): ClassificationRule {
  return {
    source: 'declared',
    match: (record) =>
      record.declaredKind && record.declaredKind !== 'Unknown' ? record.declaredKind : null,
  };
}

/** Configured glob overrides on the origin path; first matching pattern wins. */
export function overrideRule(overrides: KindOverride[]): ClassificationRule {
  return {
    source: 'override',
    match: (record) => {
      const normalized = normalizePath(record.originPath);
      const hit = overrides.find((o) => minimatch(normalized, o.pattern, { dot: true }));
      return hit ? hit.kind : null;
    },
  };
}

/** Directory naming: core, then shared, then features. */
export function pathSegmentRule(
  options: Pick<ClassifierOptions, 'coreSegments' | 'sharedSegments' | 'featureSegments'>
): ClassificationRule {
  const ordered: Array<[ModuleKind, Set<string>]> = [
    ['Core', new Set(options.coreSegments.map((s) => s.toLowerCase()))],
    ['Shared', new Set(options.sharedSegments.map((s) => s.toLowerCase()))],
    ['Feature', new Set(options.featureSegments.map((s) => s.toLowerCase()))],
  ];

  return {
    source: 'path-segment',
    match: (record) => {
      const segments = normalizePath(record.originPath)
        .toLowerCase()
        .split('/')
        .filter((s) => s.length > 0);

      for (const [kind, names] of ordered) {
        if (segments.some((segment) => names.has(segment))) {
          return kind;
        }
      }
      return null;
    },
  };
}

/** Naming convention: the last token before an optional `Module` suffix. */
export function nameSuffixRule(): ClassificationRule {
  return {
    source: 'name-suffix',
    match: (record) => {
      const tokens = tokenizeIdentity(record.identity);
      if (tokens.length > 1 && tokens[tokens.length - 1] === 'module') {
        tokens.pop();
      }
      const last = tokens[tokens.length - 1];
      return last !== undefined ? (SUFFIX_KINDS.get(last) ?? null) : null;
    },
  };
}

/**
 * Evaluates classification rules in priority order.
 */
export class Classifier {
  private readonly rules: readonly ClassificationRule[];

  constructor(rules: readonly ClassificationRule[]) {
    this.rules = rules;
  }

  classify(record: ModuleRecord): ModuleKind {
    return this.explain(record).kind;
  }

  /**
   * Classify and report which rule decided.
   */
  explain(record: ModuleRecord): Classification {
    for (const rule of this.rules) {
      const kind = rule.match(record);
      if (kind) {
        return { kind, source: rule.source };
      }
    }
    return { kind: 'Unknown', source: 'fallback' };
  }

  getRules(): readonly ClassificationRule[] {
    return this.rules;
  }
}

/**
 * Build the standard rule chain: declared, override, path segment, name suffix.
 */
export function createClassifier(options: Partial<ClassifierOptions> = {}): Classifier {
  const opts: ClassifierOptions = { ...DEFAULT_CLASSIFIER_OPTIONS, ...options };
  const rules: ClassificationRule[] = [declaredKindRule()];

  if (opts.overrides.length > 0) {
    rules.push(overrideRule(opts.overrides));
  }
  rules.push(pathSegmentRule(opts), nameSuffixRule());

  return new Classifier(rules);
}
