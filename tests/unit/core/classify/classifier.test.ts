/**
 * Tests for the module kind classifier.
 */
import { describe, it, expect } from 'vitest';
import {
  Classifier,
  createClassifier,
  declaredKindRule,
  overrideRule,
  pathSegmentRule,
  nameSuffixRule,
  tokenizeIdentity,
  DEFAULT_CLASSIFIER_OPTIONS,
} from '../../../../src/core/classify/classifier.js';
import type { ModuleRecord } from '../../../../src/core/registry/schema.js';

function record(identity: string, originPath: string, declaredKind?: ModuleRecord['declaredKind']): ModuleRecord {
  const base: ModuleRecord = { identity, originPath, declaredDependencies: [] };
  return declaredKind ? { ...base, declaredKind } : base;
}

describe('tokenizeIdentity', () => {
  it('should split camel case', () => {
    expect(tokenizeIdentity('UserFeatureModule')).toEqual(['user', 'feature', 'module']);
  });

  it('should split acronyms from words', () => {
    expect(tokenizeIdentity('HTTPCoreModule')).toEqual(['http', 'core', 'module']);
  });

  it('should split on dashes, underscores and dots', () => {
    expect(tokenizeIdentity('order-feature_v2.module')).toEqual(['order', 'feature', 'v2', 'module']);
  });
});

describe('declaredKindRule', () => {
  const rule = declaredKindRule();

  it('should return the declared kind', () => {
    expect(rule.match(record('X', 'x.ts', 'Feature'))).toBe('Feature');
  });

  it('should ignore a declared Unknown', () => {
    expect(rule.match(record('X', 'x.ts', 'Unknown'))).toBeNull();
  });

  it('should return null without a declaration', () => {
    expect(rule.match(record('X', 'x.ts'))).toBeNull();
  });
});

describe('overrideRule', () => {
  const rule = overrideRule([
    { pattern: 'src/app/legacy/**', kind: 'Feature' },
    { pattern: 'src/app/**', kind: 'Shared' },
  ]);

  it('should use the first matching pattern', () => {
    expect(rule.match(record('X', 'src/app/legacy/old.module.ts'))).toBe('Feature');
    expect(rule.match(record('X', 'src/app/ui/ui.module.ts'))).toBe('Shared');
  });

  it('should match Windows separators', () => {
    expect(rule.match(record('X', 'src\\app\\legacy\\old.module.ts'))).toBe('Feature');
  });

  it('should return null when nothing matches', () => {
    expect(rule.match(record('X', 'libs/ui.module.ts'))).toBeNull();
  });
});

describe('pathSegmentRule', () => {
  const rule = pathSegmentRule(DEFAULT_CLASSIFIER_OPTIONS);

  it('should classify by directory name', () => {
    expect(rule.match(record('X', 'src/app/core/x.module.ts'))).toBe('Core');
    expect(rule.match(record('X', 'src/app/shared/x.module.ts'))).toBe('Shared');
    expect(rule.match(record('X', 'src/app/features/x/x.module.ts'))).toBe('Feature');
    expect(rule.match(record('X', 'src/app/feature/x.module.ts'))).toBe('Feature');
  });

  it('should prefer core over shared over features', () => {
    expect(rule.match(record('X', 'features/shared/core/x.ts'))).toBe('Core');
    expect(rule.match(record('X', 'features/shared/x.ts'))).toBe('Shared');
  });

  it('should compare whole segments case-insensitively', () => {
    expect(rule.match(record('X', 'src/App/CORE/x.ts'))).toBe('Core');
    expect(rule.match(record('X', 'src/coreutils/x.ts'))).toBeNull();
  });

  it('should honour configured segments', () => {
    const custom = pathSegmentRule({ coreSegments: ['kernel'], sharedSegments: [], featureSegments: ['pages'] });

    expect(custom.match(record('X', 'src/kernel/x.ts'))).toBe('Core');
    expect(custom.match(record('X', 'src/shared/x.ts'))).toBeNull();
    expect(custom.match(record('X', 'src/pages/x.ts'))).toBe('Feature');
  });
});

describe('nameSuffixRule', () => {
  const rule = nameSuffixRule();

  it('should read the last token before Module', () => {
    expect(rule.match(record('AppCoreModule', 'x.ts'))).toBe('Core');
    expect(rule.match(record('UiSharedModule', 'x.ts'))).toBe('Shared');
    expect(rule.match(record('OrdersFeaturesModule', 'x.ts'))).toBe('Feature');
    expect(rule.match(record('UserFeature', 'x.ts'))).toBe('Feature');
  });

  it('should not match a lone Module token', () => {
    expect(rule.match(record('Module', 'x.ts'))).toBeNull();
  });

  it('should not match inherited object keys', () => {
    expect(rule.match(record('ConstructorModule', 'x.ts'))).toBeNull();
  });

  it('should return null for other names', () => {
    expect(rule.match(record('AppRoutingModule', 'x.ts'))).toBeNull();
  });
});

describe('Classifier', () => {
  it('should let the first matching rule win', () => {
    const classifier = createClassifier();
    const result = classifier.explain(record('UserFeatureModule', 'src/app/shared/user.module.ts'));

    expect(result).toEqual({ kind: 'Shared', source: 'path-segment' });
  });

  it('should put overrides after declared kinds and before paths', () => {
    const classifier = createClassifier({
      overrides: [{ pattern: '**/legacy/**', kind: 'Feature' }],
    });

    expect(classifier.explain(record('X', 'src/core/legacy/x.ts'))).toEqual({
      kind: 'Feature',
      source: 'override',
    });
    expect(classifier.explain(record('X', 'src/core/legacy/x.ts', 'Core'))).toEqual({
      kind: 'Core',
      source: 'declared',
    });
  });

  it('should only add the override rule when overrides exist', () => {
    expect(createClassifier().getRules().map((r) => r.source)).toEqual([
      'declared',
      'path-segment',
      'name-suffix',
    ]);
    expect(
      createClassifier({ overrides: [{ pattern: '*', kind: 'Core' }] })
        .getRules()
        .map((r) => r.source)
    ).toEqual(['declared', 'override', 'path-segment', 'name-suffix']);
  });

  it('should fall back to Unknown', () => {
    const classifier = createClassifier();

    expect(classifier.classify(record('AppModule', 'src/app/app.module.ts'))).toBe('Unknown');
    expect(classifier.explain(record('AppModule', 'src/app/app.module.ts')).source).toBe('fallback');
  });

  it('should accept a custom rule list', () => {
    const classifier = new Classifier([{ source: 'name-suffix', match: () => 'Core' }]);

    expect(classifier.classify(record('Anything', 'x.ts'))).toBe('Core');
  });
});
