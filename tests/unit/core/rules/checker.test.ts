/**
 * Tests for layering rule checks.
 */
import { describe, it, expect } from 'vitest';
import { checkLayering, evaluateEdge, LAYERING_POLICY } from '../../../../src/core/rules/checker.js';
import { buildDependencyGraph } from '../../../../src/core/graph/builder.js';
import { ModuleRegistry } from '../../../../src/core/registry/registry.js';
import { MODULE_KINDS, type ModuleKind, type ModuleRecord } from '../../../../src/core/registry/schema.js';

function mod(identity: string, declaredKind: ModuleKind, deps: string[] = []): ModuleRecord {
  return { identity, originPath: `${identity}.ts`, declaredKind, declaredDependencies: deps };
}

describe('LAYERING_POLICY', () => {
  it('should forbid exactly three kind pairs', () => {
    expect(LAYERING_POLICY.map((r) => `${r.from}->${r.to}:${r.violation}`)).toEqual([
      'Core->Feature:CoreDependsOnFeature',
      'Shared->Feature:SharedDependsOnFeature',
      'Feature->Feature:FeatureDependsOnFeature',
    ]);
  });
});

describe('evaluateEdge', () => {
  const forbidden = new Set(['Core->Feature', 'Shared->Feature', 'Feature->Feature']);

  for (const fromKind of MODULE_KINDS) {
    for (const toKind of MODULE_KINDS) {
      const pair = `${fromKind}->${toKind}`;
      it(`should ${forbidden.has(pair) ? 'reject' : 'allow'} ${pair}`, () => {
        const violation = evaluateEdge({ from: 'X', to: 'Y', fromKind, toKind });
        expect(violation !== null).toBe(forbidden.has(pair));
      });
    }
  }

  it('should describe the violation', () => {
    expect(evaluateEdge({ from: 'Core', to: 'User', fromKind: 'Core', toKind: 'Feature' })).toEqual({
      from: 'Core',
      to: 'User',
      kind: 'CoreDependsOnFeature',
      description: 'Core module depends on Feature module',
    });
  });

  it('should skip self-dependencies', () => {
    expect(evaluateEdge({ from: 'F', to: 'F', fromKind: 'Feature', toKind: 'Feature' })).toBeNull();
  });
});

describe('checkLayering', () => {
  it('should report violations in edge order', () => {
    const graph = buildDependencyGraph(
      ModuleRegistry.build([
        mod('Core', 'Core', ['Shared']),
        mod('Shared', 'Shared', ['UserFeature']),
        mod('UserFeature', 'Feature', ['OrderFeature']),
        mod('OrderFeature', 'Feature'),
      ])
    );

    expect(checkLayering(graph)).toEqual([
      {
        from: 'Shared',
        to: 'UserFeature',
        kind: 'SharedDependsOnFeature',
        description: 'Shared module depends on Feature module',
      },
      {
        from: 'UserFeature',
        to: 'OrderFeature',
        kind: 'FeatureDependsOnFeature',
        description: 'Feature module depends on another Feature module',
      },
    ]);
  });

  it('should report both directions of a mutual feature dependency', () => {
    const graph = buildDependencyGraph(
      ModuleRegistry.build([mod('A', 'Feature', ['B']), mod('B', 'Feature', ['A'])])
    );

    expect(checkLayering(graph).map((v) => `${v.from}->${v.to}`)).toEqual(['A->B', 'B->A']);
  });

  it('should exempt Unknown modules', () => {
    const graph = buildDependencyGraph(
      ModuleRegistry.build([mod('App', 'Unknown', ['User']), mod('User', 'Feature', ['App'])])
    );

    expect(checkLayering(graph)).toEqual([]);
  });
});
