/**
 * Tests for the module registry.
 */
import { describe, it, expect } from 'vitest';
import { ModuleRegistry } from '../../../../src/core/registry/registry.js';
import { createClassifier } from '../../../../src/core/classify/classifier.js';
import { RegistryError, ErrorCodes } from '../../../../src/utils/errors.js';
import type { ModuleRecord } from '../../../../src/core/registry/schema.js';

function record(identity: string, originPath = `${identity}.ts`, deps: string[] = []): ModuleRecord {
  return { identity, originPath, declaredDependencies: deps };
}

describe('ModuleRegistry', () => {
  describe('build', () => {
    it('should keep registration order', () => {
      const registry = ModuleRegistry.build([record('B'), record('A'), record('C')]);

      expect(registry.identities()).toEqual(['B', 'A', 'C']);
      expect(registry.size).toBe(3);
    });

    it('should classify every module and record the deciding rule', () => {
      const registry = ModuleRegistry.build([
        { ...record('AppModule', 'src/app/core/app.module.ts'), declaredKind: 'Shared' },
        record('CoreModule', 'src/app/core/core.module.ts'),
        record('UserFeatureModule', 'src/app/user.module.ts'),
        record('AppRoutingModule', 'src/app/app-routing.module.ts'),
      ]);

      expect(registry.get('AppModule')).toMatchObject({ kind: 'Shared', classifiedBy: 'declared' });
      expect(registry.get('CoreModule')).toMatchObject({ kind: 'Core', classifiedBy: 'path-segment' });
      expect(registry.get('UserFeatureModule')).toMatchObject({
        kind: 'Feature',
        classifiedBy: 'name-suffix',
      });
      expect(registry.get('AppRoutingModule')).toMatchObject({
        kind: 'Unknown',
        classifiedBy: 'fallback',
      });
    });

    it('should use the supplied classifier', () => {
      const classifier = createClassifier({ overrides: [{ pattern: 'libs/**', kind: 'Shared' }] });
      const registry = ModuleRegistry.build([record('Ui', 'libs/ui/ui.module.ts')], classifier);

      expect(registry.get('Ui')?.kind).toBe('Shared');
    });

    it('should throw DuplicateModuleIdentity naming both paths', () => {
      const build = () =>
        ModuleRegistry.build([record('SharedModule', 'a/shared.module.ts'), record('SharedModule', 'b/shared.module.ts')]);

      expect(build).toThrow(RegistryError);
      expect(build).toThrow("Duplicate module identity 'SharedModule' (a/shared.module.ts, b/shared.module.ts)");
      try {
        build();
      } catch (error) {
        expect(error).toMatchObject({ code: ErrorCodes.DUPLICATE_MODULE_IDENTITY });
      }
    });

    it('should accept an empty record list', () => {
      const registry = ModuleRegistry.build([]);

      expect(registry.size).toBe(0);
      expect(registry.identities()).toEqual([]);
    });
  });

  describe('immutability', () => {
    it('should freeze modules and copy dependency lists', () => {
      const deps = ['X'];
      const registry = ModuleRegistry.build([record('A', 'a.ts', deps)]);
      deps.push('Y');

      const mod = registry.get('A');
      expect(mod?.declaredDependencies).toEqual(['X']);
      expect(Object.isFrozen(mod)).toBe(true);
      expect(Object.isFrozen(registry.modules)).toBe(true);
    });
  });

  describe('lookups', () => {
    const registry = ModuleRegistry.build([
      record('SharedModule'),
      record('Shared'),
      record('CoreModule'),
    ]);

    it('should answer has/get by identity', () => {
      expect(registry.has('CoreModule')).toBe(true);
      expect(registry.has('coremodule')).toBe(false);
      expect(registry.get('Missing')).toBeUndefined();
    });

    it('should index identities by normalized key', () => {
      expect(registry.findByNormalizedKey('shared')).toEqual(['SharedModule', 'Shared']);
      expect(registry.findByNormalizedKey('core')).toEqual(['CoreModule']);
      expect(registry.findByNormalizedKey('none')).toEqual([]);
    });

    it('should count modules by kind', () => {
      expect(registry.countByKind('Shared')).toBe(2);
      expect(registry.countByKind('Core')).toBe(1);
      expect(registry.countByKind('Feature')).toBe(0);
    });
  });
});
