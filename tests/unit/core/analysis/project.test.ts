/**
 * Tests for project-level analysis.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { tmpdir } from 'node:os';
import {
  analyzeProject,
  collectProjectRecords,
  toAnalyzeOptions,
  toClassifierOptions,
} from '../../../../src/core/analysis/project.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import { ConfigSchema } from '../../../../src/core/config/schema.js';

async function write(root: string, relativePath: string, content: string): Promise<void> {
  const full = join(root, relativePath);
  await mkdir(dirname(full), { recursive: true });
  await writeFile(full, content);
}

describe('project analysis', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `layerguard-project-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await write(
      testDir,
      'src/app/core/core.module.ts',
      `import { SharedModule } from '../shared/shared.module';
@NgModule({ imports: [SharedModule] })
export class CoreModule {}
`
    );
    await write(
      testDir,
      'src/app/shared/shared.module.ts',
      `import { OrdersModule } from '../features/orders/orders.module';
@NgModule({ imports: [CommonModule, OrdersModule], exports: [ButtonComponent] })
export class SharedModule {}
`
    );
    await write(
      testDir,
      'src/app/features/orders/orders.module.ts',
      `import { StoreModule } from '@ngrx/store';
@NgModule({ imports: [StoreModule.forFeature('orders', reducer)] })
export class OrdersModule {}
`
    );
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should map classification settings onto classifier options', () => {
    const config = ConfigSchema.parse({
      classification: { core_segments: ['kernel'], overrides: [{ pattern: 'x/**', kind: 'Shared' }] },
    });

    expect(toClassifierOptions(config)).toEqual({
      coreSegments: ['kernel'],
      sharedSegments: ['shared'],
      featureSegments: ['features', 'feature'],
      overrides: [{ pattern: 'x/**', kind: 'Shared' }],
    });
  });

  it('should map cycle settings onto engine options', () => {
    const options = toAnalyzeOptions(ConfigSchema.parse({ cycles: { mode: 'elementary', max_length: 5 } }));

    expect(options.cycleMode).toBe('elementary');
    expect(options.maxCycleLength).toBe(5);
    expect(options.classifier?.getRules().map((r) => r.source)).toEqual([
      'declared',
      'path-segment',
      'name-suffix',
    ]);
  });

  it('should collect records using extraction settings', async () => {
    const config = ConfigSchema.parse({ extraction: { include_package_imports: false } });

    const records = await collectProjectRecords(testDir, config);

    expect(records.map((r) => r.declaredDependencies)).toEqual([
      ['SharedModule'],
      ['StoreModule'],
      ['CommonModule', 'OrdersModule'],
    ]);
  });

  it('should analyze a scanned project end to end', async () => {
    const { report, graph } = await analyzeProject(testDir, getDefaultConfig());

    expect(report.modules.map((m) => [m.identity, m.kind])).toEqual([
      ['CoreModule', 'Core'],
      ['OrdersModule', 'Feature'],
      ['SharedModule', 'Shared'],
    ]);
    expect(report.dependencyViolations).toEqual([
      {
        from: 'SharedModule',
        to: 'OrdersModule',
        kind: 'SharedDependsOnFeature',
        description: 'Shared module depends on Feature module',
      },
    ]);
    expect(report.modules[1].externalDependencies).toEqual(['StoreModule', '@ngrx/store']);
    expect(report.modules[2].exports).toEqual(['ButtonComponent']);
    expect(graph.edges).toHaveLength(2);
    expect(report.metrics.maxDependencyDepth).toBe(2);
  });
});
