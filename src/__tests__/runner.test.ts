import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { runPipeline, resolveTemplate } from '../runtime/runner.js';
import { StepRegistry, createDefaultRegistry } from '../runtime/registry.js';
import type { RunContext, StepHandler, StepSpec } from '../runtime/types.js';
import { ConfigurationError, StepFailedError, UnknownHandlerError } from '../shared/errors.js';
import { createTempProject, testSettings, type TempProject } from './test-helpers.js';

function plan(steps: string): string {
  return `pipeline: test.pipeline\nsteps:\n${steps}`;
}

describe('runPipeline', () => {
  let project: TempProject;

  beforeEach(() => {
    project = createTempProject();
  });

  afterEach(() => {
    project.cleanup();
  });

  it('returns disabled without touching the filesystem or the registry', async () => {
    const resolveSpy = jest.fn<StepRegistry['resolve']>();
    const registry = new StepRegistry({});
    registry.resolve = resolveSpy;

    const summary = await runPipeline('missing/plan.yml', '../not-even-valid', {
      root: project.root,
      settings: testSettings({ pipelineEnabled: false }),
      registry,
    });

    expect(summary.status).toBe('disabled');
    expect(summary.total_steps).toBe(0);
    expect(resolveSpy).not.toHaveBeenCalled();
    expect(project.files()).toEqual([]);
  });

  it('runs steps in order and persists the summary last', async () => {
    project.write(
      'pipe.yml',
      plan(
        [
          '  - id: outline',
          '    handler_key: artifact.write',
          '    output: outline.md',
          '    config:',
          '      content: "# {{topic}} for {{run_id}}"',
          '  - id: copy',
          '    uses: artifact.write',
          '    input_from: outline.md',
          '    output: copy.md',
        ].join('\n'),
      ),
    );

    const summary = await runPipeline('pipe.yml', 'run_1', {
      root: project.root,
      settings: testSettings(),
      params: { topic: 'tides' },
    });

    expect(summary.status).toBe('completed');
    expect(summary.successful).toBe(2);
    expect(summary.output_dir).toBe('output/run_1');
    expect(summary.results.map((r) => r.output)).toEqual(['output/run_1/outline.md', 'output/run_1/copy.md']);
    expect(readFileSync(join(project.root, 'output/run_1/copy.md'), 'utf8')).toBe('# tides for run_1');
    const persisted = JSON.parse(readFileSync(join(project.root, 'output/run_1/pipeline_summary.json'), 'utf8'));
    expect(persisted.engine).toBe('pipeline.runner');
    expect(persisted.pipeline).toBe('test.pipeline');
  });

  it('exposes job params to handlers as run.params', async () => {
    project.write('pipe.yml', plan('  - id: a\n    handler_key: probe.params\n    output: a.txt'));
    let seen: RunContext['params'] | undefined;
    const handler: StepHandler = async (_step, run) => {
      seen = run.params;
      return `${run.runDir}/a.txt`;
    };

    await runPipeline('pipe.yml', 'run_p', {
      root: project.root,
      settings: testSettings(),
      params: { lang: 'th' },
      registry: new StepRegistry({ 'probe.params': handler }),
    });

    expect(seen).toEqual({ lang: 'th' });
  });

  it('fails before any step runs when a handler key is unknown', async () => {
    project.write(
      'pipe.yml',
      plan('  - id: a\n    handler_key: artifact.write\n    output: a.txt\n    config:\n      content: x\n  - id: b\n    handler_key: nope.missing\n    output: b.txt'),
    );

    const run = runPipeline('pipe.yml', 'run_u', { root: project.root, settings: testSettings() });

    await expect(run).rejects.toBeInstanceOf(UnknownHandlerError);
    await expect(run).rejects.toMatchObject({ handlerKey: 'nope.missing', stepId: 'b' });
    expect(project.files()).toEqual(['pipe.yml']);
  });

  it('stops at the first failing step and reports the partial summary', async () => {
    project.write(
      'pipe.yml',
      plan(
        '  - id: a\n    handler_key: ok\n    output: a\n  - id: b\n    handler_key: boom\n    output: b\n  - id: c\n    handler_key: ok\n    output: c',
      ),
    );
    const ok = jest.fn<StepHandler>(async (step: StepSpec) => step.output);
    const boom: StepHandler = async () => {
      throw new Error('render crashed');
    };

    let caught: unknown;
    try {
      await runPipeline('pipe.yml', 'run_f', {
        root: project.root,
        settings: testSettings(),
        registry: new StepRegistry({ ok, boom }),
      });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(StepFailedError);
    if (!(caught instanceof StepFailedError)) return;
    expect(caught.stepId).toBe('b');
    expect(ok).toHaveBeenCalledTimes(1);
    expect(caught.summary).toMatchObject({
      status: 'failed',
      successful: 1,
      failed: 1,
      results: [
        { id: 'a', status: 'ok' },
        { id: 'b', status: 'error', error: 'render crashed' },
      ],
    });
    expect(project.files()).toEqual(['pipe.yml']);
  });

  it('plans a dry run without writing anything', async () => {
    project.write(
      'pipe.yml',
      plan(
        [
          '  - id: brief',
          '    handler_key: artifact.write',
          '    output: brief.md',
          '    config: { dry_run: true, content: x }',
          '  - id: quality',
          '    handler_key: quality.gate',
          '    output: q.json',
          '    config: { dry_run: true }',
          '  - id: publish',
          '    handler_key: youtube.upload',
          '    output: p.json',
          '    config: { dry_run: true }',
        ].join('\n'),
      ),
    );

    const summary = await runPipeline('pipe.yml', 'run_d', {
      root: project.root,
      settings: testSettings(),
      registry: createDefaultRegistry(),
    });

    expect(summary.status).toBe('dry_run');
    expect(summary.planned_paths).toEqual([
      'output/run_d/brief.md',
      'output/run_d/artifacts/quality_gate_summary.json',
      'output/run_d/artifacts/publish_summary.json',
    ]);
    for (const p of summary.planned_paths ?? []) {
      expect(p.startsWith('/')).toBe(false);
      expect(p.split('/')).not.toContain('..');
    }
    expect(project.files()).toEqual(['pipe.yml']);
  });

  it('hands dry-run handlers a read-only store', async () => {
    project.write('pipe.yml', plan('  - id: a\n    handler_key: sneaky\n    output: a\n    config: { dry_run: true }'));
    const sneaky: StepHandler = async (_step, run) => run.store.writeText('output/leak.txt', 'x');

    await expect(
      runPipeline('pipe.yml', 'run_ro', {
        root: project.root,
        settings: testSettings(),
        registry: new StepRegistry({ sneaky }),
      }),
    ).rejects.toBeInstanceOf(StepFailedError);
    expect(project.files()).toEqual(['pipe.yml']);
  });

  it('rejects an invalid run id and malformed plans', async () => {
    project.write('pipe.yml', plan('  - id: a\n    output: a.txt'));
    await expect(
      runPipeline('pipe.yml', 'bad/id', { root: project.root, settings: testSettings() }),
    ).rejects.toBeInstanceOf(ConfigurationError);
    await expect(
      runPipeline('pipe.yml', 'run_m', { root: project.root, settings: testSettings() }),
    ).rejects.toThrow('Invalid step 0 (a)');
  });

  it('rejects step outputs that escape the run directory', async () => {
    project.write('pipe.yml', plan('  - id: a\n    handler_key: artifact.write\n    output: ../../etc/x'));
    await expect(
      runPipeline('pipe.yml', 'run_e', { root: project.root, settings: testSettings() }),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('resolveTemplate', () => {
  it('substitutes vars and previous step outputs and leaves unknowns alone', () => {
    const outputs = new Map([['outline', 'output/r/outline.md']]);
    expect(resolveTemplate('{{topic}} / {{step.outline.output}} / {{missing}}', { topic: 'x' }, outputs)).toBe(
      'x / output/r/outline.md / {{missing}}',
    );
    expect(resolveTemplate({ list: ['{{n}}'] }, { n: 3 }, outputs)).toEqual({ list: ['3'] });
  });
});
