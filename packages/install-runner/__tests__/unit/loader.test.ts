import { describe, it, expect } from 'vitest';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { loadInstallPlan, loadPatchArtifact, parseInstallPlan } from '../../src/dsl/loader.js';
import { InstallPlanSchema, PatchArtifactSchema } from '../../src/dsl/schemas.js';
import { InstallErrorCode } from '../../src/shared/errors.js';

const fixtures = resolve(dirname(fileURLToPath(import.meta.url)), '../fixtures');

describe('InstallPlanSchema', () => {
  it('should accept every step type', () => {
    const result = InstallPlanSchema.safeParse({
      steps: [
        { id: 'run', type: 'run', command: ['echo', 'hi'], env: { A: '1' }, sudo: true },
        { id: 'pipe', type: 'pipeline', commands: [['echo', 'deb'], ['tee', 'list']] },
        { id: 'cd', type: 'chdir', path: 'dir' },
        { id: 'retry', type: 'retry', attempts: 4, delayMs: 1000, step: { type: 'run', command: ['true'] } },
        { id: 'patch', type: 'patch', patch: 'patches/p.yml', optIn: true, group: 'extras' },
      ],
    });
    expect(result.success).toBe(true);
  });

  it('should reject a pipeline with a single member', () => {
    const result = InstallPlanSchema.safeParse({
      steps: [{ id: 'pipe', type: 'pipeline', commands: [['echo']] }],
    });
    expect(result.success).toBe(false);
  });

  it('should reject an empty command', () => {
    expect(InstallPlanSchema.safeParse({ steps: [{ id: 'run', type: 'run', command: [] }] }).success).toBe(false);
  });

  it('should reject zero retry attempts', () => {
    const result = InstallPlanSchema.safeParse({
      steps: [{ id: 'retry', type: 'retry', attempts: 0, step: { type: 'run', command: ['true'] } }],
    });
    expect(result.success).toBe(false);
  });

  it('should reject guards with unknown keys', () => {
    const result = InstallPlanSchema.safeParse({
      steps: [{ id: 'run', type: 'run', guard: { flag: 'gplOk', equals: '1' }, command: ['true'] }],
    });
    expect(result.success).toBe(false);
  });

  it('should reject duplicate ids', () => {
    const result = InstallPlanSchema.safeParse({
      steps: [
        { id: 'same', type: 'run', command: ['true'] },
        { id: 'same', type: 'run', command: ['false'] },
      ],
    });
    expect(result.success).toBe(false);
    expect(result.error?.issues.map(issue => issue.message)).toEqual(['Duplicate step id: same']);
  });

  it('should require exactly one chdir target', () => {
    const result = InstallPlanSchema.safeParse({
      steps: [{ id: 'cd', type: 'chdir', path: 'a', previous: true }],
    });
    expect(result.error?.issues.map(issue => issue.message)).toEqual([
      'chdir step needs exactly one of path, fromCommand or previous',
    ]);
  });
});

describe('PatchArtifactSchema', () => {
  it('should require at least one replacement and a positive version', () => {
    expect(PatchArtifactSchema.safeParse({ id: 'p', version: 1, target: 'f', replacements: [] }).success).toBe(false);
    expect(
      PatchArtifactSchema.safeParse({ id: 'p', version: 0, target: 'f', replacements: [{ find: 'a', replace: 'b' }] })
        .success
    ).toBe(false);
  });
});

describe('parseInstallPlan', () => {
  it('should report schema errors as invalid plans', () => {
    expect(() => parseInstallPlan({ steps: 'nope' })).toThrow(/^Invalid install plan <inline>:/);
  });
});

describe('loadInstallPlan', () => {
  it('should load a plan and remember its directory', async () => {
    const loaded = await loadInstallPlan(resolve(fixtures, 'valid-plan.yml'));

    expect(loaded.path).toBe(resolve(fixtures, 'valid-plan.yml'));
    expect(loaded.baseDir).toBe(fixtures);
    expect(loaded.plan.name).toBe('fixture-plan');
    expect(loaded.plan.env).toEqual({ PIP_NO_INPUT: '1' });
    expect(loaded.plan.steps.map(step => step.id)).toEqual(['hello', 'gpl', 'patch']);
  });

  it('should reject guards on undeclared flags', async () => {
    await expect(loadInstallPlan(resolve(fixtures, 'undeclared-flag.yml'))).rejects.toMatchObject({
      code: InstallErrorCode.PLAN_INVALID,
      message: 'Step gpl references undeclared flag(s): gplOk',
    });
  });

  it('should report YAML syntax errors', async () => {
    await expect(loadInstallPlan(resolve(fixtures, 'malformed.yml'))).rejects.toMatchObject({
      code: InstallErrorCode.PLAN_INVALID,
    });
  });

  it('should report missing files', async () => {
    await expect(loadInstallPlan(resolve(fixtures, 'absent.yml'))).rejects.toMatchObject({
      code: InstallErrorCode.PLAN_NOT_FOUND,
    });
  });
});

describe('loadPatchArtifact', () => {
  it('should load a patch artifact', async () => {
    const artifact = await loadPatchArtifact(resolve(fixtures, 'patches/fixture-patch.yml'));
    expect(artifact).toEqual({
      id: 'fixture-patch',
      version: 3,
      target: 'config.txt',
      replacements: [{ find: 'debug = false', replace: 'debug = true' }],
    });
  });
});
