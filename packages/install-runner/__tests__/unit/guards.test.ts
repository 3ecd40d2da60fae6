import { describe, it, expect } from 'vitest';
import { evaluateGuard, describeGuard, guardFlags } from '../../src/guards/index.js';
import type { GuardScope } from '../../src/guards/index.js';
import { InstallError, InstallErrorCode } from '../../src/shared/errors.js';

const scope: GuardScope = {
  flags: { gplOk: true, gpu: false },
  env: { CUDA_VERSION: '11.8', EMPTY: '' },
};

describe('evaluateGuard', () => {
  it('should hold when there is no guard', () => {
    expect(evaluateGuard(undefined, scope)).toBe(true);
  });

  it('should read flags', () => {
    expect(evaluateGuard({ flag: 'gplOk' }, scope)).toBe(true);
    expect(evaluateGuard({ flag: 'gpu' }, scope)).toBe(false);
  });

  it('should compare environment values exactly', () => {
    expect(evaluateGuard({ env: 'CUDA_VERSION', equals: '11.8' }, scope)).toBe(true);
    expect(evaluateGuard({ env: 'CUDA_VERSION', equals: '11' }, scope)).toBe(false);
    expect(evaluateGuard({ env: 'MISSING', equals: '' }, scope)).toBe(false);
  });

  it('should treat empty variables as unset', () => {
    expect(evaluateGuard({ env: 'CUDA_VERSION', set: true }, scope)).toBe(true);
    expect(evaluateGuard({ env: 'EMPTY', set: true }, scope)).toBe(false);
    expect(evaluateGuard({ env: 'MISSING', set: false }, scope)).toBe(true);
  });

  it('should combine guards', () => {
    expect(evaluateGuard({ all: [{ flag: 'gplOk' }, { flag: 'gpu' }] }, scope)).toBe(false);
    expect(evaluateGuard({ any: [{ flag: 'gplOk' }, { flag: 'gpu' }] }, scope)).toBe(true);
    expect(evaluateGuard({ not: { flag: 'gpu' } }, scope)).toBe(true);
  });

  it('should reject undeclared flags', () => {
    try {
      evaluateGuard({ flag: 'typo' }, scope);
      expect.unreachable('undeclared flag should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(InstallError);
      expect(error).toMatchObject({
        code: InstallErrorCode.CONFIG_INVALID,
        message: 'Guard references undeclared flag: typo',
      });
    }
  });
});

describe('describeGuard', () => {
  it('should render nested guards', () => {
    expect(
      describeGuard({
        all: [{ flag: 'gpu' }, { not: { env: 'CUDA_VERSION', equals: '12.1' } }, { env: 'HOME', set: false }],
      })
    ).toBe('(flag gpu and not CUDA_VERSION == "12.1" and HOME is unset)');
  });
});

describe('guardFlags', () => {
  it('should collect flags from nested guards', () => {
    expect(
      guardFlags({ any: [{ flag: 'a' }, { not: { all: [{ flag: 'b' }, { env: 'X', set: true }] } }] })
    ).toEqual(['a', 'b']);
  });
});
