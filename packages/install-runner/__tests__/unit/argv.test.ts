import { describe, it, expect } from 'vitest';
import { quoteArg, formatArgv, formatPipeline, pipefailStatus } from '../../src/shared/argv.js';

describe('quoteArg', () => {
  it('should leave plain words alone', () => {
    expect(quoteArg('pip')).toBe('pip');
    expect(quoteArg('--extra-index-url=https://example.test/whl/cu118/')).toBe(
      '--extra-index-url=https://example.test/whl/cu118/'
    );
  });

  it('should quote empty strings and shell metacharacters', () => {
    expect(quoteArg('')).toBe(`''`);
    expect(quoteArg('gruut[de,es]')).toBe(`'gruut[de,es]'`);
    expect(quoteArg('import site; print(1)')).toBe(`'import site; print(1)'`);
    expect(quoteArg(`it's`)).toBe(`'it'\\''s'`);
  });
});

describe('formatPipeline', () => {
  it('should join members with pipes', () => {
    expect(formatArgv(['apt-key', 'add', '-'])).toBe('apt-key add -');
    expect(
      formatPipeline([
        ['echo', 'deb stable main'],
        ['tee', '/etc/apt/sources.list.d/chrome.list'],
      ])
    ).toBe(`echo 'deb stable main' | tee /etc/apt/sources.list.d/chrome.list`);
  });
});

describe('pipefailStatus', () => {
  it('should be 0 when every member succeeds', () => {
    expect(pipefailStatus([0, 0, 0])).toBe(0);
  });

  it('should report a failure anywhere in the pipeline', () => {
    expect(pipefailStatus([6, 0])).toBe(6);
  });

  it('should prefer the rightmost failure', () => {
    expect(pipefailStatus([1, 0, 141, 0])).toBe(141);
  });
});
