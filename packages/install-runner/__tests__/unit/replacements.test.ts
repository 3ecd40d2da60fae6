import { describe, it, expect } from 'vitest';
import { applyReplacement, applyReplacements } from '../../src/patches/replacements.js';

describe('applyReplacement', () => {
  it('should replace the first occurrence by default', () => {
    expect(applyReplacement('a a a', { find: 'a', replace: 'b' })).toEqual({ contents: 'b a a', outcome: 'applied' });
  });

  it('should replace every occurrence when asked', () => {
    expect(applyReplacement('a a a', { find: 'a', replace: 'b', all: true })).toEqual({
      contents: 'b b b',
      outcome: 'applied',
    });
  });

  it('should insert replacement text literally', () => {
    expect(applyReplacement('x = 1', { find: '1', replace: '$&$&' }).contents).toBe('x = $&$&');
  });

  it('should recognise a replacement that already happened', () => {
    expect(applyReplacement('if True:', { find: 'with HiddenPrints():', replace: 'if True:' })).toEqual({
      contents: 'if True:',
      outcome: 'already-applied',
    });
  });

  it('should not reapply a replacement that extends its own search text', () => {
    const replacement = {
      find: '"progress": Status.PROGRESS,',
      replace: '"progress": Status.PROGRESS,\n"heartbeat": Status.PROGRESS,',
      all: true,
    };
    const first = applyReplacement('{"progress": Status.PROGRESS,}', replacement);
    expect(first).toEqual({
      contents: '{"progress": Status.PROGRESS,\n"heartbeat": Status.PROGRESS,}',
      outcome: 'applied',
    });
    expect(applyReplacement(first.contents, replacement)).toEqual({ contents: first.contents, outcome: 'already-applied' });
  });

  it('should report text that is not there', () => {
    expect(applyReplacement('unrelated', { find: 'missing', replace: 'other' })).toEqual({
      contents: 'unrelated',
      outcome: 'not-applicable',
    });
  });

  it('should delete text and treat a repeated deletion as already applied', () => {
    const deletion = { find: 'DEBUG = True\n', replace: '' };
    const first = applyReplacement('DEBUG = True\nkeep\n', deletion);
    expect(first).toEqual({ contents: 'keep\n', outcome: 'applied' });
    expect(applyReplacement(first.contents, deletion)).toEqual({ contents: 'keep\n', outcome: 'already-applied' });
  });
});

describe('applyReplacements', () => {
  it('should apply replacements in sequence', () => {
    const result = applyReplacements('one', [
      { find: 'one', replace: 'two' },
      { find: 'two', replace: 'three' },
    ]);
    expect(result).toEqual({ contents: 'three', outcomes: ['applied', 'applied'] });
  });
});
