/**
 * Pure text replacement for patch artifacts
 *
 * Transforms file contents without performing I/O, so the same logic serves
 * every host.
 */

import type { Replacement } from '../dsl/index.js';

export type ReplacementOutcome = 'applied' | 'already-applied' | 'not-applicable';

export interface ReplacementResult {
  contents: string;
  outcomes: ReplacementOutcome[];
}

/**
 * Apply one replacement.
 *
 * When `find` is absent but `replace` is present the replacement counts as
 * already applied, which keeps re-running a plan harmless.
 */
export function applyReplacement(
  contents: string,
  replacement: Replacement
): { contents: string; outcome: ReplacementOutcome } {
  const { find, replace } = replacement;
  // An empty replacement (a deletion) always "occurs", so a missing `find` means it ran
  const alreadyApplied = contents.includes(replace);

  // A replacement that extends its own search text would match again after
  // being applied, so the applied form is checked first
  if (replace.includes(find) && alreadyApplied) {
    return { contents, outcome: 'already-applied' };
  }

  if (contents.includes(find)) {
    const updated = replacement.all
      ? contents.split(find).join(replace)
      : contents.replace(find, () => replace);
    return { contents: updated, outcome: 'applied' };
  }

  if (alreadyApplied) {
    return { contents, outcome: 'already-applied' };
  }

  return { contents, outcome: 'not-applicable' };
}

/**
 * Apply replacements in order, each seeing the result of the previous one
 */
export function applyReplacements(contents: string, replacements: Replacement[]): ReplacementResult {
  let current = contents;
  const outcomes: ReplacementOutcome[] = [];

  for (const replacement of replacements) {
    const result = applyReplacement(current, replacement);
    current = result.contents;
    outcomes.push(result.outcome);
  }

  return { contents: current, outcomes };
}
