/**
 * Patch artifacts
 *
 * Explicit, versioned replacements for inline edits of installed library
 * sources. Each artifact names the file it targets and the text it swaps.
 */

import type { PatchArtifact } from '../dsl/index.js';
import type { Host } from '../host/index.js';
import { resolveHostPath } from '../host/pathUtils.js';
import { InstallError, InstallErrorCode } from '../shared/errors.js';
import { applyReplacements } from './replacements.js';
import type { ReplacementOutcome } from './replacements.js';

export interface PatchResult {
  /** Absolute path of the patched file */
  targetPath: string;
  /** Outcome of each replacement, in artifact order */
  outcomes: ReplacementOutcome[];
  /** Whether the file was rewritten */
  changed: boolean;
}

/**
 * Apply a patch artifact to its target, resolved against `cwd`.
 * Re-applying an artifact that is already in place changes nothing.
 */
export async function applyPatchArtifact(
  host: Host,
  artifact: PatchArtifact,
  cwd: string
): Promise<PatchResult> {
  const targetPath = resolveHostPath(artifact.target, cwd);

  if (!(await host.fileExists(targetPath))) {
    throw new InstallError(
      InstallErrorCode.PATCH_TARGET_MISSING,
      `Patch ${artifact.id} v${artifact.version}: target not found: ${targetPath}`,
      { exitCode: 1, context: { patchId: artifact.id, targetPath } }
    );
  }

  const original = await host.readFile(targetPath);
  const { contents, outcomes } = applyReplacements(original, artifact.replacements);

  const unmatched = outcomes
    .map((outcome, index) => (outcome === 'not-applicable' ? index : -1))
    .filter(index => index >= 0);
  if (unmatched.length > 0) {
    const first = artifact.replacements[unmatched[0]];
    throw new InstallError(
      InstallErrorCode.PATCH_NOT_APPLICABLE,
      `Patch ${artifact.id} v${artifact.version} does not apply to ${targetPath}: ` +
        `search text not found: ${JSON.stringify(first.find)}` +
        (artifact.appliesTo ? ` (written for ${describeAppliesTo(artifact)})` : ''),
      { exitCode: 1, context: { patchId: artifact.id, targetPath, replacements: unmatched } }
    );
  }

  const changed = contents !== original;
  if (changed) {
    await host.writeFile(targetPath, contents);
  }

  return { targetPath, outcomes, changed };
}

export function describeAppliesTo(artifact: PatchArtifact): string {
  if (!artifact.appliesTo) return 'any version';
  const { package: name, version } = artifact.appliesTo;
  return version ? `${name} ${version}` : name;
}
