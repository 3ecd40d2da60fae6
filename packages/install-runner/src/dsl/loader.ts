/**
 * Reading install plans and patch artifacts from YAML
 */

import { promises as fs } from 'fs';
import { dirname, resolve } from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { InstallPlan, PatchArtifact } from './index.js';
import { InstallPlanSchema, PatchArtifactSchema } from './schemas.js';
import { guardFlags } from '../guards/index.js';
import { InstallError, InstallErrorCode, errorMessage } from '../shared/errors.js';

export interface LoadedPlan {
  plan: InstallPlan;
  /** Absolute path of the plan file */
  path: string;
  /** Directory patch references are resolved against */
  baseDir: string;
}

async function readYaml(path: string, what: string): Promise<unknown> {
  let contents: string;
  try {
    contents = await fs.readFile(path, 'utf-8');
  } catch (error) {
    throw new InstallError(InstallErrorCode.PLAN_NOT_FOUND, `Cannot read ${what} ${path}: ${errorMessage(error)}`, {
      context: { path },
    });
  }

  try {
    return yaml.load(contents);
  } catch (error) {
    throw new InstallError(InstallErrorCode.PLAN_INVALID, `Failed to parse ${what} ${path}: ${errorMessage(error)}`, {
      context: { path },
    });
  }
}

function validationError(path: string, what: string, error: z.ZodError): InstallError {
  return new InstallError(
    InstallErrorCode.PLAN_INVALID,
    `Invalid ${what} ${path}:\n${z.prettifyError(error)}`,
    { context: { path, issues: z.treeifyError(error) } }
  );
}

/**
 * Parse and validate an install plan that is already in memory
 */
export function parseInstallPlan(data: unknown, source = '<inline>'): InstallPlan {
  const result = InstallPlanSchema.safeParse(data);
  if (!result.success) {
    throw validationError(source, 'install plan', result.error);
  }
  const plan = result.data;

  // Undeclared flags are rejected up front so a typo cannot abort a run halfway
  const declared = new Set(Object.keys(plan.flags ?? {}));
  for (const step of plan.steps) {
    const missing = step.guard ? guardFlags(step.guard).filter(flag => !declared.has(flag)) : [];
    if (missing.length > 0) {
      throw new InstallError(
        InstallErrorCode.PLAN_INVALID,
        `Step ${step.id} references undeclared flag(s): ${missing.join(', ')}`,
        { context: { path: source, stepId: step.id } }
      );
    }
  }

  return plan;
}

/**
 * Load and validate an install plan from a YAML file
 */
export async function loadInstallPlan(path: string): Promise<LoadedPlan> {
  const absolutePath = resolve(path);
  const data = await readYaml(absolutePath, 'install plan');
  return {
    plan: parseInstallPlan(data, absolutePath),
    path: absolutePath,
    baseDir: dirname(absolutePath),
  };
}

/**
 * Load and validate a patch artifact from a YAML file
 */
export async function loadPatchArtifact(path: string): Promise<PatchArtifact> {
  const data = await readYaml(path, 'patch artifact');
  const result = PatchArtifactSchema.safeParse(data);
  if (!result.success) {
    throw validationError(path, 'patch artifact', result.error);
  }
  return result.data;
}
