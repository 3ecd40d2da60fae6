/**
 * DSL types and schema
 *
 * Defines the structure of an install plan: an ordered, static list of steps.
 */

/**
 * Boolean condition gating whether a step executes.
 * Evaluated over the resolved runner configuration, never over ambient state.
 */
export type Guard =
  | FlagGuard
  | EnvEqualsGuard
  | EnvSetGuard
  | AllGuard
  | AnyGuard
  | NotGuard;

/** True when the named plan flag resolved to true */
export interface FlagGuard {
  flag: string;
}

/** True when the environment snapshot holds exactly this value */
export interface EnvEqualsGuard {
  env: string;
  equals: string;
}

/** True when the variable is (or is not) set to a non-empty value */
export interface EnvSetGuard {
  env: string;
  set: boolean;
}

export interface AllGuard {
  all: Guard[];
}

export interface AnyGuard {
  any: Guard[];
}

export interface NotGuard {
  not: Guard;
}

/**
 * Base properties shared by all steps
 */
interface BaseStep {
  /** Unique identifier for this step */
  id: string;
  /** Human-readable description of what this step does */
  description?: string;
  /** Condition that must hold for the step to run (default: always) */
  guard?: Guard;
  /** Log a non-zero exit and keep going instead of aborting (default: false) */
  continueOnError?: boolean;
  /** Documented manual step, only run when enabled by id or group (default: false) */
  optIn?: boolean;
  /** Name that enables a set of opt-in steps together */
  group?: string;
}

/**
 * Options shared by the commands that spawn processes
 */
interface CommandOptions {
  /** Variables set for this command only */
  env?: Record<string, string>;
  /** Prefix with sudo when the host has it */
  sudo?: boolean;
}

/**
 * A single program with arguments, run without a shell
 */
export interface RunCommand extends CommandOptions {
  type: 'run';
  /** Program followed by its arguments */
  command: string[];
}

/**
 * Programs whose stdout feeds the next one's stdin.
 * Fails when any member exits non-zero.
 */
export interface PipelineCommand extends CommandOptions {
  type: 'pipeline';
  commands: string[][];
}

/**
 * Command that a retry wrapper repeats
 */
export type RetryableCommand = RunCommand | PipelineCommand;

export interface RunStep extends BaseStep, RunCommand {}

export interface PipelineStep extends BaseStep, PipelineCommand {}

/**
 * Step that changes the working directory for all later steps.
 * Exactly one of `path`, `fromCommand` or `previous` is given.
 */
export interface ChdirStep extends BaseStep {
  type: 'chdir';
  /** Target directory, relative to the current one or absolute */
  path?: string;
  /** Command whose trimmed stdout names the target directory */
  fromCommand?: string[];
  /** Return to the directory that was current before the last chdir */
  previous?: boolean;
}

/**
 * Step that repeats a command until it exits zero
 */
export interface RetryStep extends BaseStep {
  type: 'retry';
  /** Maximum number of attempts */
  attempts: number;
  /** Delay between attempts in milliseconds (default: 1000) */
  delayMs?: number;
  step: RetryableCommand;
}

/**
 * Step that applies a versioned patch artifact to an installed file
 */
export interface PatchStep extends BaseStep {
  type: 'patch';
  /** Path to the patch artifact, relative to the plan file */
  patch: string;
}

/**
 * Union type of all possible install steps
 */
export type InstallStep = RunStep | PipelineStep | ChdirStep | RetryStep | PatchStep;

export type StepType = InstallStep['type'];

/**
 * Named boolean switch resolved from an environment variable
 */
export interface FlagDefinition {
  /** Variable the flag is read from */
  env: string;
  /** Value used when the variable is unset (default: false) */
  default?: boolean;
  description?: string;
}

/**
 * Complete install plan
 */
export interface InstallPlan {
  name?: string;
  description?: string;
  /** Variables overlaid on the process environment for every step */
  env?: Record<string, string>;
  /** Flags available to guards */
  flags?: Record<string, FlagDefinition>;
  /** Steps to execute in order */
  steps: InstallStep[];
}

/**
 * A single text replacement inside a patched file
 */
export interface Replacement {
  find: string;
  replace: string;
  /** Replace every occurrence instead of the first (default: false) */
  all?: boolean;
}

/**
 * Versioned workaround for an upstream bug in an installed package
 */
export interface PatchArtifact {
  id: string;
  version: number;
  description?: string;
  /** Package and version the workaround was written against */
  appliesTo?: {
    package: string;
    version?: string;
  };
  /** File to patch, relative to the working directory */
  target: string;
  replacements: Replacement[];
}

export * from './schemas.js';
