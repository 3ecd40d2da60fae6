/**
 * Runner configuration
 *
 * Everything that varies between runs is resolved here, once, from argv and
 * the environment. Nothing downstream reads process.env directly.
 */

import { fileURLToPath } from 'url';
import { resolve } from 'path';
import type { InstallPlan } from '../dsl/index.js';
import { InstallError, InstallErrorCode } from '../shared/errors.js';

export type SudoMode = 'auto' | 'always' | 'never';

export interface DockerOptions {
  /** Image the disposable container is created from */
  image: string;
  /** Host directory bound at /workspace */
  mount?: string;
  /** Leave the container in place after the run */
  keepContainer: boolean;
}

export interface RunnerConfig {
  planPath: string;
  /** Ids or groups of opt-in steps to run */
  enabledSteps: string[];
  dryRun: boolean;
  verbose: boolean;
  help: boolean;
  sudo: SudoMode;
  /** Initial working directory on the local host (default: process cwd) */
  workingDirectory?: string;
  docker?: DockerOptions;
}

export type Environment = Readonly<Record<string, string | undefined>>;

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off', '']);

/**
 * Location of the plan shipped with the package
 */
export function defaultPlanPath(): string {
  return fileURLToPath(new URL('../../plans/linux-install.yml', import.meta.url));
}

/**
 * Parse a boolean-like variable. Returns undefined when unset.
 */
export function parseBooleanLike(value: string | undefined, name: string): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new InstallError(
    InstallErrorCode.CONFIG_INVALID,
    `${name} must be a boolean-like value (1/0, true/false, yes/no, on/off), got "${value}"`
  );
}

function parseSudoMode(value: string | undefined): SudoMode {
  if (value === undefined || value === '') return 'auto';
  if (value === 'auto' || value === 'always' || value === 'never') return value;
  throw new InstallError(
    InstallErrorCode.CONFIG_INVALID,
    `INSTALL_SUDO must be one of auto, always, never, got "${value}"`
  );
}

function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new InstallError(InstallErrorCode.CONFIG_INVALID, `Missing value for ${flag}`);
  }
  return value;
}

/**
 * Resolve the runner configuration from command-line arguments and environment.
 * Flags override their environment counterparts.
 */
export function resolveConfig(args: string[], env: Environment, cwd: string): RunnerConfig {
  let planPath = env.INSTALL_PLAN ? resolve(cwd, env.INSTALL_PLAN) : undefined;
  const enabledSteps = splitList(env.INSTALL_ENABLE);
  let dryRun = false;
  let verbose = parseBooleanLike(env.INSTALL_VERBOSE, 'INSTALL_VERBOSE') ?? false;
  let help = false;
  let workingDirectory: string | undefined;
  let dockerImage = env.INSTALL_DOCKER_IMAGE || undefined;
  let mount: string | undefined;
  let keepContainer = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--plan':
        planPath = resolve(cwd, takeValue(args, i++, arg));
        break;
      case '--enable':
        enabledSteps.push(...splitList(takeValue(args, i++, arg)));
        break;
      case '--dry-run':
        dryRun = true;
        break;
      case '--verbose':
      case '-v':
        verbose = true;
        break;
      case '--help':
      case '-h':
        help = true;
        break;
      case '--cwd':
        workingDirectory = resolve(cwd, takeValue(args, i++, arg));
        break;
      case '--docker':
        dockerImage = takeValue(args, i++, arg);
        break;
      case '--mount':
        mount = resolve(cwd, takeValue(args, i++, arg));
        break;
      case '--keep-container':
      case '-k':
        keepContainer = true;
        break;
      default:
        throw new InstallError(InstallErrorCode.CONFIG_INVALID, `Unknown argument: ${arg}`);
    }
  }

  if (mount && !dockerImage) {
    throw new InstallError(InstallErrorCode.CONFIG_INVALID, '--mount requires --docker');
  }
  if (workingDirectory && dockerImage) {
    throw new InstallError(
      InstallErrorCode.CONFIG_INVALID,
      '--cwd applies to the local host only; use --mount with --docker'
    );
  }

  return {
    planPath: planPath ?? defaultPlanPath(),
    enabledSteps,
    dryRun,
    verbose,
    help,
    sudo: parseSudoMode(env.INSTALL_SUDO),
    workingDirectory,
    docker: dockerImage ? { image: dockerImage, mount, keepContainer } : undefined,
  };
}

/**
 * Resolve every flag the plan declares from its environment variable
 */
export function resolveFlags(plan: InstallPlan, env: Environment): Record<string, boolean> {
  const flags: Record<string, boolean> = {};
  for (const [name, definition] of Object.entries(plan.flags ?? {})) {
    flags[name] = parseBooleanLike(env[definition.env], definition.env) ?? definition.default ?? false;
  }
  return flags;
}

/**
 * Snapshot of the environment every step sees: the process environment
 * overlaid with the plan's own variables
 */
export function snapshotEnvironment(plan: InstallPlan, env: Environment): Readonly<Record<string, string>> {
  const snapshot: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      snapshot[key] = value;
    }
  }
  return Object.freeze({ ...snapshot, ...(plan.env ?? {}) });
}

export const USAGE = `Usage: install-runner [options]

Runs the bundled install plan when no options are given.

Options:
  --plan <file>         Install plan to run (env: INSTALL_PLAN)
  --enable <id[,id]>    Run these opt-in steps or groups (env: INSTALL_ENABLE)
  --dry-run             Show what would run without executing anything
  --cwd <dir>           Initial working directory on the local host
  --docker <image>      Run inside a disposable container (env: INSTALL_DOCKER_IMAGE)
  --mount <dir>         Bind a host directory at /workspace in the container
  --keep-container, -k  Keep the container after the run
  --verbose, -v         Show debug output (env: INSTALL_VERBOSE)
  --help, -h            Show this help

Environment:
  INSTALL_SUDO          auto (default), always or never
  Plan flags are read from the variables the plan declares (e.g. GPLOK=1).`;
