/**
 * Step execution logic
 *
 * A straight-line interpreter over a static step list: each step runs in
 * order, the first fatal failure ends the run.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { resolve } from 'path';
import type {
  InstallPlan,
  InstallStep,
  StepType,
  RunCommand,
  PipelineCommand,
  RetryableCommand,
  ChdirStep,
  RetryStep,
  PatchStep,
  PatchArtifact,
} from '../dsl/index.js';
import { loadPatchArtifact } from '../dsl/loader.js';
import type { SudoMode } from '../config/index.js';
import { evaluateGuard, describeGuard } from '../guards/index.js';
import type { Host } from '../host/index.js';
import { resolveHostPath } from '../host/pathUtils.js';
import { applyPatchArtifact } from '../patches/index.js';
import { formatArgv, formatPipeline } from '../shared/argv.js';
import { InstallError, InstallErrorCode, errorMessage } from '../shared/errors.js';
import { createConsoleLogger } from '../shared/logger.js';
import type { Logger } from '../shared/logger.js';

export const SUDO_PATH = '/usr/bin/sudo';
export const DEFAULT_RETRY_DELAY_MS = 1000;

export type StepStatus = 'succeeded' | 'skipped' | 'tolerated' | 'failed';

/**
 * Result of executing a single step
 */
export interface StepResult {
  /** 1-based position in the plan */
  index: number;
  stepId: string;
  type: StepType;
  status: StepStatus;
  /** Why a skipped step did not run */
  skipReason?: 'guard' | 'opt-in';
  /** Exit status of the command, when one ran */
  exitCode?: number;
  /** Attempts made by a retry step */
  attempts?: number;
  /** Error message if the step failed */
  error?: string;
  durationMs: number;
}

/**
 * The step that ended a run
 */
export interface RunFailure {
  index: number;
  stepId: string;
  /** Command line of the failing step */
  command: string;
  exitCode: number;
  code: InstallErrorCode;
  message: string;
}

/**
 * Result of executing a plan
 */
export interface RunResult {
  planName?: string;
  success: boolean;
  /** 0 on success, otherwise the failing step's exit status */
  exitCode: number;
  stepResults: StepResult[];
  failure?: RunFailure;
  /** Working directory after the last executed step */
  workingDirectory: string;
}

/**
 * State the runner carries between steps
 */
export interface ExecutionContext {
  workingDirectory: string;
  /** Directory that was current before the most recent chdir */
  previousDirectory?: string;
  /** Read-only environment snapshot taken at start */
  readonly env: Readonly<Record<string, string>>;
}

export interface RunnerOptions {
  /** Resolved plan flags */
  flags: Readonly<Record<string, boolean>>;
  /** Environment snapshot guards are evaluated against */
  env: Readonly<Record<string, string>>;
  /** Ids or groups of opt-in steps to run */
  enabledSteps?: readonly string[];
  sudo?: SudoMode;
  /** Directory patch references are resolved against */
  baseDir?: string;
  /** Walk the plan without touching the host */
  dryRun?: boolean;
  logger?: Logger;
  /** Wait between retry attempts */
  sleep?: (ms: number) => Promise<void>;
  loadPatch?: (path: string) => Promise<PatchArtifact>;
}

interface StepOutcome {
  exitCode?: number;
  attempts?: number;
}

/**
 * Executes an install plan on a host
 */
export class InstallRunner {
  private plan: InstallPlan;
  private host: Host;
  private options: RunnerOptions;
  private logger: Logger;
  private enabledSteps: ReadonlySet<string>;
  private context: ExecutionContext;
  private sudoAvailable = false;

  constructor(plan: InstallPlan, host: Host, options: RunnerOptions) {
    this.plan = plan;
    this.host = host;
    this.options = options;
    this.logger = options.logger ?? createConsoleLogger();
    this.enabledSteps = new Set(options.enabledSteps ?? []);
    this.context = { workingDirectory: host.getInitialDirectory(), env: options.env };

    const unknown = [...this.enabledSteps].filter(
      name => !plan.steps.some(step => step.id === name || step.group === name)
    );
    if (unknown.length > 0) {
      throw new InstallError(InstallErrorCode.CONFIG_INVALID, `Cannot enable unknown step(s): ${unknown.join(', ')}`);
    }
  }

  getContext(): Readonly<ExecutionContext> {
    return this.context;
  }

  /**
   * Execute all steps in the plan
   */
  async execute(): Promise<RunResult> {
    const stepResults: StepResult[] = [];
    this.context = { workingDirectory: this.host.getInitialDirectory(), env: this.options.env };
    this.sudoAvailable = await this.detectSudo();

    const total = this.plan.steps.length;
    for (const [position, step] of this.plan.steps.entries()) {
      const index = position + 1;
      const startedAt = Date.now();
      const base = { index, stepId: step.id, type: step.type };

      const skipReason = this.skipReason(step);
      if (skipReason) {
        this.logger.debug(
          `Skipping step ${index}/${total} ${step.id}` +
            (skipReason === 'guard' && step.guard ? `: ${describeGuard(step.guard)} is false` : ': opt-in step not enabled')
        );
        stepResults.push({ ...base, status: 'skipped', skipReason, durationMs: 0 });
        continue;
      }

      this.logger.info(`Step ${index}/${total}: ${step.description ?? step.id}`);

      if (this.options.dryRun) {
        this.logger.info(`  would run: ${this.describeStep(step)}`);
        this.trackDryRunDirectory(step);
        stepResults.push({ ...base, status: 'succeeded', durationMs: 0 });
        continue;
      }

      try {
        const outcome = await this.executeStep(step);
        stepResults.push({ ...base, status: 'succeeded', ...outcome, durationMs: Date.now() - startedAt });
      } catch (error) {
        const exitCode = error instanceof InstallError && error.exitCode !== undefined ? error.exitCode : 1;
        const attempts = error instanceof InstallError ? numberFrom(error.context?.attempts) : undefined;
        const message = errorMessage(error);

        if (step.continueOnError) {
          this.logger.warn(`Step ${index} (${step.id}) failed with exit status ${exitCode}, continuing: ${message}`);
          stepResults.push({
            ...base,
            status: 'tolerated',
            exitCode,
            attempts,
            error: message,
            durationMs: Date.now() - startedAt,
          });
          continue;
        }

        const command = this.describeStep(step);
        this.logger.error(`Step ${index} (${step.id}) failed with exit status ${exitCode}: ${command}`);
        if (!(error instanceof InstallError && error.code === InstallErrorCode.STEP_FAILED)) {
          this.logger.error(message);
        }
        stepResults.push({
          ...base,
          status: 'failed',
          exitCode,
          attempts,
          error: message,
          durationMs: Date.now() - startedAt,
        });

        return {
          planName: this.plan.name,
          success: false,
          exitCode: exitCode === 0 ? 1 : exitCode,
          stepResults,
          failure: {
            index,
            stepId: step.id,
            command,
            exitCode,
            code: error instanceof InstallError ? error.code : InstallErrorCode.STEP_FAILED,
            message,
          },
          workingDirectory: this.context.workingDirectory,
        };
      }
    }

    this.logger.debug(
      `Finished ${this.plan.name ?? 'plan'}: ${stepResults.filter(r => r.status !== 'skipped').length} run, ` +
        `${stepResults.filter(r => r.status === 'skipped').length} skipped`
    );

    return {
      planName: this.plan.name,
      success: true,
      exitCode: 0,
      stepResults,
      workingDirectory: this.context.workingDirectory,
    };
  }

  private skipReason(step: InstallStep): StepResult['skipReason'] {
    const enabled = this.enabledSteps.has(step.id) || (step.group !== undefined && this.enabledSteps.has(step.group));
    if (step.optIn && !enabled) {
      return 'opt-in';
    }
    if (!evaluateGuard(step.guard, { flags: this.options.flags, env: this.context.env })) {
      return 'guard';
    }
    return undefined;
  }

  private async detectSudo(): Promise<boolean> {
    const mode = this.options.sudo ?? 'auto';
    if (mode !== 'auto') {
      return mode === 'always';
    }
    if (this.options.dryRun) {
      return true;
    }
    const available = await this.host.fileExists(SUDO_PATH);
    if (!available) {
      this.logger.debug(`No ${SUDO_PATH} on ${this.host.name}; sudo steps run without it`);
    }
    return available;
  }

  /**
   * Execute a single step
   */
  private async executeStep(step: InstallStep): Promise<StepOutcome> {
    switch (step.type) {
      case 'run':
      case 'pipeline':
        return await this.executeCommandStep(step);
      case 'chdir':
        await this.executeChdirStep(step);
        return {};
      case 'retry':
        return await this.executeRetryStep(step);
      case 'patch':
        await this.executePatchStep(step);
        return {};
    }
  }

  private withSudo(argv: readonly string[], sudo: boolean | undefined): string[] {
    return sudo && this.sudoAvailable ? ['sudo', ...argv] : [...argv];
  }

  private commandLine(command: RetryableCommand): string {
    if (command.type === 'run') {
      return formatArgv(this.withSudo(command.command, command.sudo));
    }
    return formatPipeline(command.commands.map(argv => this.withSudo(argv, command.sudo)));
  }

  /**
   * Run a command once and return its exit status
   */
  private async runCommand(command: RunCommand | PipelineCommand): Promise<number> {
    const options = {
      cwd: this.context.workingDirectory,
      env: { ...(this.plan.env ?? {}), ...(command.env ?? {}) },
    };

    this.logger.trace(this.commandLine(command));

    if (command.type === 'run') {
      const result = await this.host.executeCommand(this.withSudo(command.command, command.sudo), options);
      return result.exitCode;
    }

    const commands = command.commands.map(argv => this.withSudo(argv, command.sudo));
    const result = await this.host.executePipeline(commands, options);
    return result.exitCode;
  }

  /**
   * Execute a run or pipeline step
   */
  private async executeCommandStep(command: RunCommand | PipelineCommand): Promise<StepOutcome> {
    const exitCode = await this.runCommand(command);
    if (exitCode !== 0) {
      throw new InstallError(InstallErrorCode.STEP_FAILED, `Command exited with ${exitCode}: ${this.commandLine(command)}`, {
        exitCode,
      });
    }
    return { exitCode };
  }

  /**
   * Execute a retry step
   */
  private async executeRetryStep(step: RetryStep): Promise<StepOutcome> {
    const delayMs = step.delayMs ?? DEFAULT_RETRY_DELAY_MS;
    const sleep = this.options.sleep ?? ((ms: number) => delay(ms));
    let exitCode = 0;

    for (let attempt = 1; attempt <= step.attempts; attempt++) {
      exitCode = await this.runCommand(step.step);
      if (exitCode === 0) {
        if (attempt > 1) {
          this.logger.info(`Step ${step.id} succeeded on attempt ${attempt}/${step.attempts}`);
        }
        return { exitCode, attempts: attempt };
      }

      if (attempt < step.attempts) {
        this.logger.warn(
          `Attempt ${attempt}/${step.attempts} of ${step.id} exited with ${exitCode}; retrying in ${delayMs}ms`
        );
        await sleep(delayMs);
      }
    }

    throw new InstallError(
      InstallErrorCode.RETRY_EXHAUSTED,
      `All ${step.attempts} attempts failed, last exit status ${exitCode}: ${this.commandLine(step.step)}`,
      { exitCode, context: { attempts: step.attempts } }
    );
  }

  /**
   * Execute a chdir step
   */
  private async executeChdirStep(step: ChdirStep): Promise<void> {
    const current = this.context.workingDirectory;
    let target: string;

    if (step.previous) {
      if (this.context.previousDirectory === undefined) {
        throw new InstallError(InstallErrorCode.CHDIR_FAILED, 'No previous directory to return to', { exitCode: 1 });
      }
      target = this.context.previousDirectory;
    } else if (step.fromCommand) {
      this.logger.trace(formatArgv(step.fromCommand));
      const result = await this.host.executeCommand(step.fromCommand, {
        cwd: current,
        env: this.plan.env ?? {},
        capture: true,
      });
      if (result.exitCode !== 0) {
        throw new InstallError(
          InstallErrorCode.CHDIR_FAILED,
          `Directory lookup exited with ${result.exitCode}: ${result.stderr.trim()}`,
          { exitCode: result.exitCode }
        );
      }
      const output = result.stdout.trim();
      if (!output) {
        throw new InstallError(InstallErrorCode.CHDIR_FAILED, 'Directory lookup printed nothing', { exitCode: 1 });
      }
      target = resolveHostPath(output, current);
    } else if (step.path !== undefined) {
      target = resolveHostPath(step.path, current);
    } else {
      throw new InstallError(InstallErrorCode.PLAN_INVALID, `chdir step ${step.id} has no target`, { exitCode: 1 });
    }

    this.logger.trace(`cd ${formatArgv([target])}`);
    if (!(await this.host.isDirectory(target))) {
      throw new InstallError(InstallErrorCode.CHDIR_FAILED, `No such directory: ${target}`, { exitCode: 1 });
    }

    this.context.previousDirectory = current;
    this.context.workingDirectory = target;
  }

  /**
   * Execute a patch step
   */
  private async executePatchStep(step: PatchStep): Promise<void> {
    const patchPath = resolve(this.options.baseDir ?? process.cwd(), step.patch);
    const load = this.options.loadPatch ?? loadPatchArtifact;
    const artifact = await load(patchPath);

    this.logger.trace(`patch ${artifact.id} v${artifact.version} -> ${artifact.target}`);
    const result = await applyPatchArtifact(this.host, artifact, this.context.workingDirectory);

    if (result.changed) {
      this.logger.info(`Patched ${result.targetPath} (${artifact.id} v${artifact.version})`);
    } else {
      this.logger.info(`Patch ${artifact.id} v${artifact.version} already applied to ${result.targetPath}`);
    }
  }

  /**
   * Command line shown in traces, dry runs and failure reports
   */
  describeStep(step: InstallStep): string {
    switch (step.type) {
      case 'run':
      case 'pipeline':
        return this.commandLine(step);
      case 'chdir':
        if (step.previous) return 'cd -';
        if (step.fromCommand) return `cd "$(${formatArgv(step.fromCommand)})"`;
        return `cd ${formatArgv([step.path ?? ''])}`;
      case 'retry':
        return `retry ${step.attempts}x: ${this.commandLine(step.step)}`;
      case 'patch':
        return `patch ${step.patch}`;
    }
  }

  private trackDryRunDirectory(step: InstallStep): void {
    if (step.type !== 'chdir') return;
    const current = this.context.workingDirectory;
    let target: string | undefined;
    if (step.previous) {
      target = this.context.previousDirectory;
    } else if (step.path !== undefined) {
      target = resolveHostPath(step.path, current);
    }
    // fromCommand targets are only known once the command runs
    if (target === undefined) return;
    this.context.previousDirectory = current;
    this.context.workingDirectory = target;
  }
}

function numberFrom(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}
