/**
 * Command-line driver: configuration, plan loading, host lifecycle
 */

import { resolveConfig, resolveFlags, snapshotEnvironment, USAGE } from './config/index.js';
import type { RunnerConfig } from './config/index.js';
import { loadInstallPlan } from './dsl/loader.js';
import { InstallRunner } from './executor/index.js';
import type { Host } from './host/index.js';
import { LocalHost } from './host/local.js';
import { DockerHost } from './host/docker.js';
import { InstallError, errorMessage } from './shared/errors.js';
import { createConsoleLogger } from './shared/logger.js';
import type { Logger } from './shared/logger.js';

/** Exit status for configuration and plan errors */
export const EXIT_USAGE = 2;

function createHost(config: RunnerConfig, env: NodeJS.ProcessEnv, logger: Logger): Host {
  if (config.docker) {
    return new DockerHost(config.docker, logger);
  }
  return new LocalHost(config.workingDirectory, env);
}

/**
 * Run the installer and return the process exit status
 */
export async function runCli(args: string[], env: NodeJS.ProcessEnv, cwd: string): Promise<number> {
  let config: RunnerConfig;
  try {
    config = resolveConfig(args, env, cwd);
  } catch (error) {
    console.error(`[ERROR] ${errorMessage(error)}`);
    console.error(USAGE);
    return EXIT_USAGE;
  }

  if (config.help) {
    console.log(USAGE);
    return 0;
  }

  const logger = createConsoleLogger({ verbose: config.verbose });
  logger.debug(`Plan file: ${config.planPath}`);
  logger.debug(`Sudo mode: ${config.sudo}`);
  logger.debug(`Enabled opt-in steps: ${config.enabledSteps.join(', ') || '(none)'}`);

  let runner: InstallRunner;
  let host: Host;
  try {
    const { plan, baseDir } = await loadInstallPlan(config.planPath);
    const flags = resolveFlags(plan, env);

    logger.debug(`Plan ${plan.name ?? '(unnamed)'}: ${plan.steps.length} steps`);
    for (const [name, value] of Object.entries(flags)) {
      logger.debug(`Flag ${name} = ${value}`);
    }

    host = createHost(config, env, logger);
    runner = new InstallRunner(plan, host, {
      flags,
      env: snapshotEnvironment(plan, env),
      enabledSteps: config.enabledSteps,
      sudo: config.sudo,
      baseDir,
      dryRun: config.dryRun,
      logger,
    });
  } catch (error) {
    logger.error(errorMessage(error));
    return EXIT_USAGE;
  }

  // A dry run never touches the host, so a container is not even started
  if (config.dryRun) {
    const result = await runner.execute();
    return result.exitCode;
  }

  try {
    await host.initialize();
    const result = await runner.execute();
    return result.exitCode;
  } catch (error) {
    logger.error(`Fatal error during execution: ${errorMessage(error)}`);
    if (config.verbose && error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    return error instanceof InstallError && error.exitCode !== undefined ? error.exitCode : 1;
  } finally {
    await host.cleanup();
  }
}
