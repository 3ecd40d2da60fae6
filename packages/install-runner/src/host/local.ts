/**
 * Local host implementation
 *
 * Executes install steps directly on this machine.
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import { constants } from 'os';
import { spawn } from 'child_process';
import type { ChildProcess, StdioOptions } from 'child_process';
import type { Host, CommandOptions, CommandResult } from './index.js';
import { pipefailStatus } from '../shared/argv.js';
import { InstallError, InstallErrorCode } from '../shared/errors.js';

/** Status a shell reports when the program does not exist */
export const EXIT_NOT_FOUND = 127;
/** Status a shell reports when the program exists but cannot be executed */
export const EXIT_NOT_EXECUTABLE = 126;

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Map how a process ended to the status a shell would report
 */
export function exitStatus(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }
  if (signal !== null) {
    return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
  }
  return 1;
}

/**
 * Wait for a child to end. Spawn failures resolve to the shell's
 * "not found" / "not executable" statuses instead of rejecting.
 */
function waitForExit(child: ChildProcess, argv: readonly string[], stderr: string[]): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    let settled = false;

    child.once('error', (error) => {
      if (settled) return;
      settled = true;
      if (isErrnoException(error) && error.code === 'ENOENT') {
        stderr.push(`${argv[0]}: command not found\n`);
        resolve(EXIT_NOT_FOUND);
      } else if (isErrnoException(error) && error.code === 'EACCES') {
        stderr.push(`${argv[0]}: permission denied\n`);
        resolve(EXIT_NOT_EXECUTABLE);
      } else {
        reject(error);
      }
    });

    child.once('close', (code, signal) => {
      if (settled) return;
      settled = true;
      resolve(exitStatus(code, signal));
    });
  });
}

/**
 * Local host that executes commands directly on this machine
 */
export class LocalHost implements Host {
  readonly name = 'local';
  private initialDirectory: string;
  private baseEnv: NodeJS.ProcessEnv;

  constructor(initialDirectory?: string, baseEnv: NodeJS.ProcessEnv = process.env) {
    this.initialDirectory = initialDirectory ?? process.cwd();
    this.baseEnv = { ...baseEnv };
  }

  getInitialDirectory(): string {
    return this.initialDirectory;
  }

  async initialize(): Promise<void> {
    if (!(await this.isDirectory(this.initialDirectory))) {
      throw new InstallError(
        InstallErrorCode.HOST_UNAVAILABLE,
        `Working directory does not exist: ${this.initialDirectory}`
      );
    }
  }

  async executeCommand(argv: readonly string[], options: CommandOptions): Promise<CommandResult> {
    return this.executePipeline([argv], options);
  }

  async executePipeline(
    commands: readonly (readonly string[])[],
    options: CommandOptions
  ): Promise<CommandResult> {
    const capture = options.capture ?? false;
    const stdoutChunks: Buffer[] = [];
    const stderrMessages: string[] = [];
    const stderrChunks: Buffer[] = [];
    let pipeError: Error | undefined;

    const children: ChildProcess[] = [];
    const exits: Promise<number>[] = [];

    commands.forEach((argv, index) => {
      const isFirst = index === 0;
      const isLast = index === commands.length - 1;
      const stdio: StdioOptions = [
        isFirst ? (capture ? 'ignore' : 'inherit') : 'pipe',
        isLast && !capture ? 'inherit' : 'pipe',
        capture ? 'pipe' : 'inherit',
      ];

      const child = spawn(argv[0], argv.slice(1), {
        cwd: options.cwd,
        env: { ...this.baseEnv, ...options.env },
        stdio,
      });

      const previous = children[index - 1];
      if (previous?.stdout && child.stdin) {
        const upstream = previous.stdout;
        // Closing our end of the upstream pipe once the reader is gone lets a
        // writer still producing output die of SIGPIPE
        const releaseUpstream = () => {
          upstream.destroy();
        };
        // The reader exiting early (e.g. `head`) closes the pipe; that is not an error
        child.stdin.on('error', (error) => {
          if (!(isErrnoException(error) && error.code === 'EPIPE')) {
            pipeError = error;
          }
          releaseUpstream();
        });
        child.stdin.on('close', releaseUpstream);
        upstream.pipe(child.stdin);
      }

      if (capture) {
        child.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));
        if (isLast) {
          child.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
        }
      }

      children.push(child);
      exits.push(waitForExit(child, argv, stderrMessages));
    });

    const exitCodes = await Promise.all(exits);
    if (pipeError) {
      throw pipeError;
    }

    if (!capture) {
      for (const message of stderrMessages) {
        process.stderr.write(message);
      }
    }

    return {
      exitCode: pipefailStatus(exitCodes),
      stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
      stderr: Buffer.concat(stderrChunks).toString('utf-8') + stderrMessages.join(''),
    };
  }

  async readFile(path: string): Promise<string> {
    return await fs.readFile(path, 'utf-8');
  }

  async writeFile(path: string, contents: string): Promise<void> {
    await fs.mkdir(dirname(path), { recursive: true });
    await fs.writeFile(path, contents, 'utf-8');
  }

  async fileExists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  async isDirectory(path: string): Promise<boolean> {
    try {
      const stats = await fs.stat(path);
      return stats.isDirectory();
    } catch {
      return false;
    }
  }

  async cleanup(): Promise<void> {
    // Nothing to release: installs on the local host are the point of the run
  }
}
