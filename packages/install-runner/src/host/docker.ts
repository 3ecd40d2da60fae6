/**
 * Docker host implementation
 *
 * Runs install steps in a disposable container, which makes it possible to
 * try a plan against a clean base image before running it for real.
 */

import Docker from 'dockerode';
import { posix } from 'path';
import type { DockerOptions } from '../config/index.js';
import type { Host, CommandOptions, CommandResult } from './index.js';
import { formatPipeline } from '../shared/argv.js';
import { InstallError, InstallErrorCode, errorMessage } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';

/** Mount point and initial working directory inside the container */
export const CONTAINER_WORKDIR = '/workspace';

const HEADER_SIZE = 8;

export type DockerStreamType = 'stdout' | 'stderr';

/**
 * Splits a multiplexed Docker exec stream into stdout and stderr payloads.
 *
 * Frames are `[type (1 byte)][reserved (3 bytes)][size (4 bytes, BE)][payload]`
 * and may be split across chunks arbitrarily, so incomplete frames are
 * buffered until the rest arrives.
 */
export class DockerStreamDemuxer {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly onFrame: (type: DockerStreamType, payload: Buffer) => void) {}

  push(chunk: Buffer): void {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    while (this.buffer.length >= HEADER_SIZE) {
      const streamType = this.buffer[0];
      const payloadSize = this.buffer.readUInt32BE(4);
      if (this.buffer.length < HEADER_SIZE + payloadSize) {
        // Incomplete payload, wait for more data
        break;
      }

      const payload = this.buffer.subarray(HEADER_SIZE, HEADER_SIZE + payloadSize);
      this.buffer = this.buffer.subarray(HEADER_SIZE + payloadSize);

      if (streamType === 1) {
        this.onFrame('stdout', payload);
      } else if (streamType === 2) {
        this.onFrame('stderr', payload);
      }
    }
  }

  /** Bytes of an unfinished frame still waiting for data */
  get pending(): number {
    return this.buffer.length;
  }
}

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Docker host that executes commands in a container
 */
export class DockerHost implements Host {
  readonly name: string;
  private docker: Docker;
  private container: Docker.Container | null = null;
  private options: DockerOptions;
  private logger: Logger;

  constructor(options: DockerOptions, logger: Logger, docker?: Docker) {
    this.options = options;
    this.logger = logger;
    this.docker = docker ?? new Docker();
    this.name = `docker:${options.image}`;
  }

  getInitialDirectory(): string {
    return CONTAINER_WORKDIR;
  }

  async initialize(): Promise<void> {
    try {
      await this.ensureImage();

      const containerConfig: Docker.ContainerCreateOptions = {
        Image: this.options.image,
        Cmd: ['tail', '-f', '/dev/null'], // Keep container running
        WorkingDir: CONTAINER_WORKDIR,
        HostConfig: {
          AutoRemove: false, // We'll manage cleanup ourselves
          Binds: this.options.mount ? [`${this.options.mount}:${CONTAINER_WORKDIR}`] : undefined,
        },
      };

      this.container = await this.docker.createContainer(containerConfig);
      await this.container.start();
      this.logger.debug(`Started container ${this.container.id.slice(0, 12)} from ${this.options.image}`);
    } catch (error) {
      if (error instanceof InstallError) throw error;
      throw new InstallError(
        InstallErrorCode.HOST_UNAVAILABLE,
        `Could not start a container from ${this.options.image}: ${errorMessage(error)}`
      );
    }
  }

  private async ensureImage(): Promise<void> {
    try {
      await this.docker.getImage(this.options.image).inspect();
      return;
    } catch (error) {
      if (statusCodeOf(error) !== 404) {
        throw error;
      }
    }

    this.logger.info(`Docker image ${this.options.image} not found locally, pulling...`);
    const stream: NodeJS.ReadableStream = await this.docker.pull(this.options.image);
    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (error: Error | null) => (error ? reject(error) : resolve()));
    });
  }

  private requireContainer(): Docker.Container {
    if (!this.container) {
      throw new InstallError(InstallErrorCode.HOST_UNAVAILABLE, 'Container not initialized. Call initialize() first.');
    }
    return this.container;
  }

  async executeCommand(argv: readonly string[], options: CommandOptions): Promise<CommandResult> {
    const container = this.requireContainer();

    const envVars = Object.entries(options.env).map(([key, value]) => `${key}=${value}`);
    const exec = await container.exec({
      Cmd: [...argv],
      WorkingDir: options.cwd,
      Env: envVars.length > 0 ? envVars : undefined,
      AttachStdout: true,
      AttachStderr: true,
    });
    const stream = await exec.start({ hijack: true, stdin: false });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    const demuxer = new DockerStreamDemuxer((type, payload) => {
      if (options.capture) {
        (type === 'stdout' ? stdoutChunks : stderrChunks).push(payload);
      } else {
        (type === 'stdout' ? process.stdout : process.stderr).write(payload);
      }
    });

    await new Promise<void>((resolve, reject) => {
      stream.on('data', (chunk: Buffer) => demuxer.push(chunk));
      stream.on('end', resolve);
      stream.on('error', reject);
    });

    const inspect = await exec.inspect();
    return {
      exitCode: inspect.ExitCode ?? 1,
      stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
      stderr: Buffer.concat(stderrChunks).toString('utf-8'),
    };
  }

  async executePipeline(
    commands: readonly (readonly string[])[],
    options: CommandOptions
  ): Promise<CommandResult> {
    // Exec has no pipes of its own; bash provides them along with pipefail
    return this.executeCommand(['bash', '-o', 'pipefail', '-c', formatPipeline(commands)], options);
  }

  private async run(argv: string[]): Promise<CommandResult> {
    return this.executeCommand(argv, { cwd: CONTAINER_WORKDIR, env: {}, capture: true });
  }

  async readFile(path: string): Promise<string> {
    const result = await this.run(['cat', path]);
    if (result.exitCode !== 0) {
      throw new Error(`Failed to read ${path} in container: ${result.stderr.trim()}`);
    }
    return result.stdout;
  }

  async writeFile(path: string, contents: string): Promise<void> {
    // Contents travel base64-encoded as an argument
    const encoded = Buffer.from(contents, 'utf-8').toString('base64');
    const result = await this.run([
      'sh',
      '-c',
      'mkdir -p "$1" && printf %s "$2" | base64 -d > "$3"',
      'sh',
      posix.dirname(path),
      encoded,
      path,
    ]);
    if (result.exitCode !== 0) {
      throw new Error(`Failed to write ${path} in container: ${result.stderr.trim()}`);
    }
  }

  async fileExists(path: string): Promise<boolean> {
    const result = await this.run(['test', '-e', path]);
    return result.exitCode === 0;
  }

  async isDirectory(path: string): Promise<boolean> {
    const result = await this.run(['test', '-d', path]);
    return result.exitCode === 0;
  }

  async cleanup(): Promise<void> {
    if (!this.container) {
      return;
    }

    if (this.options.keepContainer) {
      this.logger.info(`Container preserved: ${this.container.id.slice(0, 12)}`);
      this.container = null;
      return;
    }

    try {
      await this.container.stop({ t: 0 });
      await this.container.remove();
    } catch (error) {
      // Container might already be stopped/removed
      const status = statusCodeOf(error);
      if (status !== 404 && status !== 304 && status !== 409) {
        this.logger.warn(`Error cleaning up container: ${errorMessage(error)}`);
      }
    }
    this.container = null;
  }
}
