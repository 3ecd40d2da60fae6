/**
 * Hosts
 *
 * Where install steps run: the local machine or a disposable container.
 */

/**
 * Result of executing a command on a host
 */
export interface CommandResult {
  /** Exit code of the command (127 when it could not be spawned, 128+n on signal n) */
  exitCode: number;
  /** Standard output, empty unless captured */
  stdout: string;
  /** Standard error, empty unless captured */
  stderr: string;
}

export interface CommandOptions {
  /** Absolute working directory */
  cwd: string;
  /** Variables set on top of the host's own environment */
  env: Readonly<Record<string, string>>;
  /** Collect stdout/stderr instead of streaming them to the terminal */
  capture?: boolean;
}

/**
 * Abstract interface for host implementations
 *
 * This allows swapping between local execution and Docker-based execution
 * without changing the runner logic.
 */
export interface Host {
  /** Short name used in log output */
  readonly name: string;

  /**
   * Prepare the host (start a container, etc.)
   */
  initialize(): Promise<void>;

  /**
   * Directory the first step runs in
   */
  getInitialDirectory(): string;

  /**
   * Run one program with arguments, without a shell
   */
  executeCommand(argv: readonly string[], options: CommandOptions): Promise<CommandResult>;

  /**
   * Run programs connected stdout to stdin.
   * The exit code follows `pipefail`: the rightmost non-zero status, or 0.
   */
  executePipeline(commands: readonly (readonly string[])[], options: CommandOptions): Promise<CommandResult>;

  /**
   * Read file contents
   * @param path Absolute path on the host
   */
  readFile(path: string): Promise<string>;

  /**
   * Write file contents, replacing what was there
   * @param path Absolute path on the host
   */
  writeFile(path: string, contents: string): Promise<void>;

  /**
   * Check whether a file or directory exists
   */
  fileExists(path: string): Promise<boolean>;

  /**
   * Check whether a path is an existing directory
   */
  isDirectory(path: string): Promise<boolean>;

  /**
   * Release the host
   */
  cleanup(): Promise<void>;
}

export * from './local.js';
export * from './docker.js';
