export enum InstallErrorCode {
  PLAN_NOT_FOUND = 'PLAN_NOT_FOUND',
  PLAN_INVALID = 'PLAN_INVALID',
  CONFIG_INVALID = 'CONFIG_INVALID',
  STEP_FAILED = 'STEP_FAILED',
  RETRY_EXHAUSTED = 'RETRY_EXHAUSTED',
  CHDIR_FAILED = 'CHDIR_FAILED',
  PATCH_TARGET_MISSING = 'PATCH_TARGET_MISSING',
  PATCH_NOT_APPLICABLE = 'PATCH_NOT_APPLICABLE',
  HOST_UNAVAILABLE = 'HOST_UNAVAILABLE',
}

export class InstallError extends Error {
  readonly code: InstallErrorCode;
  /** Process exit status this error maps to, when it ends the run */
  readonly exitCode?: number;
  readonly context?: Record<string, unknown>;

  constructor(
    code: InstallErrorCode,
    message: string,
    options?: { exitCode?: number; context?: Record<string, unknown> }
  ) {
    super(message);
    this.name = 'InstallError';
    this.code = code;
    this.exitCode = options?.exitCode;
    this.context = options?.context;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
