import type { CommandResult } from "./types.js";

export const VALIDATION_EXIT_CODE = 2;
export const CONNECTION_EXIT_CODE = 255;

function describeOutput(result: CommandResult): string {
  const stderr = result.stderr.trim();
  const stdout = result.stdout.trim();
  return stderr || stdout || `exit code ${result.code}`;
}

export class ToolsError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class ValidationError extends ToolsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, VALIDATION_EXIT_CODE, options);
  }
}

export class ConnectionError extends ToolsError {
  readonly host: string;

  constructor(host: string, detail: string, options?: { cause?: unknown }) {
    super(`Unable to reach ${host}: ${detail}`, CONNECTION_EXIT_CODE, options);
    this.host = host;
  }
}

export class RemoteCommandError extends ToolsError {
  readonly host: string;
  readonly command: string;
  readonly result: CommandResult;

  constructor(host: string, command: string, result: CommandResult) {
    super(`Remote command on ${host} failed: ${describeOutput(result)}`, result.code || 1);
    this.host = host;
    this.command = command;
    this.result = result;
  }
}

export class UploadError extends ToolsError {
  constructor(
    localPath: string,
    target: string,
    detail: string,
    exitCode = 1,
    options?: { cause?: unknown },
  ) {
    super(`Upload of ${localPath} to ${target} failed: ${detail}`, exitCode, options);
  }

  static fromResult(localPath: string, target: string, result: CommandResult): UploadError {
    return new UploadError(localPath, target, describeOutput(result), result.code || 1);
  }
}

export class ConversionError extends ToolsError {
  constructor(message: string, options?: { cause?: unknown; exitCode?: number }) {
    super(message, options?.exitCode ?? 1, options);
  }
}

export class ConfigWriteError extends ToolsError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`Could not write SSH config ${path}: ${detail}`, 1, options);
    this.path = path;
  }
}

export class AllocationError extends ToolsError {
  readonly jobId: string;

  constructor(jobId: string, message: string, options?: { cause?: unknown }) {
    super(message, 1, options);
    this.jobId = jobId;
  }
}

export class AllocationTimeoutError extends AllocationError {
  constructor(jobId: string, timeoutMs: number) {
    super(
      jobId,
      `Job ${jobId} was not running after ${Math.round(timeoutMs / 1000)}s. It is still queued; cancel it with \`scancel ${jobId}\` if you no longer need it.`,
    );
  }
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof ToolsError) {
    return error.exitCode;
  }
  return 1;
}
