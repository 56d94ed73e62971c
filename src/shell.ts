import { formatCommandLine } from "./exec.js";
import { ConnectionError, RemoteCommandError, UploadError } from "./errors.js";
import { silentLogger } from "./logger.js";
import type { CommandResult, CommandRunner, Logger, RemoteCommandRunner } from "./types.js";

const SSH_CONNECTION_FAILURE = 255;

export function shellQuote(value: string): string {
  if (value.length > 0 && /^[A-Za-z0-9_./:@%+=,-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

export function shellJoin(words: string[]): string {
  return words.map((word) => shellQuote(word)).join(" ");
}

export function scpTarget(sshTarget: string, remotePath: string): string {
  const normalized = remotePath.replace(/\\/g, "/");
  return `${sshTarget}:${normalized}`;
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SshRemoteRunner implements RemoteCommandRunner {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(params: { runner: CommandRunner; logger?: Logger }) {
    this.runner = params.runner;
    this.logger = params.logger ?? silentLogger;
  }

  async onCluster(): Promise<boolean> {
    return false;
  }

  async execute(
    host: string,
    command: string,
    options: { stream?: boolean } = {},
  ): Promise<CommandResult> {
    const args = ["-o", "BatchMode=yes", host, command];
    this.logger.debug(formatCommandLine("ssh", args));

    let result: CommandResult;
    try {
      result = await this.runner("ssh", args, { stream: options.stream });
    } catch (error) {
      throw new ConnectionError(host, errorText(error), { cause: error });
    }

    if (result.code === SSH_CONNECTION_FAILURE) {
      throw new ConnectionError(host, result.stderr.trim() || "ssh exited with code 255");
    }
    if (result.code !== 0) {
      throw new RemoteCommandError(host, command, result);
    }
    return result;
  }

  async upload(host: string, localPath: string, remotePath: string): Promise<void> {
    await scpUpload(this.runner, host, localPath, remotePath, this.logger);
  }
}

/** Runs cluster commands in a local shell; used when the tool already runs on the login node. */
export class LocalRemoteRunner implements RemoteCommandRunner {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(params: { runner: CommandRunner; logger?: Logger }) {
    this.runner = params.runner;
    this.logger = params.logger ?? silentLogger;
  }

  async onCluster(): Promise<boolean> {
    return true;
  }

  async execute(
    host: string,
    command: string,
    options: { stream?: boolean } = {},
  ): Promise<CommandResult> {
    const args = ["-c", command];
    this.logger.debug(formatCommandLine("bash", args));
    const result = await this.runner("bash", args, { stream: options.stream });
    if (result.code !== 0) {
      throw new RemoteCommandError(host, command, result);
    }
    return result;
  }

  async upload(_host: string, localPath: string, remotePath: string): Promise<void> {
    const args = ["-fR", localPath, remotePath];
    this.logger.debug(formatCommandLine("cp", args));

    let result: CommandResult;
    try {
      result = await this.runner("cp", args);
    } catch (error) {
      throw new UploadError(localPath, remotePath, errorText(error), 1, { cause: error });
    }
    if (result.code !== 0) {
      throw UploadError.fromResult(localPath, remotePath, result);
    }
  }
}

/** Checks the local hostname for the cluster marker, e.g. `iris-` in `iris-001`. */
export async function detectClusterHost(
  runner: CommandRunner,
  marker: string,
  logger: Logger = silentLogger,
): Promise<boolean> {
  const result = await runner("hostname", []);
  if (result.code !== 0) {
    logger.warn(`hostname exited with code ${result.code}; assuming a local machine`);
    return false;
  }
  const hostname = result.stdout.trim();
  const onCluster = hostname.includes(marker);
  logger.debug(`hostname ${hostname}: ${onCluster ? "on the cluster" : "local machine"}`);
  return onCluster;
}

/**
 * Picks ssh/scp or the local shell on first use, depending on whether the
 * tool runs on the cluster itself.
 */
export class ClusterAwareRemoteRunner implements RemoteCommandRunner {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly marker: string;
  private detection: Promise<boolean> | null = null;

  constructor(params: { runner: CommandRunner; marker: string; logger?: Logger }) {
    this.runner = params.runner;
    this.marker = params.marker;
    this.logger = params.logger ?? silentLogger;
  }

  onCluster(): Promise<boolean> {
    if (!this.detection) {
      this.detection = detectClusterHost(this.runner, this.marker, this.logger);
    }
    return this.detection;
  }

  async execute(
    host: string,
    command: string,
    options: { stream?: boolean } = {},
  ): Promise<CommandResult> {
    return await (await this.delegate()).execute(host, command, options);
  }

  async upload(host: string, localPath: string, remotePath: string): Promise<void> {
    await (await this.delegate()).upload(host, localPath, remotePath);
  }

  private async delegate(): Promise<RemoteCommandRunner> {
    const params = { runner: this.runner, logger: this.logger };
    return (await this.onCluster()) ? new LocalRemoteRunner(params) : new SshRemoteRunner(params);
  }
}

export async function scpUpload(
  runner: CommandRunner,
  sshTarget: string,
  localPath: string,
  remotePath: string,
  logger: Logger = silentLogger,
): Promise<CommandResult> {
  const target = scpTarget(sshTarget, remotePath);
  const args = ["-o", "BatchMode=yes", localPath, target];
  logger.debug(formatCommandLine("scp", args));

  let result: CommandResult;
  try {
    result = await runner("scp", args);
  } catch (error) {
    throw new UploadError(localPath, target, errorText(error), 1, { cause: error });
  }
  if (result.code !== 0) {
    throw UploadError.fromResult(localPath, target, result);
  }
  return result;
}
