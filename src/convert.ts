import fs from "node:fs/promises";
import path from "node:path";
import { defaultCommandRunner, formatCommandLine } from "./exec.js";
import { ConversionError, RemoteCommandError, ValidationError } from "./errors.js";
import { silentLogger } from "./logger.js";
import { remoteDirname, sanitizeTag, toPosixRemotePath } from "./paths.js";
import { SshRemoteRunner, shellJoin, shellQuote } from "./shell.js";
import type {
  CommandRunner,
  ConversionRequest,
  ConversionSettings,
  Logger,
  RemoteCommandRunner,
  ToolsConfig,
} from "./types.js";

const SOURCES = new Set(["local", "registry"]);

export function validateConversionRequest(request: ConversionRequest): ConversionRequest {
  const tag = request.tag.trim();
  const sifPath = request.sifPath.trim();
  if (!tag) {
    throw new ValidationError("tag is required");
  }
  if (!sifPath) {
    throw new ValidationError("sif path is required");
  }
  if (!SOURCES.has(request.source)) {
    throw new ValidationError(`Invalid source "${request.source}" (expected local or registry)`);
  }
  return { ...request, tag, sifPath };
}

/**
 * Shell line for the login host: allocates a conversion node with srun and
 * builds the SIF into a partial file that only replaces `sifPath` on success.
 */
export function buildConversionCommand(params: {
  settings: ConversionSettings;
  singularityModule: string;
  jobName: string;
  sourceUri: string;
  sifPath: string;
}): string {
  const partial = `${params.sifPath}.partial`;
  const inner = [
    `trap ${shellQuote(`rm -f ${shellQuote(partial)}`)} EXIT`,
    [
      `mkdir -p ${shellQuote(remoteDirname(params.sifPath))}`,
      `module load ${params.singularityModule}`,
      `singularity build --force ${shellQuote(partial)} ${shellQuote(params.sourceUri)}`,
      `mv -f ${shellQuote(partial)} ${shellQuote(params.sifPath)}`,
    ].join(" && "),
  ].join("; ");

  return shellJoin([
    "srun",
    "-J",
    params.jobName,
    "-p",
    params.settings.partition,
    "--qos",
    params.settings.qos,
    "--mem",
    params.settings.mem,
    "-c",
    String(params.settings.cpus),
    "-t",
    params.settings.time,
    "bash",
    "-l",
    "-c",
    inner,
  ]);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export type ImageConverterParams = {
  config: ToolsConfig;
  runner?: CommandRunner;
  remote?: RemoteCommandRunner;
  logger?: Logger;
};

export class ImageConverter {
  private readonly config: ToolsConfig;
  private readonly runner: CommandRunner;
  private readonly remote: RemoteCommandRunner;
  private readonly logger: Logger;

  constructor(params: ImageConverterParams) {
    this.config = params.config;
    this.runner = params.runner ?? defaultCommandRunner;
    this.logger = params.logger ?? silentLogger;
    this.remote = params.remote ?? new SshRemoteRunner({ runner: this.runner, logger: this.logger });
  }

  async convert(input: ConversionRequest): Promise<string> {
    const request = validateConversionRequest(input);
    const host = this.config.loginHost;
    const safeTag = sanitizeTag(request.tag);

    if (request.source === "registry") {
      await this.runConversion(request, safeTag, `docker://${request.tag}`);
      return await this.verify(request.sifPath);
    }

    const tarPath = await this.exportImage(request.tag, safeTag);
    const remoteTar = toPosixRemotePath(remoteDirname(request.sifPath), `${safeTag}.tar`);
    try {
      await this.remote.execute(host, `mkdir -p ${shellQuote(remoteDirname(request.sifPath))}`);
      this.logger.info(`Uploading ${tarPath} to ${host}:${remoteTar}`);
      await this.remote.upload(host, tarPath, remoteTar);
      await this.runConversion(request, safeTag, `docker-archive://${remoteTar}`);
    } finally {
      await this.removeRemoteArchive(remoteTar);
    }

    await this.verify(request.sifPath);
    this.logger.debug(`Removing local archive ${tarPath}`);
    await fs.rm(tarPath, { force: true });
    return request.sifPath;
  }

  private async exportImage(tag: string, safeTag: string): Promise<string> {
    const tarPath = path.join(this.config.localTmpDir, `${safeTag}.tar`);
    if (await fileExists(tarPath)) {
      this.logger.info(
        `${tarPath} already exists, reusing it. Delete it to export ${tag} again.`,
      );
      return tarPath;
    }

    this.logger.info(`Exporting ${tag} to ${tarPath}`);
    const args = ["save", "-o", tarPath, tag];
    this.logger.debug(formatCommandLine("docker", args));
    const result = await this.runner("docker", args);
    if (result.code !== 0) {
      await fs.rm(tarPath, { force: true });
      const detail = result.stderr.trim() || result.stdout.trim() || `exit code ${result.code}`;
      throw new ConversionError(`docker save ${tag} failed: ${detail}`, { exitCode: result.code });
    }
    return tarPath;
  }

  private async runConversion(
    request: ConversionRequest,
    safeTag: string,
    sourceUri: string,
  ): Promise<void> {
    const command = buildConversionCommand({
      settings: this.config.conversion,
      singularityModule: this.config.singularityModule,
      jobName: `docker-conversion-${safeTag}`,
      sourceUri,
      sifPath: request.sifPath,
    });
    this.logger.info(`Converting ${sourceUri} to ${request.sifPath}`);
    try {
      await this.remote.execute(this.config.loginHost, command, { stream: true });
    } catch (error) {
      if (error instanceof RemoteCommandError) {
        throw new ConversionError(`Conversion of ${request.tag} failed: ${error.message}`, {
          cause: error,
          exitCode: error.exitCode,
        });
      }
      throw error;
    }
  }

  private async verify(sifPath: string): Promise<string> {
    try {
      await this.remote.execute(this.config.loginHost, `test -s ${shellQuote(sifPath)}`);
    } catch (error) {
      if (error instanceof RemoteCommandError) {
        throw new ConversionError(`${sifPath} is missing or empty after conversion`, {
          cause: error,
          exitCode: error.exitCode,
        });
      }
      throw error;
    }
    this.logger.info(`Singularity image ready at ${this.config.loginHost}:${sifPath}`);
    return sifPath;
  }

  private async removeRemoteArchive(remoteTar: string): Promise<void> {
    try {
      await this.remote.execute(this.config.loginHost, `rm -f ${shellQuote(remoteTar)}`);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not remove ${this.config.loginHost}:${remoteTar}: ${detail}`);
    }
  }
}
