import { setTimeout as delay } from "node:timers/promises";
import { defaultCommandRunner } from "./exec.js";
import {
  AllocationError,
  AllocationTimeoutError,
  RemoteCommandError,
  ValidationError,
} from "./errors.js";
import { silentLogger } from "./logger.js";
import { normalizeJobName, scratchDir, toPosixRemotePath } from "./paths.js";
import {
  EXEC_LAUNCHER_NAME,
  attachLauncherName,
  deployLauncher,
  renderAttachLauncher,
  renderExecLauncher,
} from "./scripts.js";
import { SshRemoteRunner, shellQuote } from "./shell.js";
import {
  buildContainerArgs,
  buildSubmission,
  isTerminalState,
  parseJobState,
  parseSubmittedJobId,
  validateContainerOptions,
  validateJobRequest,
} from "./slurm.js";
import { readHostOption, readSshConfig, syncHostEntry, type SyncStatus } from "./sshConfig.js";
import type {
  CommandRunner,
  JobRequest,
  Logger,
  RemoteCommandRunner,
  SshHostEntry,
  ToolsConfig,
} from "./types.js";

export type ResourceOptions = {
  jobName: string;
  time: string;
  cpus: number;
  gpus: number;
  mem: string;
  volta32: boolean;
  schedulerArgs: string[];
};

export type ContainerOptions = {
  image: string;
  singularityArgs: string[];
  singularityEnv: string[];
};

export type RunJobParams = ResourceOptions &
  ContainerOptions & {
    batch: boolean;
    command: string;
    commandArgs: string[];
  };

export type AttachParams = ResourceOptions & ContainerOptions;

export type RunJobResult = {
  mode: JobRequest["mode"];
  jobId?: string;
  output: string;
};

export type AttachResult = {
  jobId: string;
  node: string;
  alias: string;
  launcherPath: string;
  sshConfig: SyncStatus;
};

export type SingularityJobServiceParams = {
  config: ToolsConfig;
  runner?: CommandRunner;
  remote?: RemoteCommandRunner;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

const HOLD_COMMAND = ["sleep", "infinity"];

function resourceRequest(
  params: ResourceOptions,
  mode: JobRequest["mode"],
  command: string[],
): JobRequest {
  const [head = "", ...rest] = command;
  return {
    jobName: normalizeJobName(params.jobName),
    cpus: params.cpus,
    gpus: params.gpus,
    mem: params.mem,
    time: params.time,
    mode,
    volta32: params.volta32,
    schedulerArgs: params.schedulerArgs,
    command: head,
    commandArgs: rest,
  };
}

export class SingularityJobService {
  private readonly config: ToolsConfig;
  private readonly remote: RemoteCommandRunner;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(params: SingularityJobServiceParams) {
    this.config = params.config;
    this.logger = params.logger ?? silentLogger;
    this.remote =
      params.remote ??
      new SshRemoteRunner({ runner: params.runner ?? defaultCommandRunner, logger: this.logger });
    this.sleep = params.sleep ?? ((ms) => delay(ms));
    this.now = params.now ?? (() => Date.now());
  }

  async remoteUser(): Promise<string> {
    const result = await this.remote.execute(this.config.loginHost, "whoami");
    const user = result.stdout.trim();
    if (!user) {
      throw new Error(`whoami on ${this.config.loginHost} returned nothing`);
    }
    return user;
  }

  async runJob(params: RunJobParams): Promise<RunJobResult> {
    const mode = params.batch ? "batch" : "interactive";
    const draft = validateJobRequest(
      resourceRequest(params, mode, [params.command, ...params.commandArgs]),
    );
    validateContainerOptions({ image: params.image, env: params.singularityEnv });

    const host = this.config.loginHost;
    const scratch = scratchDir(this.config.scratchRoot, await this.remoteUser());
    const launcherPath = await deployLauncher({
      remote: this.remote,
      host,
      toolsDir: toPosixRemotePath(scratch, this.config.toolsDirName),
      name: EXEC_LAUNCHER_NAME,
      content: renderExecLauncher(this.config.singularityModule),
      localTmpDir: this.config.localTmpDir,
      logger: this.logger,
    });

    const submission = buildSubmission(
      {
        ...draft,
        command: params.command,
        commandArgs: params.commandArgs,
        container: {
          image: params.image.trim(),
          launcherPath,
          args: this.containerArgs(params, draft.gpus, scratch),
        },
      },
      this.config.slurm,
    );

    if (submission.mode === "interactive") {
      this.logger.info(`Running ${draft.jobName} with srun; waiting for resources`);
      const result = await this.remote.execute(host, submission.remoteCommand, { stream: true });
      return { mode: submission.mode, output: result.stdout };
    }

    const result = await this.remote.execute(host, submission.remoteCommand);
    const output = (result.stdout || result.stderr).trim();
    const jobId = parseSubmittedJobId(output);
    this.logger.info(`Queued ${draft.jobName} as job ${jobId}`);
    this.logger.info(
      `Track it with \`ssh ${host} squeue --me\`; cancel it with \`ssh ${host} scancel ${jobId}\``,
    );
    return { mode: submission.mode, jobId, output };
  }

  async attachVscode(params: AttachParams): Promise<AttachResult> {
    const request = validateJobRequest(resourceRequest(params, "batch", HOLD_COMMAND));
    validateContainerOptions({ image: params.image, env: params.singularityEnv });
    const image = params.image.trim();
    if (await this.remote.onCluster()) {
      throw new ValidationError(
        "attach-vscode edits your local SSH config; run it on your local machine, not on the cluster",
      );
    }

    const host = this.config.loginHost;
    const identityFile = await this.resolveIdentityFile();
    this.logger.info(`Will use SSH identity ${identityFile}`);

    await this.ensureImageExists(image);
    const user = await this.remoteUser();
    const scratch = scratchDir(this.config.scratchRoot, user);
    await this.warnAboutDuplicateJobs(request.jobName);

    const launcherPath = await deployLauncher({
      remote: this.remote,
      host,
      toolsDir: toPosixRemotePath(scratch, this.config.toolsDirName),
      name: attachLauncherName(request.jobName),
      content: renderAttachLauncher({
        singularityModule: this.config.singularityModule,
        singularityArgs: this.containerArgs(params, request.gpus, scratch),
        image,
      }),
      localTmpDir: this.config.localTmpDir,
      logger: this.logger,
    });

    const submission = buildSubmission(request, this.config.slurm);
    const submitted = await this.remote.execute(host, submission.remoteCommand);
    const jobId = parseSubmittedJobId(submitted.stdout || submitted.stderr);
    this.logger.info(`Submitted allocation ${request.jobName} as job ${jobId}`);

    const node = await this.waitForRunning(jobId);
    this.logger.info(`Successful allocation on ${node}`);

    const entry: SshHostEntry = {
      alias: `${request.jobName}-vscode`,
      proxyJump: host,
      hostName: node,
      user,
      identityFile,
      remoteCommand: `bash ${launcherPath}`,
    };
    this.logger.info(`Updating ${this.config.sshConfigPath} with host ${entry.alias}`);
    const status = await syncHostEntry(this.config.sshConfigPath, entry);

    this.logger.info(`Attach VSCode to SSH remote '${entry.alias}'.`);
    this.logger.info(
      `Cancel the job when you are done: \`ssh ${host} scancel --name ${request.jobName}\``,
    );
    return { jobId, node, alias: entry.alias, launcherPath, sshConfig: status };
  }

  async waitForRunning(jobId: string): Promise<string> {
    const { pollIntervalMs, timeoutMs } = this.config.allocation;
    const deadline = this.now() + timeoutMs;
    const command = `squeue -h -j ${shellQuote(jobId)} -o ${shellQuote("%T|%N")}`;

    for (;;) {
      const status = parseJobState(await this.pollJob(jobId, command));
      if (!status) {
        throw new AllocationError(jobId, `Job ${jobId} left the queue before it started running`);
      }
      if (status.state === "RUNNING" && status.node) {
        return status.node;
      }
      if (isTerminalState(status.state)) {
        throw new AllocationError(jobId, `Job ${jobId} ended as ${status.state} before running`);
      }
      this.logger.debug(`Job ${jobId} is ${status.state}`);
      if (this.now() + pollIntervalMs > deadline) {
        throw new AllocationTimeoutError(jobId, timeoutMs);
      }
      await this.sleep(pollIntervalMs);
    }
  }

  // squeue rejects ids of jobs it has already purged.
  private async pollJob(jobId: string, command: string): Promise<string> {
    try {
      const result = await this.remote.execute(this.config.loginHost, command);
      return result.stdout;
    } catch (error) {
      if (error instanceof RemoteCommandError) {
        throw new AllocationError(jobId, `Job ${jobId} left the queue before it started running`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  private containerArgs(options: ContainerOptions, gpus: number, scratch: string): string[] {
    return buildContainerArgs({
      gpus,
      singularityArgs: options.singularityArgs,
      env: options.singularityEnv,
      bindPaths: [scratch],
    });
  }

  private async resolveIdentityFile(): Promise<string> {
    if (this.config.identityFile) {
      return this.config.identityFile;
    }
    const content = await readSshConfig(this.config.sshConfigPath);
    const identityFile = readHostOption(content, this.config.loginHost, "IdentityFile");
    if (!identityFile) {
      throw new ValidationError(
        `No IdentityFile for host ${this.config.loginHost} in ${this.config.sshConfigPath}. Add one to that host or set identityFile in the tool config.`,
      );
    }
    return identityFile;
  }

  private async ensureImageExists(image: string): Promise<void> {
    try {
      await this.remote.execute(this.config.loginHost, `test -f ${shellQuote(image)}`);
    } catch (error) {
      if (error instanceof RemoteCommandError) {
        throw new ValidationError(
          `Singularity image ${image} was not found on ${this.config.loginHost}`,
          { cause: error },
        );
      }
      throw error;
    }
  }

  private async warnAboutDuplicateJobs(jobName: string): Promise<void> {
    const result = await this.remote.execute(
      this.config.loginHost,
      `squeue --me -h --name=${shellQuote(jobName)} -o %i`,
    );
    const existing = result.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    if (existing.length > 0) {
      this.logger.warn(
        `Jobs named '${jobName}' are already queued (${existing.join(", ")}). Cancel the ones you do not need with scancel to avoid wasting resources.`,
      );
    }
  }
}
