export type SubmissionMode = "interactive" | "batch";

export type ImageSource = "local" | "registry";

export type ContainerSpec = {
  image: string;
  launcherPath: string;
  args: string[];
};

export type JobRequest = {
  jobName: string;
  cpus: number;
  gpus: number;
  mem: string;
  time: string;
  mode: SubmissionMode;
  volta32: boolean;
  schedulerArgs: string[];
  container?: ContainerSpec;
  command: string;
  commandArgs: string[];
};

export type Submission = {
  mode: SubmissionMode;
  program: "srun" | "sbatch";
  args: string[];
  remoteCommand: string;
};

export type SshHostEntry = {
  alias: string;
  proxyJump: string;
  hostName: string;
  user: string;
  identityFile: string;
  remoteCommand?: string;
};

export type ConversionRequest = {
  source: ImageSource;
  tag: string;
  sifPath: string;
};

export type SlurmSettings = {
  gpuPartition: string;
  gpuConstraint: string;
  volta32Constraint: string;
  batchOutput: string;
};

export type AllocationSettings = {
  pollIntervalMs: number;
  timeoutMs: number;
};

export type ConversionSettings = {
  partition: string;
  qos: string;
  mem: string;
  cpus: number;
  time: string;
};

export type ToolsConfig = {
  loginHost: string;
  clusterHostnameMarker: string;
  sshConfigPath: string;
  identityFile?: string;
  scratchRoot: string;
  toolsDirName: string;
  singularityModule: string;
  localTmpDir: string;
  slurm: SlurmSettings;
  allocation: AllocationSettings;
  conversion: ConversionSettings;
};

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type CommandOptions = {
  cwd?: string;
  timeoutMs?: number;
  stream?: boolean;
};

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

export interface RemoteCommandRunner {
  /** True when commands run directly on the cluster instead of through ssh. */
  onCluster(): Promise<boolean>;
  execute(host: string, command: string, options?: { stream?: boolean }): Promise<CommandResult>;
  upload(host: string, localPath: string, remotePath: string): Promise<void>;
}

export type Logger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};
