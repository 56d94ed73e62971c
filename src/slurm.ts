import { ValidationError } from "./errors.js";
import { normalizeJobName } from "./paths.js";
import { shellJoin } from "./shell.js";
import type { JobRequest, SlurmSettings, Submission } from "./types.js";

const JOB_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;
const MEM_PATTERN = /^[1-9]\d*[KMGT]$/i;
const TIME_PATTERN = /^(?:(\d+)-)?(\d{1,2}):(\d{2}):(\d{2})$/;
const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Every other state (PENDING, CONFIGURING, REQUEUED, SUSPENDED, ...) may still reach RUNNING.
const TERMINAL_STATES: ReadonlySet<string> = new Set([
  "COMPLETED",
  "FAILED",
  "CANCELLED",
  "TIMEOUT",
  "OUT_OF_MEMORY",
  "PREEMPTED",
  "NODE_FAIL",
  "BOOT_FAIL",
  "DEADLINE",
  "REVOKED",
]);

export function isTerminalState(state: string): boolean {
  return TERMINAL_STATES.has(state);
}

export function isValidMemory(value: string): boolean {
  return MEM_PATTERN.test(value.trim());
}

export function isValidWallTime(value: string): boolean {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) {
    return false;
  }
  const [, days, hours, minutes, seconds] = match;
  if (Number(minutes) > 59 || Number(seconds) > 59) {
    return false;
  }
  return days == null || Number(hours) < 24;
}

export function validateJobRequest(request: JobRequest): JobRequest {
  const jobName = normalizeJobName(request.jobName);
  if (!jobName) {
    throw new ValidationError("job name is required");
  }
  if (!JOB_NAME_PATTERN.test(jobName)) {
    throw new ValidationError(
      `job name "${jobName}" may only contain letters, digits, '.', '_' and '-'`,
    );
  }
  if (!Number.isInteger(request.cpus) || request.cpus < 1) {
    throw new ValidationError(`cpus must be an integer >= 1 (got ${request.cpus})`);
  }
  if (!Number.isInteger(request.gpus) || request.gpus < 0) {
    throw new ValidationError(`gpus must be an integer >= 0 (got ${request.gpus})`);
  }
  if (!isValidMemory(request.mem)) {
    throw new ValidationError(
      `mem "${request.mem}" must be a positive amount with a unit (K, M, G or T), e.g. 16G`,
    );
  }
  if (!isValidWallTime(request.time)) {
    throw new ValidationError(
      `time "${request.time}" must be HH:MM:SS or D-HH:MM:SS, e.g. 01:00:00`,
    );
  }
  if (!request.command.trim()) {
    throw new ValidationError("command is required");
  }
  return { ...request, jobName, mem: request.mem.trim(), time: request.time.trim() };
}

export function buildAllocationArgs(request: JobRequest, slurm: SlurmSettings): string[] {
  const args = [
    "-c",
    String(request.cpus),
    `--time=${request.time}`,
    `--mem=${request.mem}`,
    "-J",
    request.jobName,
    ...request.schedulerArgs,
  ];
  if (request.gpus > 0) {
    const constraint = request.volta32
      ? `${slurm.gpuConstraint},${slurm.volta32Constraint}`
      : slurm.gpuConstraint;
    args.push("-p", slurm.gpuPartition, "-G", String(request.gpus), "-C", constraint);
  }
  return args;
}

// sbatch takes the launcher as its job script; srun runs it through bash.
function commandWords(request: JobRequest): string[] {
  const userCommand = [request.command, ...request.commandArgs];
  if (!request.container) {
    return userCommand;
  }
  return [
    ...(request.mode === "interactive" ? ["bash"] : []),
    request.container.launcherPath,
    ...request.container.args,
    request.container.image,
    ...userCommand,
  ];
}

export function buildSubmission(request: JobRequest, slurm: SlurmSettings): Submission {
  const valid = validateJobRequest(request);
  const allocation = buildAllocationArgs(valid, slurm);
  const words = commandWords(valid);

  if (valid.mode === "interactive") {
    const args = [...allocation, ...words];
    return {
      mode: valid.mode,
      program: "srun",
      args,
      remoteCommand: shellJoin(["srun", ...args]),
    };
  }

  const batchArgs = ["-N", "1", `--output=${slurm.batchOutput}`, ...allocation];
  const args = valid.container
    ? [...batchArgs, ...words]
    : [...batchArgs, `--wrap=${shellJoin(words)}`];
  return {
    mode: valid.mode,
    program: "sbatch",
    args,
    remoteCommand: shellJoin(["sbatch", ...args]),
  };
}

export function validateContainerOptions(params: { image: string; env: string[] }): void {
  if (!params.image.trim()) {
    throw new ValidationError("singularity image is required");
  }
  for (const entry of params.env) {
    const separator = entry.indexOf("=");
    const name = separator > 0 ? entry.slice(0, separator) : "";
    if (!ENV_NAME_PATTERN.test(name)) {
      throw new ValidationError(`singularity env "${entry}" must look like NAME=value`);
    }
  }
}

export function buildContainerArgs(params: {
  gpus: number;
  singularityArgs: string[];
  env: string[];
  bindPaths: string[];
}): string[] {
  const args = [...params.singularityArgs];
  if (params.gpus > 0 && !args.includes("--nv")) {
    args.push("--nv");
  }
  for (const entry of params.env) {
    args.push("--env", entry);
  }
  for (const bindPath of params.bindPaths) {
    args.push("--bind", `${bindPath}:${bindPath}`);
  }
  return args;
}

export function parseSubmittedJobId(stdout: string): string {
  const text = stdout.trim();
  const strict = /Submitted\s+batch\s+job\s+(\d+)/i.exec(text);
  if (strict?.[1]) {
    return strict[1];
  }
  const loose = /\bjob\s+(\d+)\b/i.exec(text);
  if (loose?.[1]) {
    return loose[1];
  }
  throw new Error(`Unable to parse job id from sbatch output: ${text || "<empty>"}`);
}

/** Parses the first line of `squeue -h -o '%T|%N'` output; null when the job is gone. */
export function parseJobState(stdout: string): { state: string; node: string } | null {
  const line = stdout
    .split(/\r?\n/)
    .map((item) => item.trim())
    .find((item) => item.length > 0);
  if (!line) {
    return null;
  }
  const [rawState = "", node = ""] = line.split("|");
  const state = rawState.trim().toUpperCase().replace(/\s.*$/, "");
  if (!state) {
    throw new Error(`Missing job state in squeue output: ${line}`);
  }
  return { state, node: node.trim() };
}
