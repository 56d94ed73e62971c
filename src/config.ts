import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ValidationError } from "./errors.js";
import { expandHome } from "./paths.js";
import type {
  AllocationSettings,
  ConversionSettings,
  SlurmSettings,
  ToolsConfig,
} from "./types.js";

export const CONFIG_ENV_VAR = "IRIS_TOOLS_CONFIG";

const DEFAULT_CONFIG_PATH = "~/.config/iris-singularity-tools/config.json";

const DEFAULT_SLURM: SlurmSettings = {
  gpuPartition: "gpu",
  gpuConstraint: "gpu",
  volta32Constraint: "volta32",
  batchOutput: "%x-%j.out",
};

const DEFAULT_ALLOCATION: AllocationSettings = {
  pollIntervalMs: 5_000,
  timeoutMs: 600_000,
};

const DEFAULT_CONVERSION: ConversionSettings = {
  partition: "interactive",
  qos: "debug",
  mem: "12G",
  cpus: 4,
  time: "01:00:00",
};

function asObject(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new ValidationError(`${label} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

function readString(value: unknown, field: string): string | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ValidationError(`${field} must be a string`);
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readNumber(value: unknown, field: string): number | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value < 1) {
    throw new ValidationError(`${field} must be a positive number`);
  }
  return Math.floor(value);
}

function parseSlurm(value: unknown): SlurmSettings {
  if (value == null) {
    return { ...DEFAULT_SLURM };
  }
  const obj = asObject(value, "slurm");
  return {
    gpuPartition: readString(obj.gpuPartition, "slurm.gpuPartition") ?? DEFAULT_SLURM.gpuPartition,
    gpuConstraint:
      readString(obj.gpuConstraint, "slurm.gpuConstraint") ?? DEFAULT_SLURM.gpuConstraint,
    volta32Constraint:
      readString(obj.volta32Constraint, "slurm.volta32Constraint") ??
      DEFAULT_SLURM.volta32Constraint,
    batchOutput: readString(obj.batchOutput, "slurm.batchOutput") ?? DEFAULT_SLURM.batchOutput,
  };
}

function parseAllocation(value: unknown): AllocationSettings {
  if (value == null) {
    return { ...DEFAULT_ALLOCATION };
  }
  const obj = asObject(value, "allocation");
  const pollIntervalMs =
    readNumber(obj.pollIntervalMs, "allocation.pollIntervalMs") ??
    DEFAULT_ALLOCATION.pollIntervalMs;
  const timeoutMs =
    readNumber(obj.timeoutMs, "allocation.timeoutMs") ?? DEFAULT_ALLOCATION.timeoutMs;
  if (pollIntervalMs > timeoutMs) {
    throw new ValidationError("allocation.pollIntervalMs must not exceed allocation.timeoutMs");
  }
  return { pollIntervalMs, timeoutMs };
}

function parseConversion(value: unknown): ConversionSettings {
  if (value == null) {
    return { ...DEFAULT_CONVERSION };
  }
  const obj = asObject(value, "conversion");
  return {
    partition:
      readString(obj.partition, "conversion.partition") ?? DEFAULT_CONVERSION.partition,
    qos: readString(obj.qos, "conversion.qos") ?? DEFAULT_CONVERSION.qos,
    mem: readString(obj.mem, "conversion.mem") ?? DEFAULT_CONVERSION.mem,
    cpus: readNumber(obj.cpus, "conversion.cpus") ?? DEFAULT_CONVERSION.cpus,
    time: readString(obj.time, "conversion.time") ?? DEFAULT_CONVERSION.time,
  };
}

export function parseToolsConfig(value: unknown, homeDir: string = os.homedir()): ToolsConfig {
  const obj = value == null ? {} : asObject(value, "iris-singularity-tools config");
  const identityFile = readString(obj.identityFile, "identityFile");

  return {
    loginHost: readString(obj.loginHost, "loginHost") ?? "iris-cluster",
    clusterHostnameMarker:
      readString(obj.clusterHostnameMarker, "clusterHostnameMarker") ?? "iris-",
    sshConfigPath: expandHome(
      readString(obj.sshConfigPath, "sshConfigPath") ?? "~/.ssh/config",
      homeDir,
    ),
    identityFile,
    scratchRoot: readString(obj.scratchRoot, "scratchRoot") ?? "/scratch/users",
    toolsDirName: readString(obj.toolsDirName, "toolsDirName") ?? "iris_singularity_tools",
    singularityModule:
      readString(obj.singularityModule, "singularityModule") ?? "tools/Singularity",
    localTmpDir: expandHome(readString(obj.localTmpDir, "localTmpDir") ?? os.tmpdir(), homeDir),
    slurm: parseSlurm(obj.slurm),
    allocation: parseAllocation(obj.allocation),
    conversion: parseConversion(obj.conversion),
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function loadToolsConfig(params: {
  path?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
} = {}): Promise<ToolsConfig> {
  const homeDir = params.homeDir ?? os.homedir();
  const explicit = params.path?.trim() || params.env?.[CONFIG_ENV_VAR]?.trim();
  const file = path.resolve(expandHome(explicit || DEFAULT_CONFIG_PATH, homeDir));

  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (error) {
    if (!explicit && isMissingFile(error)) {
      return parseToolsConfig(undefined, homeDir);
    }
    throw new ValidationError(`Unable to read config file ${file}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Config file ${file} is not valid JSON`, { cause: error });
  }
  return parseToolsConfig(parsed, homeDir);
}
