import { parseArgs, type ParseArgsConfig } from "node:util";
import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { loadToolsConfig } from "./config.js";
import { ImageConverter } from "./convert.js";
import { ValidationError, exitCodeFor } from "./errors.js";
import { defaultCommandRunner } from "./exec.js";
import { createConsoleLogger } from "./logger.js";
import { SingularityJobService, type AttachParams, type RunJobParams } from "./service.js";
import { ClusterAwareRemoteRunner } from "./shell.js";
import type {
  CommandRunner,
  ConversionRequest,
  Logger,
  RemoteCommandRunner,
  ToolsConfig,
} from "./types.js";

export const COMMANDS = ["docker-convert", "attach-vscode", "run"] as const;

export type CommandName = (typeof COMMANDS)[number];

type OptionsConfig = NonNullable<ParseArgsConfig["options"]>;

const GLOBAL_OPTIONS = {
  config: { type: "string" },
  verbose: { type: "boolean" },
  help: { type: "boolean", short: "h" },
} as const;

const CONVERT_OPTIONS = {
  ...GLOBAL_OPTIONS,
  tag: { type: "string" },
  "sif-path": { type: "string" },
  source: { type: "string" },
} as const;

const RESOURCE_OPTIONS = {
  ...GLOBAL_OPTIONS,
  "job-name": { type: "string" },
  time: { type: "string" },
  cpus: { type: "string" },
  gpus: { type: "string" },
  mem: { type: "string" },
  "slurm-arg": { type: "string", multiple: true },
  volta32: { type: "boolean" },
  "singularity-image": { type: "string" },
  "singularity-arg": { type: "string", multiple: true },
  "singularity-env": { type: "string", multiple: true },
} as const;

const RUN_OPTIONS = {
  ...RESOURCE_OPTIONS,
  batch: { type: "boolean" },
} as const;

const ConvertFlagsSchema = Type.Object({
  tag: Type.String({ minLength: 1 }),
  sifPath: Type.String({ minLength: 1 }),
  source: Type.Union([Type.Literal("local"), Type.Literal("registry")]),
});

const ResourceFlagsSchema = Type.Object({
  jobName: Type.String({ minLength: 1 }),
  time: Type.String({ minLength: 1 }),
  cpus: Type.Integer(),
  gpus: Type.Integer(),
  mem: Type.String({ minLength: 1 }),
  slurmArgs: Type.Array(Type.String()),
  volta32: Type.Boolean(),
  singularityImage: Type.String({ minLength: 1 }),
  singularityArgs: Type.Array(Type.String()),
  singularityEnv: Type.Array(Type.String()),
});

const RunFlagsSchema = Type.Object({
  ...ResourceFlagsSchema.properties,
  batch: Type.Boolean(),
  command: Type.String({ minLength: 1 }),
  commandArgs: Type.Array(Type.String()),
});

const FLAG_NAMES: Record<string, string> = {
  tag: "--tag",
  sifPath: "--sif-path",
  source: "--source",
  jobName: "--job-name",
  time: "--time",
  cpus: "--cpus",
  gpus: "--gpus",
  mem: "--mem",
  slurmArgs: "--slurm-arg",
  volta32: "--volta32",
  singularityImage: "--singularity-image",
  singularityArgs: "--singularity-arg",
  singularityEnv: "--singularity-env",
  batch: "--batch",
  command: "command",
  commandArgs: "command arguments",
};

const RESOURCE_USAGE = `  --job-name <name>            name of the SLURM job
  --time <HH:MM:SS>            wall-clock time to reserve, e.g. 01:00:00
  --cpus <n>                   CPU cores to reserve
  --gpus <n>                   GPUs to reserve (0 for none)
  --mem <amount>               memory to reserve, e.g. 16G
  --singularity-image <path>   SIF file on the cluster
  --slurm-arg=<arg>            extra scheduler argument (repeatable)
  --volta32                    request a 32GB V100 GPU
  --singularity-arg=<arg>      extra singularity argument (repeatable)
  --singularity-env NAME=value environment override in the container (repeatable)`;

const USAGE: Record<CommandName | "main", string> = {
  main: `Usage: iris-singularity-tools <command> [options]

Commands:
  docker-convert   convert a local or registry Docker image to a SIF file on the cluster
  attach-vscode    allocate a node and add a <job-name>-vscode host to your SSH config
  run              run a command in a Singularity container with srun, or sbatch with --batch

Global options:
  --config <file>  configuration file (default ~/.config/iris-singularity-tools/config.json)
  --verbose        print every external command
  -h, --help       show help
`,
  "docker-convert": `Usage: iris-singularity-tools docker-convert --tag <tag> --sif-path <path> [--source local|registry]

  --tag <tag>          local Docker tag, or a tag hosted on a registry
  --sif-path <path>    destination of the SIF file on the cluster
  --source <source>    local (default): docker save and upload; registry: pull on the cluster
`,
  "attach-vscode": `Usage: iris-singularity-tools attach-vscode [options]

${RESOURCE_USAGE}
`,
  run: `Usage: iris-singularity-tools run [options] [--batch] <command> [args...]

${RESOURCE_USAGE}
  --batch                      queue the job with sbatch instead of waiting with srun
`,
};

export type GlobalFlags = {
  configPath?: string;
  verbose: boolean;
};

export type Invocation =
  | { command: "help"; text: string }
  | { command: "docker-convert"; global: GlobalFlags; request: ConversionRequest }
  | { command: "attach-vscode"; global: GlobalFlags; params: AttachParams }
  | { command: "run"; global: GlobalFlags; params: RunJobParams };

type ResourceValues = {
  "job-name"?: string;
  time?: string;
  cpus?: string;
  gpus?: string;
  mem?: string;
  "slurm-arg"?: string[];
  volta32?: boolean;
  "singularity-image"?: string;
  "singularity-arg"?: string[];
  "singularity-env"?: string[];
};

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((name) => name === value);
}

function flagName(path: string): string {
  const field = path.split("/")[1] ?? "";
  return FLAG_NAMES[field] ?? (field || "arguments");
}

function validateFlags<T extends TSchema>(schema: T, raw: Record<string, unknown>): Static<T> {
  const converted = Value.Convert(schema, raw);
  if (Value.Check(schema, converted)) {
    return converted;
  }
  const first = Value.Errors(schema, converted).First();
  if (!first) {
    throw new ValidationError("invalid arguments");
  }
  throw new ValidationError(`${flagName(first.path)}: ${first.message}`);
}

/**
 * Splits `run` arguments at the container command: the first positional token,
 * or whatever follows `--`. Option values are never mistaken for the command.
 */
export function splitTrailingCommand(
  args: string[],
  options: OptionsConfig,
): { flags: string[]; command: string[] } {
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i] ?? "";
    if (token === "--") {
      return { flags: args.slice(0, i), command: args.slice(i + 1) };
    }
    if (!token.startsWith("-") || token === "-") {
      return { flags: args.slice(0, i), command: args.slice(i) };
    }
    const name = token.replace(/^-+/, "").split("=")[0] ?? "";
    if (options[name]?.type === "string" && !token.includes("=")) {
      i += 1;
    }
  }
  return { flags: args, command: [] };
}

function parseFlags<T extends OptionsConfig>(args: string[], options: T) {
  try {
    return parseArgs({ args, options, strict: true, allowPositionals: false }).values;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(message, { cause: error });
  }
}

function resourceFlags(values: ResourceValues): Record<string, unknown> {
  return {
    jobName: values["job-name"],
    time: values.time,
    cpus: values.cpus,
    gpus: values.gpus,
    mem: values.mem,
    slurmArgs: values["slurm-arg"] ?? [],
    volta32: values.volta32 ?? false,
    singularityImage: values["singularity-image"],
    singularityArgs: values["singularity-arg"] ?? [],
    singularityEnv: values["singularity-env"] ?? [],
  };
}

function toAttachParams(flags: Static<typeof ResourceFlagsSchema>): AttachParams {
  return {
    jobName: flags.jobName,
    time: flags.time,
    cpus: flags.cpus,
    gpus: flags.gpus,
    mem: flags.mem,
    volta32: flags.volta32,
    schedulerArgs: flags.slurmArgs,
    image: flags.singularityImage,
    singularityArgs: flags.singularityArgs,
    singularityEnv: flags.singularityEnv,
  };
}

export function parseCommandLine(argv: string[]): Invocation {
  const [name, ...rest] = argv;
  if (!name || name === "help" || name === "--help" || name === "-h") {
    return { command: "help", text: USAGE.main };
  }
  if (!isCommandName(name)) {
    throw new ValidationError(`Unknown command "${name}". Expected one of: ${COMMANDS.join(", ")}`);
  }

  switch (name) {
    case "docker-convert": {
      const values = parseFlags(rest, CONVERT_OPTIONS);
      if (values.help) {
        return { command: "help", text: USAGE[name] };
      }
      const flags = validateFlags(ConvertFlagsSchema, {
        tag: values.tag,
        sifPath: values["sif-path"],
        source: values.source ?? "local",
      });
      return {
        command: name,
        global: { configPath: values.config, verbose: values.verbose ?? false },
        request: { source: flags.source, tag: flags.tag, sifPath: flags.sifPath },
      };
    }

    case "attach-vscode": {
      const values = parseFlags(rest, RESOURCE_OPTIONS);
      if (values.help) {
        return { command: "help", text: USAGE[name] };
      }
      const flags = validateFlags(ResourceFlagsSchema, resourceFlags(values));
      return {
        command: name,
        global: { configPath: values.config, verbose: values.verbose ?? false },
        params: toAttachParams(flags),
      };
    }

    case "run": {
      const split = splitTrailingCommand(rest, RUN_OPTIONS);
      const values = parseFlags(split.flags, RUN_OPTIONS);
      if (values.help) {
        return { command: "help", text: USAGE[name] };
      }
      const [command, ...commandArgs] = split.command;
      const flags = validateFlags(RunFlagsSchema, {
        ...resourceFlags(values),
        batch: values.batch ?? false,
        command,
        commandArgs,
      });
      return {
        command: name,
        global: { configPath: values.config, verbose: values.verbose ?? false },
        params: {
          ...toAttachParams(flags),
          batch: flags.batch,
          command: flags.command,
          commandArgs: flags.commandArgs,
        },
      };
    }

    default:
      name satisfies never;
      throw new ValidationError(`Unsupported command: ${String(name)}`);
  }
}

export type CliDeps = {
  config?: ToolsConfig;
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
  remote?: RemoteCommandRunner;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  writeOut?: (text: string) => void;
};

/** Runs one CLI invocation and resolves to the process exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let logger = deps.logger ?? createConsoleLogger();
  try {
    const invocation = parseCommandLine(argv);
    if (invocation.command === "help") {
      (deps.writeOut ?? ((text: string) => process.stdout.write(text)))(invocation.text);
      return 0;
    }

    if (!deps.logger && invocation.global.verbose) {
      logger = createConsoleLogger({ verbose: true });
    }
    const config =
      deps.config ??
      (await loadToolsConfig({ path: invocation.global.configPath, env: deps.env ?? process.env }));
    const runner = deps.runner ?? defaultCommandRunner;
    const remote =
      deps.remote ??
      new ClusterAwareRemoteRunner({ runner, marker: config.clusterHostnameMarker, logger });
    const shared = { config, runner, remote, logger };

    switch (invocation.command) {
      case "docker-convert":
        await new ImageConverter(shared).convert(invocation.request);
        break;

      case "attach-vscode":
        await new SingularityJobService({ ...shared, sleep: deps.sleep, now: deps.now }).attachVscode(
          invocation.params,
        );
        break;

      case "run":
        await new SingularityJobService({ ...shared, sleep: deps.sleep, now: deps.now }).runJob(
          invocation.params,
        );
        break;

      default:
        invocation satisfies never;
    }
    logger.info("All done!");
    return 0;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return exitCodeFor(error);
  }
}
