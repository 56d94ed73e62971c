import fs from "node:fs/promises";
import path from "node:path";
import { shellJoin, shellQuote } from "./shell.js";
import { toPosixRemotePath } from "./paths.js";
import type { Logger, RemoteCommandRunner } from "./types.js";

export const EXEC_LAUNCHER_NAME = "singularity_exec.sh";

const HEADER = [
  "#!/bin/bash -l",
  "# Deployed by iris-singularity-tools into your scratch directory.",
  "# It is regenerated whenever it is needed and can safely be deleted.",
  "set -e",
  "",
];

export function attachLauncherName(jobName: string): string {
  return `vscode_attach_${jobName}.sh`;
}

/** Runs `singularity exec` with every argument it receives. */
export function renderExecLauncher(singularityModule: string): string {
  return [
    ...HEADER,
    `module load ${singularityModule}`,
    'echo "singularity exec $*"',
    'exec singularity exec "$@"',
    "",
  ].join("\n");
}

export function renderAttachLauncher(params: {
  singularityModule: string;
  singularityArgs: string[];
  image: string;
}): string {
  return [
    ...HEADER,
    `module load ${params.singularityModule}`,
    `exec singularity shell ${shellJoin([...params.singularityArgs, params.image])}`,
    "",
  ].join("\n");
}

/**
 * Uploads a rendered launcher to `<toolsDir>/<name>` on the login host through a
 * local temporary file and returns its remote path.
 */
export async function deployLauncher(params: {
  remote: RemoteCommandRunner;
  host: string;
  toolsDir: string;
  name: string;
  content: string;
  localTmpDir: string;
  logger: Logger;
}): Promise<string> {
  const remotePath = toPosixRemotePath(params.toolsDir, params.name);
  await params.remote.execute(params.host, `mkdir -p ${shellQuote(params.toolsDir)}`);

  const tmpDir = await fs.mkdtemp(path.join(params.localTmpDir, "iris-singularity-tools-"));
  try {
    const localPath = path.join(tmpDir, params.name);
    await fs.writeFile(localPath, params.content, { encoding: "utf8", mode: 0o755 });
    await params.remote.upload(params.host, localPath, remotePath);
  } finally {
    await fs.rm(tmpDir, { recursive: true, force: true });
  }

  params.logger.debug(`Deployed ${params.name} to ${params.host}:${remotePath}`);
  return remotePath;
}
