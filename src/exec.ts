import { spawn, type ChildProcess } from "node:child_process";
import type { CommandResult, CommandRunner } from "./types.js";

const activeChildren = new Set<ChildProcess>();

export const defaultCommandRunner: CommandRunner = async (command, args, options = {}) => {
  const timeoutMs = options.timeoutMs ?? 0;
  const stream = options.stream === true;
  return await new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: [stream ? "inherit" : "ignore", "pipe", "pipe"],
      env: process.env,
    });
    activeChildren.add(child);

    let stdout = "";
    let stderr = "";
    let timer: NodeJS.Timeout | null = null;

    child.stdout?.on("data", (chunk: Buffer) => {
      stdout += String(chunk);
      if (stream) {
        process.stdout.write(chunk);
      }
    });

    child.stderr?.on("data", (chunk: Buffer) => {
      stderr += String(chunk);
      if (stream) {
        process.stderr.write(chunk);
      }
    });

    child.on("error", (err) => {
      activeChildren.delete(child);
      if (timer) {
        clearTimeout(timer);
      }
      reject(err);
    });

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        child.kill("SIGTERM");
      }, timeoutMs);
    }

    child.on("close", (code) => {
      activeChildren.delete(child);
      if (timer) {
        clearTimeout(timer);
      }
      resolve({
        code: code ?? 1,
        stdout,
        stderr,
      });
    });
  });
};

/** Signals every child still running and returns how many were signalled. */
export function terminateActiveCommands(signal: NodeJS.Signals = "SIGTERM"): number {
  let count = 0;
  for (const child of activeChildren) {
    if (child.exitCode == null && child.kill(signal)) {
      count += 1;
    }
  }
  activeChildren.clear();
  return count;
}

export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}
