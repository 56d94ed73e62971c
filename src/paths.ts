import os from "node:os";
import path from "node:path";

export function sanitizeTag(tag: string): string {
  return tag.trim().replace(/[/:\s]/g, "-");
}

export function normalizeJobName(input: string): string {
  return input.trim().replace(/ /g, "_");
}

export function expandHome(value: string, homeDir: string = os.homedir()): string {
  if (value === "~") {
    return homeDir;
  }
  if (value.startsWith("~/")) {
    return path.join(homeDir, value.slice(2));
  }
  return value;
}

export function toPosixRemotePath(...parts: string[]): string {
  const cleaned = parts
    .filter((part) => part.trim().length > 0)
    .map((part) => part.replace(/\\/g, "/"));
  const joined = cleaned.join("/").replace(/\/+/g, "/");
  return joined;
}

export function remoteDirname(remotePath: string): string {
  return path.posix.dirname(remotePath.replace(/\\/g, "/"));
}

export function scratchDir(scratchRoot: string, user: string): string {
  return toPosixRemotePath(scratchRoot, user);
}
