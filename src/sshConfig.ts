import fs from "node:fs/promises";
import path from "node:path";
import { ConfigWriteError } from "./errors.js";
import type { SshHostEntry } from "./types.js";

export type SyncStatus = "added" | "updated" | "unchanged";

type Section = {
  keyword?: "host" | "match";
  patterns: string[];
  lines: string[];
};

const HEADER_PATTERN = /^\s*(host|match)(?:\s*=\s*|\s+)(.*?)\s*$/i;
const OPTION_PATTERN = /^\s*([A-Za-z][A-Za-z0-9]*)(?:\s*=\s*|\s+)(.+?)\s*$/;

function detectLineEnding(content: string): string {
  return content.includes("\r\n") ? "\r\n" : "\n";
}

function stripTerminator(line: string): string {
  return line.replace(/\r?\n$/, "");
}

function splitValues(value: string): string[] {
  return (value.match(/"[^"]*"|\S+/g) ?? []).map((token) => token.replace(/^"(.*)"$/, "$1"));
}

// "Host demo-vscode # old" lists one pattern.
function stripComment(value: string): string {
  return value.replace(/(?:^|\s+)#.*$/, "");
}

function isTrivialLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length === 0 || trimmed.startsWith("#");
}

/** Splits a config into a preamble and Host/Match sections, keeping raw lines. */
function splitSections(content: string): Section[] {
  const rawLines = content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
  const sections: Section[] = [{ patterns: [], lines: [] }];
  for (const raw of rawLines) {
    const header = HEADER_PATTERN.exec(stripTerminator(raw));
    if (header) {
      const keyword = header[1]?.toLowerCase() === "match" ? "match" : "host";
      sections.push({ keyword, patterns: splitValues(stripComment(header[2] ?? "")), lines: [raw] });
      continue;
    }
    sections[sections.length - 1]?.lines.push(raw);
  }
  return sections;
}

function trailingTrivialLines(lines: string[]): string[] {
  let start = lines.length;
  while (start > 1 && isTrivialLine(lines[start - 1] ?? "")) {
    start -= 1;
  }
  return lines.slice(start);
}

function isAliasSection(section: Section, alias: string): boolean {
  return section.keyword === "host" && section.patterns.length === 1 && section.patterns[0] === alias;
}

function formatValue(value: string): string {
  return /\s/.test(value) ? `"${value}"` : value;
}

export function renderHostBlock(entry: SshHostEntry, lineEnding = "\n"): string[] {
  const lines = [
    `Host ${entry.alias}`,
    `  HostName ${formatValue(entry.hostName)}`,
    `  ProxyJump ${formatValue(entry.proxyJump)}`,
    `  User ${formatValue(entry.user)}`,
    `  IdentityFile ${formatValue(entry.identityFile)}`,
  ];
  if (entry.remoteCommand) {
    lines.push(`  RemoteCommand ${entry.remoteCommand}`, "  RequestTTY yes");
  }
  return lines.map((line) => `${line}${lineEnding}`);
}

export function upsertHostBlock(
  content: string,
  entry: SshHostEntry,
): { content: string; status: SyncStatus } {
  const lineEnding = detectLineEnding(content);
  const block = renderHostBlock(entry, lineEnding);
  const sections = splitSections(content);

  let found = false;
  const lines: string[] = [];
  for (const section of sections) {
    if (!isAliasSection(section, entry.alias)) {
      lines.push(...section.lines);
      continue;
    }
    if (!found) {
      lines.push(...block);
      found = true;
    }
    lines.push(...trailingTrivialLines(section.lines));
  }

  let next = lines.join("");
  if (!found) {
    if (next.length > 0 && !next.endsWith("\n")) {
      next += lineEnding;
    }
    const last = sections[sections.length - 1]?.lines.at(-1);
    if (next.length > 0 && last != null && last.trim().length > 0) {
      next += lineEnding;
    }
    next += block.join("");
  }

  if (next === content) {
    return { content, status: "unchanged" };
  }
  return { content: next, status: found ? "updated" : "added" };
}

/** Returns the first value of `key` in Host blocks listing `host` explicitly. */
export function readHostOption(content: string, host: string, key: string): string | undefined {
  const wanted = key.toLowerCase();
  for (const section of splitSections(content)) {
    if (section.keyword !== "host" || !section.patterns.includes(host)) {
      continue;
    }
    for (const raw of section.lines.slice(1)) {
      const line = stripTerminator(raw);
      if (isTrivialLine(line)) {
        continue;
      }
      const match = OPTION_PATTERN.exec(line);
      if (match?.[1]?.toLowerCase() === wanted && match[2]) {
        return splitValues(match[2])[0];
      }
    }
  }
  return undefined;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export async function readSshConfig(configPath: string): Promise<string> {
  try {
    return await fs.readFile(configPath, "utf8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return "";
    }
    throw error;
  }
}

async function resolveTarget(configPath: string): Promise<{ file: string; mode: number }> {
  try {
    const file = await fs.realpath(configPath);
    const stat = await fs.stat(file);
    return { file, mode: stat.mode & 0o777 };
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return { file: path.resolve(configPath), mode: 0o600 };
    }
    throw error;
  }
}

async function writeFileAtomic(file: string, content: string, mode: number): Promise<void> {
  const dir = path.dirname(file);
  await fs.mkdir(dir, { recursive: true, mode: 0o700 });
  const tmp = path.join(dir, `.${path.basename(file)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await fs.writeFile(tmp, content, { encoding: "utf8", mode });
    await fs.rename(tmp, file);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
}

/**
 * Inserts or replaces the `Host <alias>` block of an OpenSSH client config.
 * Other blocks are left untouched and the file is replaced atomically.
 */
export async function syncHostEntry(configPath: string, entry: SshHostEntry): Promise<SyncStatus> {
  try {
    const current = await readSshConfig(configPath);
    const next = upsertHostBlock(current, entry);
    if (next.status === "unchanged") {
      return next.status;
    }
    const target = await resolveTarget(configPath);
    await writeFileAtomic(target.file, next.content, target.mode);
    return next.status;
  } catch (error) {
    throw new ConfigWriteError(configPath, { cause: error });
  }
}
