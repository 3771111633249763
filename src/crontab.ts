/**
 * Crontab entries: rendering, shell quoting and appending to a cron file.
 */

import { existsSync } from "node:fs";
import { type FileHandle, appendFile, mkdir, open } from "node:fs/promises";
import path from "node:path";
import type { CronExpression } from "./ast.js";
import { formatCron } from "./ast.js";
import { createLogger } from "./logger.js";

const log = createLogger("crontab");

export interface EnvVar {
  key: string;
  value: string;
}

export interface EntrySchedule extends CronExpression {
  explanation: string;
}

export interface CronEntry {
  schedule: EntrySchedule;
  command: string;
  comment: string | null;
  env: EnvVar[];
}

export type CrontabOperation = "mkdir" | "inspect" | "append";

/** A cron file could not be prepared, read or written. */
export class CrontabError extends Error {
  readonly file: string;
  readonly operation: CrontabOperation;

  constructor(
    message: string,
    file: string,
    operation: CrontabOperation,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "CrontabError";
    this.file = file;
    this.operation = operation;
  }
}

// --- Commands ---

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a command word for /bin/sh only when it needs it. Single quotes stop
 * all expansion; an embedded quote becomes '\''.
 */
export function quoteArg(part: string): string {
  if (part.includes("\0")) {
    throw new Error(`Invalid command segment \`${part}\`: contains a NUL byte`);
  }
  if (SAFE_WORD.test(part)) return part;
  return "'" + part.replace(/'/g, "'\\''") + "'";
}

export function joinCommand(parts: string[]): string {
  return parts.map(quoteArg).join(" ");
}

// --- Rendering ---

/**
 * Comment, env assignments, then the schedule line. Crontab is line-based, so
 * a line break in any part would start a new entry; quoting does not help.
 */
export function renderEntry(entry: CronEntry): string {
  const lines: string[] = [];
  if (entry.comment !== null) {
    lines.push(`# ${singleLine(entry.comment, "comment")}`);
  }
  for (const env of entry.env) {
    const key = singleLine(env.key, "environment key");
    lines.push(`${key}=${singleLine(env.value, `value of ${key}`)}`);
  }
  const command = singleLine(entry.command, "command");
  lines.push(`${formatCron(entry.schedule)} ${command}`);
  return lines.join("\n");
}

function singleLine(text: string, label: string): string {
  if (/[\r\n]/.test(text)) {
    throw new Error(`Invalid ${label} ${JSON.stringify(text)}: contains a line break`);
  }
  return text;
}

// --- Cron file discovery ---

/**
 * `$CRONTAB`, else the first spool location that exists (or whose directory
 * does), else `~/.crontab`.
 */
export function detectCronFile(
  env: NodeJS.ProcessEnv = process.env,
  exists: (file: string) => boolean = existsSync,
): string {
  if (env.CRONTAB) return env.CRONTAB;

  const username = env.USER ?? env.USERNAME ?? "user";
  const candidates = [
    `/var/spool/cron/crontabs/${username}`,
    `/var/spool/cron/${username}`,
    `/etc/cron.d/${username}`,
  ];

  for (const candidate of candidates) {
    if (exists(candidate) || exists(path.dirname(candidate))) {
      log.debug("using spool file", candidate);
      return candidate;
    }
  }

  return defaultCronFile(env);
}

export function defaultCronFile(env: NodeJS.ProcessEnv = process.env): string {
  const home = env.HOME ?? env.USERPROFILE ?? ".";
  return path.join(home, ".crontab");
}

// --- Appending ---

/**
 * Append a rendered entry, creating parent directories. A file that does not
 * end in a newline gets one before the entry.
 */
export async function appendEntry(file: string, block: string): Promise<void> {
  const dir = path.dirname(file);
  if (dir !== "" && dir !== ".") {
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw new CrontabError(`Failed creating ${dir}`, file, "mkdir", error);
    }
  }

  let payload = "";
  if (await needsLeadingNewline(file)) {
    payload += "\n";
  }
  payload += `${block}\n`;

  log.debug(`appending ${payload.length} bytes to ${file}`);
  try {
    await appendFile(file, payload, "utf-8");
  } catch (error) {
    throw new CrontabError(`Failed writing to ${file}`, file, "append", error);
  }
}

async function needsLeadingNewline(file: string): Promise<boolean> {
  let handle: FileHandle;
  try {
    handle = await open(file, "r");
  } catch (error) {
    if (isNotFound(error)) return false;
    throw new CrontabError(`Failed opening ${file}`, file, "inspect", error);
  }

  try {
    const { size } = await handle.stat();
    if (size === 0) return false;
    const tail = Buffer.alloc(1);
    await handle.read(tail, 0, 1, size - 1);
    return tail[0] !== 0x0a;
  } catch (error) {
    throw new CrontabError(
      `Failed reading tail byte of ${file}`,
      file,
      "inspect",
      error,
    );
  } finally {
    await handle.close();
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
