import { Chalk, type ChalkInstance } from "chalk";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import {
  type CronEntry,
  type EnvVar,
  appendEntry,
  detectCronFile,
  joinCommand,
  renderEntry,
} from "./crontab.js";
import type { TranslateError } from "./error.js";
import { listSupportedPatterns, translate } from "./index.js";
import { createLogger } from "./logger.js";

const VERSION = "0.1.0";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  env: NodeJS.ProcessEnv;
  isTTY: boolean;
}

export function processIO(): CliIO {
  return {
    stdout: (text) => {
      process.stdout.write(`${text}\n`);
    },
    stderr: (text) => {
      process.stderr.write(`${text}\n`);
    },
    env: process.env,
    isTTY: Boolean(process.stdout.isTTY),
  };
}

type CliOptions = {
  comment?: string;
  file?: string;
  write?: boolean;
  dryRun?: boolean;
  json?: boolean;
  color: boolean;
  listPatterns?: boolean;
  env: EnvVar[];
};

export interface JsonReport {
  cron: string;
  entry: CronEntry;
  file: string | null;
  wroteFile: boolean;
  dryRun: boolean;
}

class Painter {
  private readonly chalk: ChalkInstance;

  constructor(enabled: boolean) {
    this.chalk = new Chalk({ level: enabled ? 1 : 0 });
  }

  accent(text: string): string {
    return this.chalk.cyanBright(text);
  }

  success(text: string): string {
    return this.chalk.greenBright(text);
  }

  warn(text: string): string {
    return this.chalk.yellowBright(text);
  }
}

/** Parse `KEY=value`; the key is trimmed and must not be empty. */
export function parseEnvVar(raw: string): EnvVar {
  const eq = raw.indexOf("=");
  if (eq < 0) {
    throw new InvalidArgumentError("Expected key=value");
  }
  const key = raw.slice(0, eq).trim();
  if (key === "") {
    throw new InvalidArgumentError("Environment key cannot be empty");
  }
  return { key, value: raw.slice(eq + 1).trim() };
}

function collectEnv(raw: string, previous: EnvVar[]): EnvVar[] {
  return [...previous, parseEnvVar(raw)];
}

export function buildProgram(io: CliIO): Command {
  return new Command()
    .name("phrasecron")
    .description("Translate natural language schedules into cron entries.")
    .version(VERSION)
    .argument("[expression]", "natural language schedule or raw cron expression")
    .argument("[command...]", "command to schedule")
    .option("-c, --comment <text>", "comment placed above the cron entry")
    .option("-f, --file <file>", "cron file to append the entry to (requires --write)")
    .option("--write", "write the entry to the user's cron file")
    .option("--dry-run", "preview without writing")
    .option("--json", "emit JSON describing the entry")
    .option("--no-color", "disable color")
    .option("--list-patterns", "show phrasing patterns (and quit)")
    .option(
      "--env <key=value>",
      "environment variable set before the entry (repeatable)",
      collectEnv,
      [],
    )
    .passThroughOptions()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.replace(/\n$/, "")),
      writeErr: (text) => io.stderr(text.replace(/\n$/, "")),
    });
}

/** Run the CLI and resolve to the process exit code. */
export async function run(
  argv: string[],
  io: CliIO = processIO(),
): Promise<number> {
  const log = createLogger("cli", io.env);
  const program = buildProgram(io);

  try {
    program.parse(argv, { from: "user" });
    const opts = program.opts<CliOptions>();
    if (opts.file !== undefined && !opts.write) {
      program.error("error: option '-f, --file <file>' requires --write");
    }
    if (!opts.listPatterns && program.args.length < 2) {
      program.error(
        "error: an expression and a command are required unless --list-patterns is used",
      );
    }
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }

  const opts = program.opts<CliOptions>();
  const painter = new Painter(opts.color && io.isTTY && !io.env.NO_COLOR);

  if (opts.listPatterns) {
    printPatternGuide(io, painter);
    return 0;
  }

  const [expression, ...commandParts] = program.args;
  const result = translate(expression);
  if (!result.ok) {
    reportTranslateError(io, expression, result.error, opts.json ?? false);
    return 1;
  }
  const translation = result.value;
  log.debug(`"${expression}" -> ${translation.expression}`);

  let entry: CronEntry;
  let preview: string;
  try {
    entry = {
      schedule: { ...translation.cron, explanation: translation.description },
      command: joinCommand(commandParts),
      comment: opts.comment ?? null,
      env: opts.env,
    };
    preview = renderEntry(entry);
  } catch (error) {
    reportError(io, error);
    return 1;
  }

  let wroteFile = false;
  let targetFile: string | null = null;
  if (opts.write) {
    targetFile = opts.file ?? detectCronFile(io.env);
    if (!opts.dryRun) {
      try {
        await appendEntry(targetFile, preview);
      } catch (error) {
        reportError(io, error);
        return 1;
      }
      wroteFile = true;
    }
  }

  if (opts.json) {
    const report: JsonReport = {
      cron: translation.expression,
      entry,
      file: targetFile,
      wroteFile,
      dryRun: opts.dryRun ?? false,
    };
    io.stdout(JSON.stringify(report, null, 2));
    return 0;
  }

  io.stdout(painter.accent("Parsed Input"));
  io.stdout(
    `Schedule: ${painter.success(translation.expression)}  (${translation.description})`,
  );
  io.stdout(`Command: ${entry.command}`);
  if (entry.comment !== null) {
    io.stdout(`Comment: ${entry.comment}`);
  }
  if (entry.env.length > 0) {
    const envPreview = entry.env.map((e) => `${e.key}=${e.value}`).join(", ");
    io.stdout(`  Env      : ${envPreview}`);
  }
  if (targetFile !== null) {
    const status = wroteFile
      ? painter.success("written")
      : painter.warn("dry run - not written");
    io.stdout(`  File     : ${targetFile} (${status})`);
  }
  io.stdout("");
  io.stdout(painter.accent("Preview Output"));
  io.stdout(preview);
  return 0;
}

function printPatternGuide(io: CliIO, painter: Painter): void {
  io.stdout(painter.accent("Supported phrasing samples:"));
  for (const { syntax, example } of listSupportedPatterns()) {
    io.stdout(`  - ${syntax.padEnd(28)} ${painter.success(`e.g. ${example}`)}`);
  }
}

function reportTranslateError(
  io: CliIO,
  expression: string,
  error: TranslateError,
  json: boolean,
): void {
  if (json) {
    io.stderr(JSON.stringify({ error: error.toJSON() }, null, 2));
    return;
  }
  io.stderr(`Error: Could not parse expression \`${expression}\``);
  for (const line of error.displayRich().split("\n")) {
    io.stderr(`  ${line}`);
  }
  if (error.kind === "noMatch") {
    io.stderr("  Use --list-patterns to list all supported shapes.");
  }
}

function reportError(io: CliIO, error: unknown): void {
  io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
  let cause = error instanceof Error ? error.cause : undefined;
  while (cause !== undefined) {
    io.stderr(`  Caused by: ${cause instanceof Error ? cause.message : String(cause)}`);
    cause = cause instanceof Error ? cause.cause : undefined;
  }
}
