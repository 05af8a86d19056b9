import { readFile, writeFile } from "node:fs/promises";
import type { Logger } from "pino";
import { parseCommandLine, USAGE, UsageError, type Config } from "./config.js";
import { CalendarInputError } from "./errors.js";
import { toCalendarText } from "./generate.js";
import { createLogger } from "./logger.js";
import { parseCalendarYaml } from "./parse.js";
import { documentYears, resolveCalendar } from "./resolve.js";

export const ExitCode = {
  Ok: 0,
  Failed: 1,
  Usage: 2,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export interface TextSink {
  write(text: string): unknown;
}

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  /** Replaces the logger built from the configuration */
  logger?: Logger;
  stdout?: TextSink;
  stderr?: TextSink;
}

async function convert(config: Config, logger: Logger, stdout: TextSink): Promise<void> {
  const text = await readFile(config.input, "utf8");
  const doc = parseCalendarYaml(text);
  logger.debug(
    { years: config.years ?? documentYears(doc), groups: doc.groups.length },
    "resolving calendar",
  );

  // nothing is written until every entry has resolved
  const events = resolveCalendar(doc, {
    years: config.years,
    strictOverrides: config.strictOverrides,
  });
  const output = toCalendarText(events);

  if (config.check || config.output === undefined) {
    logger.info({ input: config.input, lines: events.length }, "input is valid");
    return;
  }
  if (config.output === "-") {
    stdout.write(output);
  } else {
    await writeFile(config.output, output, "utf8");
  }
  logger.info({ output: config.output, lines: events.length }, "calendar written");
}

/**
 * Run the command line with the given arguments and return the exit code.
 */
export async function run(argv: string[], opts: RunOptions = {}): Promise<ExitCodeValue> {
  const stdout = opts.stdout ?? process.stdout;
  const stderr = opts.stderr ?? process.stderr;

  let config: Config;
  try {
    const command = parseCommandLine(argv, opts.env ?? process.env);
    if (command.kind === "help") {
      stdout.write(`${USAGE}\n`);
      return ExitCode.Ok;
    }
    config = command.config;
  } catch (error) {
    if (error instanceof UsageError) {
      stderr.write(`Error: ${error.message}\n\n${USAGE}\n`);
      return ExitCode.Usage;
    }
    throw error;
  }

  const logger = opts.logger ?? createLogger({ level: config.logLevel, pretty: config.pretty });
  try {
    await convert(config, logger, stdout);
    return ExitCode.Ok;
  } catch (error) {
    if (error instanceof CalendarInputError) {
      logger.error({ kind: error.kind, ...error.context }, error.message);
    } else {
      logger.error({ err: error, input: config.input }, "failed to build calendar");
    }
    return ExitCode.Failed;
  }
}
