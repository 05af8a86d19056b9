import { parseArgs } from "node:util";
import { z } from "zod";
import { booleanWord } from "./vocabulary.js";

export const USAGE = `Usage: meeting-calendar <input.yaml> <output.txt|-> [options]

Options:
  --year YYYY           resolve undated standard rules in this year (repeatable)
  --strict-overrides    fail when an ad-hoc entry matches no meeting
  --check               read and resolve the input, write nothing
  -h, --help            show this help

Environment:
  LOG_LEVEL                   fatal|error|warn|info|debug|trace|silent (default info)
  NODE_ENV=development        pretty log output
  CALENDAR_STRICT_OVERRIDES   same as --strict-overrides`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const configSchema = z
  .object({
    input: z.string({ required_error: "missing input file" }).min(1),
    /** "-" writes to stdout */
    output: z.string().min(1).optional(),
    years: z
      .array(
        z
          .string()
          .regex(/^\d{4}$/, "--year takes a four-digit year")
          .transform((year) => parseInt(year, 10)),
      )
      .optional(),
    strictOverrides: z.boolean(),
    check: z.boolean(),
    logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
    pretty: z.boolean(),
  })
  .refine((config) => config.check || config.output !== undefined, {
    message: "missing output file (or use --check)",
    path: ["output"],
  });

export type Config = z.infer<typeof configSchema>;

export type Command = { kind: "help" } | { kind: "run"; config: Config };

function envFlag(value: string | undefined, name: string): boolean {
  if (value === undefined || value === "") return false;
  const flag = booleanWord(value);
  if (flag === undefined) {
    throw new UsageError(`${name} must be true or false, got "${value}"`);
  }
  return flag;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        year: { type: "string", multiple: true },
        "strict-overrides": { type: "boolean", default: false },
        check: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Build the run configuration from command-line arguments (without the
 * node and script paths) and the environment.
 * Throws UsageError for unknown options or missing/invalid values.
 */
export function parseCommandLine(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Command {
  const { values, positionals } = readArgs(argv);
  if (values.help) return { kind: "help" };
  if (positionals.length > 2) {
    throw new UsageError(`unexpected argument "${positionals[2]}"`);
  }

  const result = configSchema.safeParse({
    input: positionals[0],
    output: positionals[1],
    years: values.year,
    strictOverrides:
      values["strict-overrides"] ||
      envFlag(env.CALENDAR_STRICT_OVERRIDES, "CALENDAR_STRICT_OVERRIDES"),
    check: values.check,
    logLevel: env.LOG_LEVEL || "info",
    pretty: env.NODE_ENV === "development",
  });
  if (!result.success) {
    throw new UsageError(result.error.issues.map((issue) => issue.message).join("; "));
  }
  return { kind: "run", config: result.data };
}
