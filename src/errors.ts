export type CalendarInputErrorKind = "malformed-input" | "ambiguous-override";

/** Where in the input file an error was found */
export interface InputErrorContext {
  group?: string;
  year?: number;
  entry?: string;
  rule?: string;
  path?: string;
}

/**
 * A problem in the hand-written input. Always fatal: the run stops and
 * nothing is written.
 */
export class CalendarInputError extends Error {
  constructor(
    message: string,
    public readonly kind: CalendarInputErrorKind,
    public readonly context: InputErrorContext = {},
  ) {
    super(message);
    this.name = "CalendarInputError";
  }
}

export function malformed(message: string, context: InputErrorContext = {}): CalendarInputError {
  return new CalendarInputError(message, "malformed-input", context);
}
