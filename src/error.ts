/** Character range within the space-joined spec. */
export interface Span {
  start: number;
  end: number;
}

export type TimespecErrorKind =
  | "malformedToken"
  | "directionViolation"
  | "emptyCandidateList"
  | "emptyDomain"
  | "noMatch";

/** All errors produced by timespec. */
export class TimespecError extends Error {
  readonly kind: TimespecErrorKind;
  readonly span?: Span;
  readonly input?: string;
  readonly field?: string;

  constructor(
    kind: TimespecErrorKind,
    message: string,
    span?: Span,
    input?: string,
    field?: string,
  ) {
    super(message);
    this.name = "TimespecError";
    this.kind = kind;
    this.span = span;
    this.input = input;
    this.field = field;
  }

  static malformedToken(message: string, span: Span, input: string): TimespecError {
    return new TimespecError("malformedToken", message, span, input);
  }

  static directionViolation(span: Span, input: string): TimespecError {
    return new TimespecError(
      "directionViolation",
      "specified date out of range",
      span,
      input,
    );
  }

  static emptyCandidateList(): TimespecError {
    return new TimespecError("emptyCandidateList", "empty candidate list");
  }

  static emptyDomain(field: string): TimespecError {
    return new TimespecError(
      "emptyDomain",
      "no matching value",
      undefined,
      undefined,
      field,
    );
  }

  static noMatch(): TimespecError {
    return new TimespecError("noMatch", "no matching datetime");
  }

  displayRich(): string {
    if (this.span && this.input !== undefined) {
      let out = `error: ${this.message}\n`;
      out += `  ${this.input}\n`;
      const padding = " ".repeat(this.span.start + 2);
      const underline = "^".repeat(Math.max(this.span.end - this.span.start, 1));
      out += padding + underline;
      return out;
    }
    if (this.field) {
      return `error: ${this.message} for ${this.field}`;
    }
    return `error: ${this.message}`;
  }
}
