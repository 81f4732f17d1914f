import { STREAM_LABELS, type StreamKind } from "../streams/kinds.js";

/**
 * Raised by an extractor when a stream carries too few records to analyze.
 * Recoverable: callers report the shortfall instead of a verdict.
 */
export class InsufficientDataError extends Error {
  public readonly stream: StreamKind;
  public readonly found: number;
  public readonly required: number;

  constructor(stream: StreamKind, found: number, required: number, detail?: string) {
    const suffix = detail ? ` (${detail})` : "";
    super(
      `Insufficient ${STREAM_LABELS[stream].noun} for analysis: found ${found}, need at least ${required}.${suffix}`,
    );
    this.name = "InsufficientDataError";
    this.stream = stream;
    this.found = found;
    this.required = required;
  }
}

export function isInsufficientDataError(error: unknown): error is InsufficientDataError {
  return error instanceof InsufficientDataError;
}

/** A stored or imported record that does not match its stream's schema. */
export class RecordDecodeError extends Error {
  public readonly stream: StreamKind;
  public readonly recordRef: string;

  constructor(stream: StreamKind, recordRef: string, reason: string) {
    super(`Invalid ${stream} record ${recordRef}: ${reason}`);
    this.name = "RecordDecodeError";
    this.stream = stream;
    this.recordRef = recordRef;
  }
}
