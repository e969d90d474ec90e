export type SchedulingErrorKind =
  | "EmptyInput"
  | "InvalidProcess"
  | "DuplicateProcessID"
  | "InvalidQuantum"
  | "UnsupportedAlgorithm";

/**
 * Rejection of a whole scheduling request. Raised before the simulation
 * starts; a run that has begun always completes.
 */
export class SchedulingError extends Error {
  readonly kind: SchedulingErrorKind;

  constructor(kind: SchedulingErrorKind, message: string) {
    super(message);
    this.name = "SchedulingError";
    this.kind = kind;
  }
}

export function isSchedulingError(value: unknown): value is SchedulingError {
  return value instanceof SchedulingError;
}
