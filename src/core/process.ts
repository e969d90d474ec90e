import { SchedulingError } from "./errors";

export type ProcessSpec = {
  id: number;
  arrivalTime: number;
  burstTime: number;
  priority: number;
};

export type Process = {
  readonly id: number;
  readonly arrivalTime: number;
  readonly burstTime: number;
  readonly priority: number;

  remaining: number;
  startedAt?: number;
  finishedAt?: number; // clock value when remaining reached 0
};

function invalid(spec: ProcessSpec, reason: string): SchedulingError {
  return new SchedulingError(
    "InvalidProcess",
    `Invalid process ${spec.id}: ${reason}`
  );
}

export function createProcess(spec: ProcessSpec): Process {
  if (!Number.isSafeInteger(spec.id) || spec.id <= 0) {
    throw invalid(spec, "id must be a positive integer");
  }
  if (!Number.isSafeInteger(spec.arrivalTime) || spec.arrivalTime < 0) {
    throw invalid(spec, "arrival time must be a non-negative integer");
  }
  if (!Number.isSafeInteger(spec.burstTime) || spec.burstTime <= 0) {
    throw invalid(spec, "burst time must be a positive integer");
  }
  if (!Number.isSafeInteger(spec.priority)) {
    throw invalid(spec, "priority must be an integer");
  }

  return {
    id: spec.id,
    arrivalTime: spec.arrivalTime,
    burstTime: spec.burstTime,
    priority: spec.priority,
    remaining: spec.burstTime,
  };
}

/** Consumes up to `amount` of CPU time and returns what was actually used. */
export function runFor(process: Process, amount: number): number {
  const used = Math.max(0, Math.min(amount, process.remaining));
  process.remaining -= used;
  return used;
}

export function isFinished(process: Process): boolean {
  return process.remaining === 0;
}
