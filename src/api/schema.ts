import { z } from "zod";
import { SchedulingError } from "../core/errors";
import type { SchedulingErrorKind } from "../core/errors";
import type { ProcessSpec } from "../core/process";

const integer = z.number().int().safe();

/** `[id, arrivalTime, burstTime, priority]` */
export const processTupleSchema = z.tuple([integer, integer, integer, integer]);

export const scheduleRequestSchema = z.object({
  processes: z.array(processTupleSchema),
  // checked only for Round Robin, see quantumSchema
  quantum: z.unknown(),
});

export const quantumSchema = integer.nullish();

export type ScheduleRequest = z.infer<typeof scheduleRequestSchema>;

export type ParsedRequest = {
  processes: ProcessSpec[];
  quantum?: number;
};

function rejection(
  kind: SchedulingErrorKind,
  issue: z.ZodIssue,
  field = "request"
): SchedulingError {
  const where = issue.path.length > 0 ? issue.path.join(".") : field;
  return new SchedulingError(kind, `Invalid ${where}: ${issue.message}`);
}

export function parseScheduleRequest(
  payload: unknown,
  withQuantum: boolean
): ParsedRequest {
  const parsed = scheduleRequestSchema.safeParse(payload);
  if (!parsed.success) {
    throw rejection("InvalidProcess", parsed.error.issues[0]);
  }

  const processes = parsed.data.processes.map(
    ([id, arrivalTime, burstTime, priority]) => ({
      id,
      arrivalTime,
      burstTime,
      priority,
    })
  );
  if (!withQuantum) return { processes };

  const quantum = quantumSchema.safeParse(parsed.data.quantum);
  if (!quantum.success) {
    throw rejection("InvalidQuantum", quantum.error.issues[0], "quantum");
  }

  return { processes, quantum: quantum.data ?? undefined };
}
