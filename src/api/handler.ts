import { SchedulingError, isSchedulingError } from "../core/errors";
import type { ScheduleResult } from "../core/segment";
import { algorithmFor, parseAlgorithmName } from "../engine/algorithm";
import { schedule } from "../engine/scheduler";
import { Logger } from "../logger";
import { parseScheduleRequest } from "./schema";

const log = Logger.for("api");

export type ErrorResponse = { error: string };

export type ScheduleResponse = ScheduleResult | ErrorResponse;

export function isErrorResponse(response: ScheduleResponse): response is ErrorResponse {
  return "error" in response;
}

/** Accepts `fcfs` as well as `/schedule/fcfs`. */
export function routeSelector(route: string): string {
  const parts = route.split("/").filter((part) => part.length > 0);
  return parts.length > 0 ? parts[parts.length - 1] : route;
}

function run(route: string, payload: unknown): ScheduleResult {
  const name = parseAlgorithmName(routeSelector(route));
  const request = parseScheduleRequest(payload, name === "ROUND_ROBIN");

  if (request.processes.length === 0) {
    throw new SchedulingError("EmptyInput", "No processes supplied");
  }

  const algorithm = algorithmFor(name, request.quantum);

  return schedule(request.processes, algorithm);
}

/**
 * Entry point for one scheduling route. Scheduling errors become an
 * `{ error }` response; anything else propagates.
 */
export function handleScheduleRequest(route: string, payload: unknown): ScheduleResponse {
  try {
    const result = run(route, payload);
    log.debug("Request scheduled", { route, dispatches: result.order.length });
    return result;
  } catch (err) {
    if (!isSchedulingError(err)) throw err;

    log.warn("Request rejected", { route, kind: err.kind, message: err.message });
    return { error: err.message };
  }
}
