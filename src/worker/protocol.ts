import { z } from "zod";
import { handleScheduleRequest } from "../api/handler";
import type { ScheduleResponse } from "../api/handler";

export type ScheduleMessage = {
  type: "SCHEDULE";
  requestId: number;
  route: string;
  payload: unknown;
};

export type ResultMessage = {
  type: "RESULT";
  requestId: number;
  response: ScheduleResponse;
};

const scheduleMessageSchema = z.object({
  type: z.literal("SCHEDULE"),
  requestId: z.number().int(),
  route: z.string(),
  payload: z.unknown(),
});

const requestIdSchema = z.object({ requestId: z.number().int() });

export const resultMessageSchema = z.object({
  type: z.literal("RESULT"),
  requestId: z.number().int(),
  response: z.union([
    z.object({ order: z.array(z.number()), finish: z.array(z.number()) }),
    z.object({ error: z.string() }),
  ]),
});

/**
 * Answers one message posted to a scheduling worker. Messages without a
 * request id get no reply.
 */
export function handleWorkerMessage(message: unknown): ResultMessage | undefined {
  const parsed = scheduleMessageSchema.safeParse(message);
  if (parsed.success) {
    const { requestId, route, payload } = parsed.data;
    return {
      type: "RESULT",
      requestId,
      response: handleScheduleRequest(route, payload),
    };
  }

  const withId = requestIdSchema.safeParse(message);
  if (withId.success) {
    return {
      type: "RESULT",
      requestId: withId.data.requestId,
      response: { error: "Unsupported worker message" },
    };
  }

  return undefined;
}
