import { Worker } from "node:worker_threads";
import type { ScheduleResponse } from "../api/handler";
import { loadConfig } from "../config";
import { Logger } from "../logger";
import { resultMessageSchema } from "./protocol";
import type { ScheduleMessage } from "./protocol";

const log = Logger.for("worker");

/** The part of `worker_threads.Worker` the client relies on. */
export interface WorkerHandle {
  on(event: "message", listener: (message: unknown) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "exit", listener: (code: number) => void): unknown;
  postMessage(value: unknown): void;
  terminate(): Promise<number>;
}

export type WorkerFactory = () => WorkerHandle;

export type WorkerClientOptions = {
  timeoutMs?: number;
  createWorker?: WorkerFactory;
};

/** Worker bundle emitted next to the package entry (`dist/worker.js`). */
export const WORKER_URL = new URL("./worker.js", import.meta.url);

const defaultWorker: WorkerFactory = () => new Worker(WORKER_URL);

// each request gets its own worker, so one id per worker is enough
const REQUEST_ID = 1;

/**
 * Runs one scheduling request on its own worker thread. The worker is
 * terminated once the request settles; on timeout the in-flight
 * simulation is discarded.
 */
export function scheduleInWorker(
  route: string,
  payload: unknown,
  options: WorkerClientOptions = {}
): Promise<ScheduleResponse> {
  const timeoutMs = options.timeoutMs ?? loadConfig().requestTimeoutMs;
  const worker = (options.createWorker ?? defaultWorker)();
  const requestId = REQUEST_ID;

  return new Promise((resolve) => {
    let settled = false;

    const settle = (response: ScheduleResponse) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      worker.terminate().catch((err: unknown) => {
        log.error("Failed to terminate scheduling worker", err);
      });
      resolve(response);
    };

    const timer = setTimeout(() => {
      log.warn("Scheduling request timed out", { route, requestId, timeoutMs });
      settle({ error: `Scheduling request timed out after ${timeoutMs}ms` });
    }, timeoutMs);

    worker.on("message", (message: unknown) => {
      const reply = resultMessageSchema.safeParse(message);
      if (!reply.success || reply.data.requestId !== requestId) {
        log.warn("Ignoring unexpected worker message", { route, requestId });
        return;
      }
      settle(reply.data.response);
    });

    worker.on("error", (err: Error) => {
      log.error("Scheduling worker failed", err);
      settle({ error: `Scheduling worker failed: ${err.message}` });
    });

    worker.on("exit", (code: number) => {
      settle({ error: `Scheduling worker failed: exited with code ${code}` });
    });

    const message: ScheduleMessage = { type: "SCHEDULE", requestId, route, payload };
    worker.postMessage(message);
  });
}
