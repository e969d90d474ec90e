import { parentPort } from "node:worker_threads";
import { Logger } from "../logger";
import { handleWorkerMessage } from "./protocol";

const log = Logger.for("worker");

if (parentPort === null) {
  throw new Error("schedule.worker must be started as a worker thread");
}

const port = parentPort;

port.on("message", (message: unknown) => {
  const reply = handleWorkerMessage(message);
  if (reply === undefined) {
    log.warn("Ignoring message without a request id");
    return;
  }
  port.postMessage(reply);
});
