import { suite, test, setup, teardown } from "mocha";
import * as assert from "assert";
import { handleWorkerMessage } from "../../../worker/protocol";
import { Logger } from "../../../logger";
import type { LogLevel } from "../../../config";

suite("Worker protocol", () => {
  let previous: LogLevel;

  setup(() => {
    previous = Logger.getLevel();
    Logger.setLevel("silent");
  });

  teardown(() => {
    Logger.setLevel(previous);
  });

  test("answers a SCHEDULE message with its result", () => {
    const reply = handleWorkerMessage({
      type: "SCHEDULE",
      requestId: 7,
      route: "fcfs",
      payload: { processes: [[1, 0, 5, 0]] },
    });
    assert.deepStrictEqual(reply, {
      type: "RESULT",
      requestId: 7,
      response: { order: [1], finish: [5] },
    });
  });

  test("passes scheduling errors back as error responses", () => {
    const reply = handleWorkerMessage({
      type: "SCHEDULE",
      requestId: 8,
      route: "rr",
      payload: { processes: [[1, 0, 5, 0]], quantum: -1 },
    });
    assert.deepStrictEqual(reply, {
      type: "RESULT",
      requestId: 8,
      response: { error: "Quantum must be a positive integer, got -1" },
    });
  });

  test("rejects an unknown message type that carries a request id", () => {
    assert.deepStrictEqual(handleWorkerMessage({ type: "PING", requestId: 3 }), {
      type: "RESULT",
      requestId: 3,
      response: { error: "Unsupported worker message" },
    });
  });

  test("ignores messages without a request id", () => {
    assert.strictEqual(handleWorkerMessage("hello"), undefined);
  });
});
