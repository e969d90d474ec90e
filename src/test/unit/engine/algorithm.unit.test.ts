import { suite, test } from "mocha";
import * as assert from "assert";
import { resolveAlgorithm, roundRobin } from "../../../engine/algorithm";
import { isSchedulingError } from "../../../core/errors";

suite("Algorithm selection", () => {
  test("resolves route selectors case-insensitively", () => {
    assert.deepStrictEqual(resolveAlgorithm("fcfs"), { kind: "FCFS" });
    assert.deepStrictEqual(resolveAlgorithm(" SJF "), { kind: "SJF" });
    assert.deepStrictEqual(resolveAlgorithm("pri"), { kind: "PRIORITY" });
    assert.deepStrictEqual(resolveAlgorithm("priority"), { kind: "PRIORITY" });
    assert.deepStrictEqual(resolveAlgorithm("RR", 3), { kind: "ROUND_ROBIN", quantum: 3 });
    assert.deepStrictEqual(resolveAlgorithm("round-robin", 1), { kind: "ROUND_ROBIN", quantum: 1 });
  });

  test("rejects an unknown selector", () => {
    assert.throws(
      () => resolveAlgorithm("lottery"),
      (err: unknown) =>
        isSchedulingError(err) &&
        err.kind === "UnsupportedAlgorithm" &&
        err.message === "Unsupported scheduling algorithm: lottery"
    );
  });

  test("requires a quantum for Round Robin", () => {
    assert.throws(
      () => resolveAlgorithm("rr"),
      (err: unknown) =>
        isSchedulingError(err) &&
        err.kind === "InvalidQuantum" &&
        err.message === "Quantum must be provided for Round Robin scheduling"
    );
  });

  for (const quantum of [0, -2, 1.5]) {
    test(`rejects quantum ${quantum}`, () => {
      assert.throws(
        () => roundRobin(quantum),
        (err: unknown) => isSchedulingError(err) && err.kind === "InvalidQuantum"
      );
    });
  }

  test("ignores the quantum for non-preemptive disciplines", () => {
    assert.deepStrictEqual(resolveAlgorithm("sjf", 0), { kind: "SJF" });
  });
});
