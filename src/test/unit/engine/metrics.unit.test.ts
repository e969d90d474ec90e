import { suite, test } from "mocha";
import * as assert from "assert";
import { fcfs, roundRobin } from "../../../engine/algorithm";
import { computeMetrics } from "../../../engine/metrics";
import { simulate } from "../../../engine/scheduler";

suite("Schedule metrics", () => {
  test("Round Robin turnaround, waiting and response", () => {
    const metrics = computeMetrics(
      simulate(
        [
          { id: 1, arrivalTime: 0, burstTime: 4, priority: 0 },
          { id: 2, arrivalTime: 1, burstTime: 3, priority: 0 },
        ],
        roundRobin(2)
      )
    );

    assert.deepStrictEqual(metrics.processes, [
      {
        processId: 1,
        arrivalTime: 0,
        burstTime: 4,
        firstStart: 0,
        completion: 6,
        turnaround: 6,
        waiting: 2,
        response: 0,
      },
      {
        processId: 2,
        arrivalTime: 1,
        burstTime: 3,
        firstStart: 2,
        completion: 7,
        turnaround: 6,
        waiting: 3,
        response: 1,
      },
    ]);
    assert.strictEqual(metrics.averageTurnaround, 6);
    assert.strictEqual(metrics.averageWaiting, 2.5);
    assert.strictEqual(metrics.averageResponse, 0.5);
    assert.strictEqual(metrics.makespan, 7);
    assert.strictEqual(metrics.busyTime, 7);
    assert.strictEqual(metrics.cpuUtilization, 1);
    assert.strictEqual(metrics.throughput, 0.29);
    assert.strictEqual(metrics.contextSwitches, 3);
  });

  test("idle time lowers utilization", () => {
    const metrics = computeMetrics(
      simulate(
        [
          { id: 1, arrivalTime: 2, burstTime: 3, priority: 0 },
          { id: 2, arrivalTime: 10, burstTime: 1, priority: 0 },
        ],
        fcfs
      )
    );

    assert.strictEqual(metrics.makespan, 11);
    assert.strictEqual(metrics.busyTime, 4);
    assert.strictEqual(metrics.cpuUtilization, 0.36);
    assert.strictEqual(metrics.throughput, 0.18);
    assert.strictEqual(metrics.averageTurnaround, 2);
    assert.strictEqual(metrics.averageWaiting, 0);
    assert.strictEqual(metrics.contextSwitches, 1);
  });
});
