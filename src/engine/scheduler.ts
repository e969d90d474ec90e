import { SchedulingError } from "../core/errors";
import { createProcess } from "../core/process";
import type { Process, ProcessSpec } from "../core/process";
import type { ExecutionSegment, ScheduleResult } from "../core/segment";
import type { Completion, SimulationState } from "../core/state";
import { Logger } from "../logger";
import type { Algorithm } from "./algorithm";
import { assemble } from "./assembler";
import { createReadyQueue } from "./strategy";
import { step } from "./tick";

const log = Logger.for("scheduler");

export type Simulation = {
  algorithm: Algorithm;
  processes: Process[];
  segments: ExecutionSegment[];
  completions: Completion[];
  time: number;
};

function buildProcesses(specs: readonly ProcessSpec[]): Process[] {
  if (specs.length === 0) {
    throw new SchedulingError("EmptyInput", "No processes supplied");
  }

  const seen = new Set<number>();
  const processes: Process[] = [];
  let latestArrival = 0;
  let totalBurst = 0;

  for (const spec of specs) {
    const process = createProcess(spec);
    if (seen.has(process.id)) {
      throw new SchedulingError(
        "DuplicateProcessID",
        `Duplicate process id ${process.id}`
      );
    }
    seen.add(process.id);
    processes.push(process);

    latestArrival = Math.max(latestArrival, process.arrivalTime);
    totalBurst += process.burstTime;
  }

  // the clock never passes the last arrival plus all work; keep it exact
  if (latestArrival + totalBurst > Number.MAX_SAFE_INTEGER) {
    throw new SchedulingError(
      "InvalidProcess",
      "Process set exceeds the representable time range"
    );
  }

  return processes;
}

export function initialState(
  specs: readonly ProcessSpec[],
  algorithm: Algorithm
): SimulationState {
  const processes = buildProcesses(specs);

  return {
    time: 0,
    phase: { kind: "idle" },
    algorithm,
    processes,
    pending: [...processes].sort(
      (a, b) => a.arrivalTime - b.arrivalTime || a.id - b.id
    ),
    unfinished: processes.length,
    segments: [],
    completions: [],
  };
}

/**
 * Runs one scheduling request to completion. Every call owns its state,
 * so concurrent requests need no coordination.
 */
export function simulate(
  specs: readonly ProcessSpec[],
  algorithm: Algorithm
): Simulation {
  let state = initialState(specs, algorithm);
  const queue = createReadyQueue(algorithm);

  log.debug("Simulation started", {
    algorithm: algorithm.kind,
    processes: state.processes.length,
  });

  while (state.phase.kind !== "completed") {
    state = step(state, queue);
  }

  log.debug("Simulation finished", {
    algorithm: algorithm.kind,
    segments: state.segments.length,
    time: state.time,
  });

  return {
    algorithm,
    processes: state.processes,
    segments: state.segments,
    completions: state.completions,
    time: state.time,
  };
}

export function schedule(
  specs: readonly ProcessSpec[],
  algorithm: Algorithm
): ScheduleResult {
  return assemble(simulate(specs, algorithm).segments);
}
