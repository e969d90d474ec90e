import { SchedulingError } from "../core/errors";
import type { Process } from "../core/process";

export type AlgorithmName = "FCFS" | "SJF" | "PRIORITY" | "ROUND_ROBIN";

export type Algorithm =
  | { kind: "FCFS" }
  | { kind: "SJF" }
  | { kind: "PRIORITY" }
  | { kind: "ROUND_ROBIN"; quantum: number };

export type ProcessComparator = (a: Process, b: Process) => number;

const byArrival: ProcessComparator = (a, b) =>
  a.arrivalTime - b.arrivalTime || a.id - b.id;

/**
 * Selection order of the non-preemptive disciplines. The head of the
 * sorted ready set runs next.
 */
export const ORDERINGS: Record<Exclude<AlgorithmName, "ROUND_ROBIN">, ProcessComparator> = {
  FCFS: byArrival,
  SJF: (a, b) => a.remaining - b.remaining || byArrival(a, b),
  PRIORITY: (a, b) => a.priority - b.priority || byArrival(a, b),
};

const ALIASES: Record<string, AlgorithmName> = {
  fcfs: "FCFS",
  sjf: "SJF",
  pri: "PRIORITY",
  priority: "PRIORITY",
  rr: "ROUND_ROBIN",
  "round-robin": "ROUND_ROBIN",
  round_robin: "ROUND_ROBIN",
};

export const fcfs: Algorithm = { kind: "FCFS" };
export const sjf: Algorithm = { kind: "SJF" };
export const priority: Algorithm = { kind: "PRIORITY" };

export function roundRobin(quantum: number): Algorithm {
  if (!Number.isSafeInteger(quantum) || quantum <= 0) {
    throw new SchedulingError(
      "InvalidQuantum",
      `Quantum must be a positive integer, got ${quantum}`
    );
  }
  return { kind: "ROUND_ROBIN", quantum };
}

export function parseAlgorithmName(selector: string): AlgorithmName {
  const name = ALIASES[selector.trim().toLowerCase()];
  if (name === undefined) {
    throw new SchedulingError(
      "UnsupportedAlgorithm",
      `Unsupported scheduling algorithm: ${selector}`
    );
  }
  return name;
}

export function algorithmFor(name: AlgorithmName, quantum?: number): Algorithm {
  switch (name) {
    case "FCFS":
      return fcfs;
    case "SJF":
      return sjf;
    case "PRIORITY":
      return priority;
    case "ROUND_ROBIN":
      if (quantum === undefined) {
        throw new SchedulingError(
          "InvalidQuantum",
          "Quantum must be provided for Round Robin scheduling"
        );
      }
      return roundRobin(quantum);
  }
}

export function resolveAlgorithm(selector: string, quantum?: number): Algorithm {
  return algorithmFor(parseAlgorithmName(selector), quantum);
}
