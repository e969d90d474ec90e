import type { Process } from "./process";
import type { ExecutionSegment } from "./segment";
import type { Algorithm } from "../engine/algorithm";
import type { Dispatch } from "../engine/strategy";

export type SimulationPhase =
  | { kind: "idle" }
  | { kind: "dispatching" }
  | { kind: "running"; dispatch: Dispatch }
  | { kind: "completed" };

export type Completion = {
  process: Process;
  firstStart: number;
  completion: number;
};

export type SimulationState = {
  time: number;
  phase: SimulationPhase;

  algorithm: Algorithm;

  processes: Process[];
  // not yet arrived, ordered by arrival time then id
  pending: Process[];

  unfinished: number;

  segments: ExecutionSegment[];
  completions: Completion[];
};
