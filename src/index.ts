// core
export * from "./core/errors";
export * from "./core/process";
export * from "./core/segment";
export * from "./core/metrics";

// engine
export * from "./engine/algorithm";
export * from "./engine/strategy";
export * from "./engine/tick";
export * from "./engine/scheduler";
export * from "./engine/assembler";
export * from "./engine/metrics";

// request boundary
export * from "./api/schema";
export * from "./api/handler";

// worker
export * from "./worker/protocol";
export * from "./worker/client";

// ambient
export * from "./config";
export * from "./logger";

// types
export type { SimulationState, SimulationPhase, Completion } from "./core/state";
