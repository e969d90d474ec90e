import type { SimulationState } from "../core/state";
import { isFinished, runFor } from "../core/process";
import type { ReadyQueue } from "./strategy";

function admitArrivals(state: SimulationState, queue: ReadyQueue): void {
  while (state.pending.length > 0 && state.pending[0].arrivalTime <= state.time) {
    const arrived = state.pending.shift();
    if (arrived !== undefined) queue.admit(arrived);
  }
}

/**
 * Advances the simulation by one state-machine transition.
 */
export function step(state: SimulationState, queue: ReadyQueue): SimulationState {
  const phase = state.phase;

  switch (phase.kind) {
    case "idle": {
      if (state.unfinished === 0) {
        state.phase = { kind: "completed" };
        break;
      }

      // jump straight to the next arrival instead of ticking through idle time
      if (queue.size === 0 && state.pending.length > 0) {
        state.time = Math.max(state.time, state.pending[0].arrivalTime);
      }

      admitArrivals(state, queue);
      state.phase = { kind: "dispatching" };
      break;
    }

    case "dispatching": {
      const dispatch = queue.next();
      state.phase =
        dispatch === undefined ? { kind: "idle" } : { kind: "running", dispatch };
      break;
    }

    case "running": {
      const { process, duration } = phase.dispatch;
      const start = state.time;
      const firstStart = process.startedAt ?? start;
      process.startedAt = firstStart;

      state.time += runFor(process, duration);
      state.segments.push({ processId: process.id, start, end: state.time });

      if (isFinished(process)) {
        process.finishedAt = state.time;
        state.completions.push({ process, firstStart, completion: state.time });
        state.unfinished--;
      }

      // arrivals during the slice queue up ahead of the process that just ran
      admitArrivals(state, queue);
      queue.release(process);

      if (state.unfinished === 0) {
        state.phase = { kind: "completed" };
      } else {
        state.phase = { kind: queue.size > 0 ? "dispatching" : "idle" };
      }
      break;
    }

    case "completed":
      break;
  }

  return state;
}
