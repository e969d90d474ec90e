import type { Process } from "../core/process";
import { ORDERINGS } from "./algorithm";
import type { Algorithm, ProcessComparator } from "./algorithm";

export type Dispatch = {
  process: Process;
  duration: number;
};

/**
 * Ready set of one simulation run. The core admits arrived processes,
 * asks for the next dispatch, and hands back the process once its slice
 * has run.
 */
export interface ReadyQueue {
  readonly size: number;
  admit(process: Process): void;
  next(): Dispatch | undefined;
  release(process: Process): void;
}

class OrderedReadyQueue implements ReadyQueue {
  private readonly ready: Process[] = [];

  constructor(private readonly compare: ProcessComparator) {}

  get size(): number {
    return this.ready.length;
  }

  admit(process: Process): void {
    this.ready.push(process);
  }

  next(): Dispatch | undefined {
    if (this.ready.length === 0) return undefined;

    let best = 0;
    for (let i = 1; i < this.ready.length; i++) {
      if (this.compare(this.ready[i], this.ready[best]) < 0) best = i;
    }

    const [process] = this.ready.splice(best, 1);
    // non-preemptive: the selected process keeps the CPU until it is done
    return { process, duration: process.remaining };
  }

  release(process: Process): void {
    if (process.remaining > 0) this.ready.push(process);
  }
}

class RoundRobinQueue implements ReadyQueue {
  private readonly queue: Process[] = [];

  constructor(private readonly quantum: number) {}

  get size(): number {
    return this.queue.length;
  }

  admit(process: Process): void {
    this.queue.push(process);
  }

  next(): Dispatch | undefined {
    const process = this.queue.shift();
    if (process === undefined) return undefined;
    return { process, duration: Math.min(this.quantum, process.remaining) };
  }

  release(process: Process): void {
    if (process.remaining > 0) this.queue.push(process);
  }
}

export function createReadyQueue(algorithm: Algorithm): ReadyQueue {
  switch (algorithm.kind) {
    case "ROUND_ROBIN":
      return new RoundRobinQueue(algorithm.quantum);
    default:
      return new OrderedReadyQueue(ORDERINGS[algorithm.kind]);
  }
}
