import type { ProcessMetrics, ScheduleMetrics } from "../core/metrics";
import type { Simulation } from "./scheduler";

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return round2(values.reduce((sum, v) => sum + v, 0) / values.length);
}

export function computeMetrics(simulation: Simulation): ScheduleMetrics {
  const processes: ProcessMetrics[] = simulation.completions
    .map(({ process, firstStart, completion }) => {
      const turnaround = completion - process.arrivalTime;
      return {
        processId: process.id,
        arrivalTime: process.arrivalTime,
        burstTime: process.burstTime,
        firstStart,
        completion,
        turnaround,
        waiting: turnaround - process.burstTime,
        response: firstStart - process.arrivalTime,
      };
    })
    .sort((a, b) => a.processId - b.processId);

  const segments = simulation.segments;
  const busyTime = segments.reduce((sum, s) => sum + (s.end - s.start), 0);
  const makespan = segments.length > 0 ? segments[segments.length - 1].end : 0;

  let contextSwitches = 0;
  for (let i = 1; i < segments.length; i++) {
    if (segments[i].processId !== segments[i - 1].processId) contextSwitches++;
  }

  return {
    processes,
    averageTurnaround: average(processes.map((p) => p.turnaround)),
    averageWaiting: average(processes.map((p) => p.waiting)),
    averageResponse: average(processes.map((p) => p.response)),
    makespan,
    busyTime,
    cpuUtilization: makespan > 0 ? round2(busyTime / makespan) : 0,
    throughput: makespan > 0 ? round2(processes.length / makespan) : 0,
    contextSwitches,
  };
}
