import type { ExecutionSegment, ScheduleResult, TimelineEntry } from "../core/segment";

/**
 * One entry per segment. Round Robin repeats are kept: they are the
 * preemption timeline.
 */
export function assemble(segments: readonly ExecutionSegment[]): ScheduleResult {
  return {
    order: segments.map((s) => s.processId),
    finish: segments.map((s) => s.end),
  };
}

/** True completion time per process: its last occurrence in the result. */
export function completionTimes(result: ScheduleResult): Map<number, number> {
  const completions = new Map<number, number>();
  result.order.forEach((processId, i) => {
    completions.set(processId, result.finish[i]);
  });
  return completions;
}

export function buildTimeline(segments: readonly ExecutionSegment[]): TimelineEntry[] {
  const timeline: TimelineEntry[] = [];
  let cursor = 0;

  for (const segment of segments) {
    if (segment.start > cursor) {
      timeline.push({ processId: null, start: cursor, end: segment.start, idle: true });
    }
    timeline.push({
      processId: segment.processId,
      start: segment.start,
      end: segment.end,
      idle: false,
    });
    cursor = segment.end;
  }

  return timeline;
}
