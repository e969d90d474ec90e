export type ExecutionSegment = {
  processId: number;
  start: number;
  end: number;
};

export type ScheduleResult = {
  order: number[];
  finish: number[];
};

export type TimelineEntry = {
  processId: number | null;
  start: number;
  end: number;
  idle: boolean;
};
