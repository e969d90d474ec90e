export type ProcessMetrics = {
  processId: number;
  arrivalTime: number;
  burstTime: number;

  firstStart: number;
  completion: number;

  turnaround: number;
  waiting: number;
  response: number;
};

export type ScheduleMetrics = {
  processes: ProcessMetrics[];

  averageTurnaround: number;
  averageWaiting: number;
  averageResponse: number;

  makespan: number;
  busyTime: number;
  cpuUtilization: number; // 0..1
  throughput: number; // processes per time unit
  contextSwitches: number;
};
