import { Logger } from "@nestjs/common";

import { describeError } from "@nemcast/domain";

export interface PollSchedulerOptions {
  /** Fraction of the cadence used as the upper bound of the random first-tick delay. */
  jitterRatio: number;
  random?: () => number;
  label?: string;
}

export interface PollJobStats {
  cadenceMs: number;
  runs: number;
  droppedTicks: number;
  inFlight: boolean;
}

interface PollJob {
  cadenceMs: number;
  run: () => Promise<void>;
  phaseTimer: ReturnType<typeof setTimeout> | null;
  intervalTimer: ReturnType<typeof setInterval> | null;
  inFlight: Promise<void> | null;
  runs: number;
  droppedTicks: number;
}

/**
 * Fixed-cadence timers with single-flight semantics per key: a tick that fires
 * while the previous run of the same key is still pending is dropped.
 */
export class PollScheduler {
  private readonly logger: Logger;
  private readonly jobs = new Map<string, PollJob>();
  private readonly random: () => number;
  private stopped = false;

  constructor(private readonly options: PollSchedulerOptions) {
    this.logger = new Logger(options.label ? `${PollScheduler.name}:${options.label}` : PollScheduler.name);
    this.random = options.random ?? Math.random;
  }

  schedule(key: string, cadenceMs: number, run: () => Promise<void>): void {
    if (this.stopped) {
      throw new Error(`Scheduler stopped; cannot schedule ${key}`);
    }
    if (this.jobs.has(key)) {
      throw new Error(`Job ${key} is already scheduled`);
    }
    const job: PollJob = {
      cadenceMs,
      run,
      phaseTimer: null,
      intervalTimer: null,
      inFlight: null,
      runs: 0,
      droppedTicks: 0,
    };
    this.jobs.set(key, job);

    const phaseMs = Math.floor(this.random() * cadenceMs * this.options.jitterRatio);
    job.phaseTimer = setTimeout(() => {
      job.phaseTimer = null;
      this.tick(key, job);
      if (!this.stopped) {
        job.intervalTimer = setInterval(() => this.tick(key, job), cadenceMs);
      }
    }, phaseMs);
    this.logger.verbose(`Scheduled ${key} every ${cadenceMs} ms, first tick in ${phaseMs} ms`);
  }

  stop(): void {
    this.stopped = true;
    for (const job of this.jobs.values()) {
      if (job.phaseTimer) {
        clearTimeout(job.phaseTimer);
        job.phaseTimer = null;
      }
      if (job.intervalTimer) {
        clearInterval(job.intervalTimer);
        job.intervalTimer = null;
      }
    }
  }

  /** Waits for in-flight runs; resolves `false` if they outlast `timeoutMs`. */
  async drain(timeoutMs: number): Promise<boolean> {
    const pending = [...this.jobs.values()]
      .map((job) => job.inFlight)
      .filter((run): run is Promise<void> => run !== null);
    if (!pending.length) {
      return true;
    }
    let timer: ReturnType<typeof setTimeout> | null = null;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([Promise.allSettled(pending).then(() => true), timeout]);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }

  stats(): Record<string, PollJobStats> {
    const result: Record<string, PollJobStats> = {};
    for (const [key, job] of this.jobs) {
      result[key] = {
        cadenceMs: job.cadenceMs,
        runs: job.runs,
        droppedTicks: job.droppedTicks,
        inFlight: job.inFlight !== null,
      };
    }
    return result;
  }

  private tick(key: string, job: PollJob): void {
    if (this.stopped) {
      return;
    }
    if (job.inFlight) {
      job.droppedTicks += 1;
      this.logger.debug(`${key} still running; dropped tick (${job.droppedTicks} total)`);
      return;
    }
    job.runs += 1;
    job.inFlight = job
      .run()
      .catch((error: unknown) => this.logger.error(`${key} run failed: ${describeError(error)}`))
      .finally(() => {
        job.inFlight = null;
      });
  }
}
