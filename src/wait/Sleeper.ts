import { delay } from '../common/utils';
import { Waiter } from './types';

export type SleepSchedule = () => Iterator<number>;

/**
 * Short sleeps first, then longer ones: resources usually settle soon after
 * start-up and need checking less often later. Values in ms.
 */
export function* backoffSchedule(): Generator<number, never> {
  let total = 0;
  for (;;) {
    let seconds: number;
    if (total > 120) {
      seconds = 60;
    } else if (total > 10) {
      seconds = 5;
    } else {
      seconds = 1;
    }
    yield seconds * 1000;
    total += seconds;
  }
}

export function fixedSchedule(intervalMs: number): SleepSchedule {
  return function* () {
    for (;;) {
      yield intervalMs;
    }
  };
}

export interface SleeperOptions {
  schedule?: SleepSchedule;
}

/**
 * Timed waits following a schedule; acted() starts the schedule over
 */
export class Sleeper implements Waiter {
  private readonly schedule: SleepSchedule;
  private times: Iterator<number>;

  constructor(options: SleeperOptions = {}) {
    this.schedule = options.schedule ?? backoffSchedule;
    this.times = this.schedule();
  }

  async wait(signal?: AbortSignal): Promise<void> {
    let next = this.times.next();
    if (next.done) {
      // finite schedules repeat
      this.times = this.schedule();
      next = this.times.next();
    }
    await delay(next.done ? 0 : next.value, signal);
  }

  acted(): void {
    this.times = this.schedule();
  }
}
