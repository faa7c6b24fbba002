import { parseClusterMetaLocation } from '../metadata/ClusterMetaFactory';
import { FileChangeWaiter } from './FileChangeWaiter';
import { Sleeper, SleepSchedule, fixedSchedule } from './Sleeper';
import { Waiter } from './types';

export type WaitStrategy = 'auto' | 'sleep' | 'watch';

export interface WaiterConfig {
  strategy?: WaitStrategy;
  /** Fixed sleep interval (ms); the backoff schedule is used when unset */
  intervalMs?: number;
  /** Upper bound of a single file-change wait (ms) */
  watchTimeoutMs?: number;
}

/**
 * Pick the waiter for a metadata location: file-backed metadata can be
 * watched for changes, anything else is polled on a sleep schedule.
 */
export function bestWaiter(location: string, config: WaiterConfig = {}): Waiter {
  const strategy = config.strategy ?? 'auto';
  const parsed = parseClusterMetaLocation(location);

  if (strategy !== 'sleep' && parsed.kind === 'file') {
    return new FileChangeWaiter(parsed.path, { timeout: config.watchTimeoutMs });
  }

  const schedule: SleepSchedule | undefined = config.intervalMs !== undefined
    ? fixedSchedule(config.intervalMs)
    : undefined;
  return new Sleeper({ schedule });
}
