import { DispatchConfig } from '../types/index.js';

export type DispatchTask<T> = (item: T, index: number) => Promise<void>;

/**
 * Runs a task over every item and resolves once each one has settled.
 * Outcomes are the task's business; the dispatcher only schedules.
 */
export interface Dispatcher {
  readonly concurrency: number;
  run<T>(items: readonly T[], task: DispatchTask<T>): Promise<void>;
}

function rethrow(failures: unknown[]): void {
  if (failures.length > 0) {
    throw new AggregateError(failures, `${failures.length} dispatched task(s) failed`);
  }
}

/**
 * Fixed pool of workers draining a shared cursor. Each item is handed out exactly once;
 * completion order is unspecified.
 */
export class PoolDispatcher implements Dispatcher {
  readonly concurrency: number;

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
  }

  async run<T>(items: readonly T[], task: DispatchTask<T>): Promise<void> {
    const failures: unknown[] = [];
    let cursor = 0;

    const drain = async (): Promise<void> => {
      while (cursor < items.length) {
        const index = cursor++;
        try {
          await task(items[index], index);
        } catch (error) {
          failures.push(error);
        }
      }
    };

    const workerCount = Math.min(this.concurrency, items.length);
    await Promise.all(Array.from({ length: workerCount }, () => drain()));
    rethrow(failures);
  }
}

/**
 * One item at a time, in order
 */
export class SequentialDispatcher implements Dispatcher {
  readonly concurrency = 1;

  async run<T>(items: readonly T[], task: DispatchTask<T>): Promise<void> {
    const failures: unknown[] = [];
    for (let index = 0; index < items.length; index++) {
      try {
        await task(items[index], index);
      } catch (error) {
        failures.push(error);
      }
    }
    rethrow(failures);
  }
}

/**
 * Pool for concurrency above one; sequential when asked for or when the bound is one
 */
export function createDispatcher(config: DispatchConfig): Dispatcher {
  if (config.mode === 'sequential' || config.concurrency <= 1) {
    return new SequentialDispatcher();
  }
  return new PoolDispatcher(config.concurrency);
}
