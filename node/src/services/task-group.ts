import { logger } from '@/services/logger';
import { withTimeout } from '@/utils/retryWithBackoff';
import { errorMessage } from '@/utils/errors';

export interface GroupTask<T> {
  name: string;
  run: () => Promise<T>;
}

export interface TaskSuccess<T> {
  name: string;
  value: T;
  ms: number;
}

export interface TaskFailure {
  name: string;
  error: string;
  ms: number;
}

export interface TaskGroupResult<T> {
  /** In task order. */
  results: TaskSuccess<T>[];
  failures: TaskFailure[];
}

export interface TaskGroupOptions {
  concurrency: number;
  timeoutMs: number;
}

/**
 * Runs at most `concurrency` tasks at a time, each under its own timeout.
 * A failed or timed-out task is recorded and never cancels the others.
 */
export async function runTaskGroup<T>(
  tasks: readonly GroupTask<T>[],
  options: TaskGroupOptions,
): Promise<TaskGroupResult<T>> {
  const outcomes: Array<{ ok: true; s: TaskSuccess<T> } | { ok: false; f: TaskFailure }> = [];
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < tasks.length) {
      const index = next++;
      const task = tasks[index];
      const started = Date.now();
      try {
        const value = await withTimeout(task.run, options.timeoutMs, task.name);
        outcomes[index] = { ok: true, s: { name: task.name, value, ms: Date.now() - started } };
      } catch (err) {
        const failure = { name: task.name, error: errorMessage(err), ms: Date.now() - started };
        logger.warn('task_group:task_failed', failure);
        outcomes[index] = { ok: false, f: failure };
      }
    }
  };

  const workers = Math.max(1, Math.min(options.concurrency, tasks.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));

  const results: TaskSuccess<T>[] = [];
  const failures: TaskFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) results.push(outcome.s);
    else failures.push(outcome.f);
  }
  return { results, failures };
}
