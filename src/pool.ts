// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Bounded task execution for chunk decoding.
 *
 * Callers may bring their own {@link TaskPool}; the default runs tasks on
 * the current thread with at most `concurrency` of them in flight.
 */

import { TiffError } from "./errors.js";

export interface TaskPool {
  /**
   * Run every task and resolve with their results in task order. Rejects
   * with the first failure once all started tasks have settled.
   */
  runTasks<T>(
    tasks: Array<() => Promise<T>>,
    progressCallback?: ((completed: number, total: number) => void) | null,
  ): Promise<T[]>;
}

/** Create a pool that keeps at most `concurrency` tasks in flight. */
export function createTaskPool(concurrency: number = 4): TaskPool {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new TiffError("InvalidInput", `Concurrency must be a positive integer, got ${concurrency}`);
  }

  return {
    async runTasks<T>(
      tasks: Array<() => Promise<T>>,
      progressCallback?: ((completed: number, total: number) => void) | null,
    ): Promise<T[]> {
      const results = new Array<T>(tasks.length);
      let next = 0;
      let completed = 0;
      const state: { failure?: { error: unknown } } = {};

      const worker = async (): Promise<void> => {
        while (state.failure === undefined && next < tasks.length) {
          const index = next++;
          try {
            results[index] = await tasks[index]();
          } catch (error) {
            state.failure ??= { error };
            return;
          }
          completed++;
          progressCallback?.(completed, tasks.length);
        }
      };

      const workers: Promise<void>[] = [];
      for (let i = 0; i < Math.min(concurrency, tasks.length); i++) {
        workers.push(worker());
      }
      await Promise.all(workers);

      if (state.failure !== undefined) throw state.failure.error;
      return results;
    },
  };
}
