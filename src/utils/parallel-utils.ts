/**
 * Parallel Execution Utilities
 *
 * Batch processing with a concurrency limit where one failing item never
 * blocks its siblings.
 */

import type { Logger } from "./logger.util";

/** Outcome of a single batch item, in input order */
export type SettledItem<T, R> =
  | { item: T; success: true; result: R }
  | { item: T; success: false; error: Error };

export interface BatchResult<T, R> {
  settled: SettledItem<T, R>[];
  errorCount: number;
  totalTime: number;
}

/**
 * Execute promises in parallel with a concurrency limit.
 * Stops starting new batches once the signal is aborted.
 */
export async function parallelBatch<T, R>(
  items: T[],
  fn: (item: T, index: number) => Promise<R>,
  options: {
    concurrency?: number;
    logger?: Logger;
    label?: string;
    signal?: AbortSignal;
  } = {},
): Promise<BatchResult<T, R>> {
  const { concurrency = 6, logger, label = "batch", signal } = options;
  const startTime = Date.now();
  const settled: SettledItem<T, R>[] = [];
  let errorCount = 0;

  for (let i = 0; i < items.length; i += concurrency) {
    if (signal?.aborted) break;

    const batch = items.slice(i, i + concurrency);
    const batchResults = await Promise.all(
      batch.map((item, batchIndex) =>
        fn(item, i + batchIndex)
          .then((result): SettledItem<T, R> => ({ item, success: true, result }))
          .catch(
            (error: unknown): SettledItem<T, R> => ({
              item,
              success: false,
              error: error instanceof Error ? error : new Error(String(error)),
            }),
          ),
      ),
    );

    for (const res of batchResults) {
      if (!res.success) {
        errorCount++;
        logger?.debug(`[${label}] Item failed: ${res.error.message}`);
      }
      settled.push(res);
    }
  }

  const totalTime = Date.now() - startTime;
  logger?.debug(
    `[${label}] Processed ${settled.length}/${items.length} items in ${totalTime}ms (${errorCount} errors)`,
  );

  return { settled, errorCount, totalTime };
}
