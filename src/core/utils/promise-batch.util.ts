export type BatchResult<T, R> =
  | {
      success: true;
      item: T;
      value: R;
    }
  | {
      success: false;
      item: T;
      error: unknown;
    };

export interface BatchProcessingOptions {
  /**
   * Maximum number of concurrent promises
   * @default 1
   */
  concurrencyLimit?: number;

  /**
   * Checked before each batch starts; items of a started batch always finish
   */
  shouldContinue?: () => boolean;
}

/**
 * Process items in batches with controlled concurrency, collecting
 * per-item outcomes. Items that never started are left out of the result.
 */
export async function processInBatches<T, R>(
  items: readonly T[],
  processor: (item: T) => Promise<R>,
  options: BatchProcessingOptions = {},
): Promise<BatchResult<T, R>[]> {
  const concurrencyLimit = Math.max(1, options.concurrencyLimit ?? 1);
  const results: BatchResult<T, R>[] = [];

  for (let i = 0; i < items.length; i += concurrencyLimit) {
    if (options.shouldContinue && !options.shouldContinue()) {
      break;
    }

    const batch = items.slice(i, i + concurrencyLimit);
    const settled = await Promise.allSettled(batch.map((item) => processor(item)));

    settled.forEach((outcome, index) => {
      const item = batch[index];
      if (outcome.status === 'fulfilled') {
        results.push({ success: true, item, value: outcome.value });
      } else {
        results.push({ success: false, item, error: outcome.reason });
      }
    });
  }

  return results;
}
