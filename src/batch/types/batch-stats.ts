export type ItemOutcome = 'success' | 'failed' | 'timeout' | 'error';

export type BatchStats = Record<ItemOutcome, number>;

export function emptyStats(): BatchStats {
  return { success: 0, failed: 0, timeout: 0, error: 0 };
}

export function addStats(total: BatchStats, batch: BatchStats): BatchStats {
  return {
    success: total.success + batch.success,
    failed: total.failed + batch.failed,
    timeout: total.timeout + batch.timeout,
    error: total.error + batch.error,
  };
}
