export const sleep = (waitTimeInMs: number) =>
  new Promise((resolve) => setTimeout(resolve, waitTimeInMs));

/** Serialized size of an event payload in bytes. */
export const payloadSize = (data: string): number => Buffer.byteLength(data, 'utf8');

/**
 * Backoff after one more failed upload: starts at `minBatchInterval`, then
 * doubles up to `maxWait`.
 */
export const nextBackoff = function (
  currentMs: number,
  minBatchInterval: number,
  maxWait: number
): number {
  if (currentMs <= 0) {
    return minBatchInterval;
  }
  return Math.min(currentMs * 2, maxWait);
};

/**
 * pg hands back BIGINT and aggregate columns as strings, so numeric columns
 * go through here. Anything unparseable becomes `fallback`.
 */
export const toInteger = function (value: unknown, fallback = 0): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : fallback;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? Math.trunc(parsed) : fallback;
  }
  return fallback;
};
