/** Seconds elapsed since `startedAt` (epoch ms), to `digits` decimals. */
export function since(startedAt: number, digits = 1, now: number = Date.now()): number {
  const factor = 10 ** digits;
  return Math.round(((now - startedAt) / 1000) * factor) / factor;
}
