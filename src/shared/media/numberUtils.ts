const DEFAULT_PRECISION = 2;

export function roundToPrecision(value: number, precision = DEFAULT_PRECISION): number {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

export function bytesToMegabytes(bytes: number, precision = 1): number {
  return roundToPrecision(bytes / (1024 * 1024), precision);
}

export function percentOf(part: number, total: number): number {
  if (total <= 0 || !Number.isFinite(part)) {
    return 0;
  }

  const percent = Math.floor((part / total) * 100);
  return Math.min(100, Math.max(0, percent));
}
