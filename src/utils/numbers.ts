export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
