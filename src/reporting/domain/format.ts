/** Compact number for prompts and chart axes: 3.00T, 12.50B, 1234.50. */
export function formatNumber(value: number | null | undefined): string {
  if (value == null || !Number.isFinite(value)) return "n/a";
  const abs = Math.abs(value);
  const units: Array<[number, string]> = [
    [1e12, "T"],
    [1e9, "B"],
    [1e6, "M"],
  ];
  for (const [size, suffix] of units) {
    if (abs >= size) return `${(value / size).toFixed(2)}${suffix}`;
  }
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}
