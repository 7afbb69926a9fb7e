export const SIZE_BIN_LABELS = [
  "0-20k",
  "20k-50k",
  "50k-100k",
  "100k-250k",
  "250k-500k",
  "500k-1M",
  "1M-2M",
  "2M-3M",
  "3M-5M",
  "5M-7M",
  "7M-10M",
  "10M+",
] as const;

export type SizeBinLabel = (typeof SIZE_BIN_LABELS)[number];

// Inclusive upper bounds, aligned with SIZE_BIN_LABELS; the last bin is open-ended.
const SIZE_BIN_UPPER_BOUNDS = [
  20_000, 50_000, 100_000, 250_000, 500_000, 1_000_000, 2_000_000, 3_000_000, 5_000_000,
  7_000_000, 10_000_000,
] as const;

export function sizeBinFor(loc: number): SizeBinLabel {
  for (let index = 0; index < SIZE_BIN_UPPER_BOUNDS.length; index += 1) {
    const bound = SIZE_BIN_UPPER_BOUNDS[index];
    const label = SIZE_BIN_LABELS[index];
    if (bound !== undefined && label !== undefined && loc <= bound) {
      return label;
    }
  }

  return "10M+";
}
