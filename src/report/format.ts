function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** 3725 -> "01:02:05"; hours are not wrapped at 24. */
export function formatSecondsToHms(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${pad2(hours)}:${pad2(minutes)}:${pad2(seconds % 60)}`;
}

/** Console rendering of a [0, 1] share: 0.4567 -> "45.7%". */
export function formatPercent(share: number): string {
  return `${(share * 100).toFixed(1)}%`;
}
