export function safeDivide(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

export function ceilDivide(numerator: number, denominator: number): number {
  return Math.ceil(safeDivide(numerator, denominator));
}

/** Nearest integer, ties to the even neighbour (2.5 -> 2, 3.5 -> 4). */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) {
    return floor + 1;
  }
  if (diff < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

export function roundDivide(numerator: number, denominator: number): number {
  return roundHalfEven(safeDivide(numerator, denominator));
}
