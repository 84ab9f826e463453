/** Round half away from zero to a fixed number of decimal places. */
export function roundTo(value: number, places: number): number {
  const factor = 10 ** places
  const rounded = Math.round(Math.abs(value) * factor + Number.EPSILON) / factor
  return value < 0 && rounded !== 0 ? -rounded : rounded
}

/** Dollars, rounded to cents. */
export function roundCents(value: number): number {
  return roundTo(value, 2)
}
