// Parsers for numeric command-line flags. Each throws with the flag name on bad input.

export function nonNegativeInt(value: string, name: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 0 || value.trim() === "") {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`)
  }
  return n
}

export function finiteNumber(value: string, name: string): number {
  const n = Number(value)
  if (!Number.isFinite(n) || value.trim() === "") {
    throw new Error(`${name} must be a number, got "${value}"`)
  }
  return n
}
