/**
 * Environment readers shared by the configuration layer. Every reader trims
 * the raw value, treats blank strings as unset and falls back to the caller's
 * default when the literal cannot be coerced.
 */

/** Returns the trimmed value of {@link name}, or `undefined` when blank. */
function readRaw(name: string): string | undefined {
  const raw = process.env[name];
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

export interface NumberBounds {
  /** Lower bound. Inclusive unless {@link exclusiveMin} is set. */
  readonly min?: number;
  /** Treat {@link min} as an exclusive bound. */
  readonly exclusiveMin?: boolean;
  /** Upper bound (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, bounds: NumberBounds | undefined): boolean {
  // `Infinity` and `NaN` never qualify, whatever the bounds.
  if (!Number.isFinite(value)) {
    return false;
  }
  if (bounds?.min !== undefined) {
    if (bounds.exclusiveMin ? value <= bounds.min : value < bounds.min) {
      return false;
    }
  }
  if (bounds?.max !== undefined && value > bounds.max) {
    return false;
  }
  return true;
}

/**
 * Returns the floating-point value of {@link name} when it parses completely
 * and fits the bounds. Scientific notation such as `1e-9` is accepted.
 */
export function readOptionalNumber(name: string, bounds?: NumberBounds): number | undefined {
  const raw = readRaw(name);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  return withinBounds(value, bounds) ? value : undefined;
}

export function readNumber(name: string, defaultValue: number, bounds?: NumberBounds): number {
  return readOptionalNumber(name, bounds) ?? defaultValue;
}

/** Returns the trimmed string stored in {@link name}, if any. */
export function readOptionalString(name: string): string | undefined {
  return readRaw(name);
}

/**
 * Reads an enum-like variable. Matching is case-insensitive and the canonical
 * spelling from {@link allowed} is returned.
 */
export function readOptionalEnum<T extends string>(name: string, allowed: readonly T[]): T | undefined {
  const raw = readRaw(name)?.toLowerCase();
  if (raw === undefined) {
    return undefined;
  }
  return allowed.find((candidate) => candidate.toLowerCase() === raw);
}

export function readEnum<T extends string>(name: string, allowed: readonly T[], defaultValue: T): T {
  return readOptionalEnum(name, allowed) ?? defaultValue;
}
