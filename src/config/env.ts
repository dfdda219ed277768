import type { ProcessEnv } from "../nodePrimitives.js";

/**
 * Environment readers shared by the server and the client CLI. Every reader
 * takes the environment record explicitly so configuration is resolved in one
 * place and tests never have to mutate {@link process.env}.
 */

/** Trims the raw value and collapses blank strings to `undefined`. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/**
 * Returns an optional base-10 integer. Literals outside the safe integer range
 * or the supplied bounds are ignored.
 */
export function readOptionalInt(
  env: ProcessEnv,
  name: string,
  options?: NumberOptions,
): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

export function readInt(
  env: ProcessEnv,
  name: string,
  defaultValue: number,
  options?: NumberOptions,
): number {
  return readOptionalInt(env, name, options) ?? defaultValue;
}

/** Returns the trimmed value of {@link name}, or `undefined` when blank. */
export function readOptionalString(env: ProcessEnv, name: string): string | undefined {
  return normaliseEnvValue(env[name]);
}

export function readString(env: ProcessEnv, name: string, defaultValue: string): string {
  return readOptionalString(env, name) ?? defaultValue;
}

/**
 * Reads an enum-like variable, case-insensitively, returning the canonical
 * spelling from {@link allowed}.
 */
export function readOptionalEnum<T extends string>(
  env: ProcessEnv,
  name: string,
  allowed: readonly T[],
): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((candidate) => candidate.toLowerCase() === lower);
}
