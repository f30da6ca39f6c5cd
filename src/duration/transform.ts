/**
 * Duration Module - Pure Transformations
 *
 * Accepted inputs:
 * - number of seconds: `5`, `0.25`
 * - string: `"5"`, `"HH:MM"`, `"HH:MM:SS"`, `"HH:MM:SS.fff"`
 * - parts: `{ minutes: 1, seconds: 30 }`
 */
import { type Result, err, ok } from "neverthrow";

import { type DurationError, invalidFormat, unsupportedType } from "./errors.js";
import type { DurationParts } from "./schema.js";
import {
  DurationPartsSchema,
  MS_PER_DAY,
  MS_PER_HOUR,
  MS_PER_MINUTE,
  MS_PER_SECOND,
} from "./schema.js";

const NUMBER_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Convert seconds to whole milliseconds.
 */
const secondsToMs = (seconds: number): number =>
  Math.round(seconds * MS_PER_SECOND);

/**
 * Parse a clock-style or plain-seconds string.
 */
function parseDurationString(value: string): Result<number, DurationError> {
  const trimmed = value.trim();
  const parts = trimmed.split(":");

  if (parts.some((part) => !NUMBER_PATTERN.test(part))) {
    return err(invalidFormat(value));
  }

  const numbers = parts.map(Number);
  const [first = 0, second = 0, third = 0] = numbers;

  switch (numbers.length) {
    case 1:
      return ok(secondsToMs(first));
    case 2:
      return ok(first * MS_PER_HOUR + second * MS_PER_MINUTE);
    case 3:
      return ok(first * MS_PER_HOUR + second * MS_PER_MINUTE + secondsToMs(third));
    default:
      return err(invalidFormat(value));
  }
}

/**
 * Sum duration parts into milliseconds.
 */
export function partsToMs(parts: DurationParts): number {
  return Math.round(
    (parts.days ?? 0) * MS_PER_DAY +
      (parts.hours ?? 0) * MS_PER_HOUR +
      (parts.minutes ?? 0) * MS_PER_MINUTE +
      (parts.seconds ?? 0) * MS_PER_SECOND +
      (parts.milliseconds ?? 0),
  );
}

/**
 * Parse any accepted duration input into milliseconds.
 * Returns Result, doesn't throw. Sign is not checked here.
 */
export function parseDuration(value: unknown): Result<number, DurationError> {
  if (typeof value === "number") {
    return Number.isFinite(value)
      ? ok(secondsToMs(value))
      : err(invalidFormat(String(value)));
  }

  if (typeof value === "string") {
    return parseDurationString(value);
  }

  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    const parsed = DurationPartsSchema.safeParse(value);
    if (!parsed.success) {
      return err(invalidFormat(JSON.stringify(value)));
    }
    return ok(partsToMs(parsed.data));
  }

  return err(unsupportedType(value === null ? "null" : typeof value));
}

/**
 * Parse a duration, falling back to `defaultMs` when it is absent,
 * malformed or not positive.
 */
export function resolveDuration(value: unknown, defaultMs: number): number {
  if (value === undefined || value === null) {
    return defaultMs;
  }

  const parsed = parseDuration(value);
  if (parsed.isErr() || parsed.value <= 0) {
    return defaultMs;
  }

  return parsed.value;
}

/**
 * Split milliseconds into non-zero parts for writing back to YAML.
 *
 * @example
 * msToParts(90_500) // { minutes: 1, seconds: 30, milliseconds: 500 }
 */
export function msToParts(ms: number): DurationParts {
  let rest = Math.max(0, Math.round(ms));

  const days = Math.floor(rest / MS_PER_DAY);
  rest -= days * MS_PER_DAY;
  const hours = Math.floor(rest / MS_PER_HOUR);
  rest -= hours * MS_PER_HOUR;
  const minutes = Math.floor(rest / MS_PER_MINUTE);
  rest -= minutes * MS_PER_MINUTE;
  const seconds = Math.floor(rest / MS_PER_SECOND);
  const milliseconds = rest - seconds * MS_PER_SECOND;

  const parts: DurationParts = {
    ...(days > 0 ? { days } : {}),
    ...(hours > 0 ? { hours } : {}),
    ...(minutes > 0 ? { minutes } : {}),
    ...(seconds > 0 ? { seconds } : {}),
    ...(milliseconds > 0 ? { milliseconds } : {}),
  };

  return Object.keys(parts).length > 0 ? parts : { seconds: 0 };
}

/**
 * Format milliseconds for logs, e.g. "0:01:30" or "0:00:00.250".
 */
export function formatDuration(ms: number): string {
  const total = Math.max(0, Math.round(ms));
  const hours = Math.floor(total / MS_PER_HOUR);
  const minutes = Math.floor((total % MS_PER_HOUR) / MS_PER_MINUTE);
  const seconds = Math.floor((total % MS_PER_MINUTE) / MS_PER_SECOND);
  const millis = total % MS_PER_SECOND;

  const clock = `${hours}:${minutes.toString().padStart(2, "0")}:${seconds
    .toString()
    .padStart(2, "0")}`;

  return millis > 0 ? `${clock}.${millis.toString().padStart(3, "0")}` : clock;
}
