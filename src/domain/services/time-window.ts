import type { TimeWindow } from '../entities/api-target.js';
import { InvalidInputError } from '../errors.js';

export interface TimeWindowRequest {
  readonly startTime?: string;
  readonly endTime?: string;
  readonly defaultWindowMinutes: number;
  readonly now?: Date;
}

function parseTimestamp(field: 'StartTime' | 'EndTime', value: string): Date {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new InvalidInputError(`Invalid ${field} format: ${value}`);
  }
  return parsed;
}

/**
 * Resolve the optional automation parameters into a concrete window.
 * Missing bounds default to the last `defaultWindowMinutes` up to now.
 */
export function resolveTimeWindow(request: TimeWindowRequest): TimeWindow {
  const now = request.now ?? new Date();
  const startTime = request.startTime?.trim();
  const endTime = request.endTime?.trim();

  const start = startTime
    ? parseTimestamp('StartTime', startTime)
    : new Date(now.getTime() - request.defaultWindowMinutes * 60_000);
  const end = endTime ? parseTimestamp('EndTime', endTime) : now;

  if (start.getTime() >= end.getTime()) {
    throw new InvalidInputError('StartTime must be before EndTime');
  }

  return { start, end };
}

/** Logs Insights takes whole seconds since the epoch. */
export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
