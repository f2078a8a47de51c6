import { ValidationException } from '../../utils/exceptions';

/**
 * Next `updated_at` for an entity. Never earlier than the previous value,
 * so a wall-clock step backwards cannot reorder an entity's history.
 */
export function nextTimestamp(previous: Date, now: Date = new Date()): Date {
  return now.getTime() >= previous.getTime() ? now : new Date(previous.getTime());
}

export function parseTimestamp(value: string | Date, field: string): Date {
  const parsed = value instanceof Date ? new Date(value.getTime()) : new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new ValidationException(`${field} is not a valid timestamp: ${String(value)}`, field);
  }
  return parsed;
}
