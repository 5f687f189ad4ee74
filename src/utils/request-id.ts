import { utcDayStamp } from './date.js';

/**
 * Fallback correlation id for runs started without one: dp-<UTC day>-<epoch seconds>.
 */
export function generateRequestId(now: Date = new Date()): string {
  return `dp-${utcDayStamp(now)}-${Math.floor(now.getTime() / 1000)}`;
}
