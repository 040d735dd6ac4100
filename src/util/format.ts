/**
 * Duration and number formatting shared by metrics, pacing and predictions
 */

/**
 * Hours as "HhMM" (e.g. 5h07). Minutes are truncated, not rounded.
 */
export function formatHours(hours: number): string {
  const h = Math.floor(hours);
  const m = Math.floor((hours - h) * 60);
  return `${h}h${m.toString().padStart(2, '0')}`;
}

/**
 * Prediction display: capped at ">99h"
 */
export function formatPredictedHours(hours: number): string {
  if (hours > 99) return '>99h';
  return formatHours(hours);
}

/**
 * Elapsed minutes as "HHhMM" (e.g. 02h05), to the nearest minute
 */
export function formatElapsed(minutes: number): string {
  const total = Math.round(minutes);
  const h = Math.floor(total / 60);
  const m = total % 60;
  return `${h.toString().padStart(2, '0')}h${m.toString().padStart(2, '0')}`;
}

/**
 * Minutes since midnight as a wall-clock "HH:MM" to the nearest minute, wrapped to 24h
 */
export function minutesToTimeOfDay(totalMinutes: number): string {
  const wrapped = ((Math.round(totalMinutes) % 1440) + 1440) % 1440;
  const h = Math.floor(wrapped / 60);
  const m = wrapped % 60;
  return `${h.toString().padStart(2, '0')}:${m.toString().padStart(2, '0')}`;
}

/**
 * Parse a goal time: plain minutes ("390"), "6h30", "6:30" or "6h"
 */
export function parseGoalMinutes(input: string): number | null {
  const trimmed = input.trim().toLowerCase();

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return parseFloat(trimmed);
  }

  const match = trimmed.match(/^(\d+)\s*[h:]\s*(\d{1,2})?$/);
  if (!match) return null;

  const hours = parseInt(match[1], 10);
  const minutes = match[2] ? parseInt(match[2], 10) : 0;
  if (minutes >= 60) return null;

  return hours * 60 + minutes;
}

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
