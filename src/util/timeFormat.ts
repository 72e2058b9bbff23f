/**
 * Time Formatting Utilities
 *
 * time_played is stored in game ticks; operators read and enter seconds.
 */

// Products such as 15.53 * 20 land on 310.59999999999997
const TICK_PRECISION = 1e6;

/**
 * Converts seconds to ticks, rounded to six decimal places
 */
export function secondsToTicks(seconds: number, ticksPerSecond: number): number {
  return Math.round(seconds * ticksPerSecond * TICK_PRECISION) / TICK_PRECISION;
}

/**
 * Converts ticks to seconds
 */
export function ticksToSeconds(ticks: number, ticksPerSecond: number): number {
  return ticks / ticksPerSecond;
}

/**
 * Formats a tick count as MM:SS.SS
 *
 * Minutes are not wrapped into hours, so one hour renders as 60:00.00.
 *
 * @example
 * formatTicks(1210, 20) // '01:00.50'
 */
export function formatTicks(ticks: number, ticksPerSecond: number): string {
  const totalSeconds = ticksToSeconds(ticks, ticksPerSecond);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds - minutes * 60;
  return `${String(minutes).padStart(2, '0')}:${seconds.toFixed(2).padStart(5, '0')}`;
}

/**
 * Formats a tick delta as seconds with two decimals
 */
export function formatSeconds(ticks: number, ticksPerSecond: number): string {
  return ticksToSeconds(ticks, ticksPerSecond).toFixed(2);
}
