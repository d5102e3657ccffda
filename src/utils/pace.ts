import { roundHalfEven } from './rounding';

export const PACE_NOT_AVAILABLE = 'N/A';

/**
 * Convert a speed in meters per second to a running pace such as "5:00/km".
 *
 * Returns "N/A" for a missing or zero speed and for anything that is not a
 * positive finite number. Seconds are rounded half-to-even; 60 rolls over into
 * the next minute.
 */
export function formatPace(speedMetersPerSecond: number | null | undefined): string {
  if (speedMetersPerSecond === null || speedMetersPerSecond === undefined) {
    return PACE_NOT_AVAILABLE;
  }
  if (!Number.isFinite(speedMetersPerSecond) || speedMetersPerSecond <= 0) {
    return PACE_NOT_AVAILABLE;
  }

  const kilometersPerMinute = (speedMetersPerSecond * 60) / 1000;
  const minutesPerKilometer = 1 / kilometersPerMinute;
  if (!Number.isFinite(minutesPerKilometer)) return PACE_NOT_AVAILABLE;

  let minutes = Math.trunc(minutesPerKilometer);
  let seconds = roundHalfEven((minutesPerKilometer - minutes) * 60);

  if (seconds === 60) {
    minutes += 1;
    seconds = 0;
  }

  return `${String(minutes)}:${String(seconds).padStart(2, '0')}/km`;
}
