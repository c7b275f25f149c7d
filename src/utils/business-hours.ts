/**
 * Business Hours Gate
 *
 * A tier is open when the local hour in its timezone falls in
 * [start_hour, end_hour). An end_hour of 22 means the last open hour is 21:00-21:59.
 *
 * If the timezone cannot be resolved the gate reports the tier as open and
 * logs a warning.
 */

import { Logger } from 'pino';
import { TierRegistry } from './tier-registry';
import { BusinessHours, TierId } from '../types/tiers';

const formatters = new Map<string, Intl.DateTimeFormat>();

function hourFormatter(timezone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timezone);
  if (!formatter) {
    // Throws RangeError for an unknown timezone
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      hour: 'numeric',
      hourCycle: 'h23',
    });
    formatters.set(timezone, formatter);
  }
  return formatter;
}

/**
 * Local hour (0-23) of `now` in `timezone`.
 *
 * @throws RangeError when the timezone is unknown
 */
export function localHour(timezone: string, now: Date): number {
  const part = hourFormatter(timezone)
    .formatToParts(now)
    .find((p) => p.type === 'hour');

  if (!part) {
    throw new RangeError(`No hour component for timezone ${timezone}`);
  }
  return parseInt(part.value, 10) % 24;
}

export function withinWindow(hour: number, hours: BusinessHours): boolean {
  return hour >= hours.start_hour && hour < hours.end_hour;
}

export class BusinessHoursGate {
  constructor(
    private readonly registry: TierRegistry,
    private readonly log: Logger
  ) {}

  isOpen(tierId: TierId, now: Date): boolean {
    const hours = this.registry.get(tierId).business_hours;

    let hour: number;
    try {
      hour = localHour(hours.timezone, now);
    } catch (error) {
      this.log.warn(
        { tier: tierId, timezone: hours.timezone, err: error },
        'Cannot resolve business-hours timezone, treating tier as open'
      );
      return true;
    }
    return withinWindow(hour, hours);
  }
}
