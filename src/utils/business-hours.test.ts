import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { BusinessHoursGate, localHour, withinWindow } from './business-hours';
import { TierRegistry } from './tier-registry';
import { easternTime, tierConfig } from '../test/fixtures';

describe('localHour', () => {
  it('converts to the timezone local hour', () => {
    // 2026-10-19T14:00Z is 10:00 EDT
    expect(localHour('US/Eastern', new Date('2026-10-19T14:00:00Z'))).toBe(10);
    expect(localHour('UTC', new Date('2026-10-19T14:00:00Z'))).toBe(14);
  });

  it('reports midnight as hour 0', () => {
    expect(localHour('UTC', new Date('2026-10-19T00:30:00Z'))).toBe(0);
  });

  it('throws for an unknown timezone', () => {
    expect(() => localHour('Mars/Olympus_Mons', new Date())).toThrow(RangeError);
  });
});

describe('withinWindow', () => {
  const hours = { start_hour: 9, end_hour: 22, timezone: 'UTC' };

  it('treats the window as half-open', () => {
    expect(withinWindow(8, hours)).toBe(false);
    expect(withinWindow(9, hours)).toBe(true);
    expect(withinWindow(21, hours)).toBe(true);
    expect(withinWindow(22, hours)).toBe(false);
  });
});

describe('BusinessHoursGate', () => {
  const registry = new TierRegistry([
    tierConfig('tier_1'),
    tierConfig('tier_2', { business_hours: { start_hour: 9, end_hour: 17, timezone: 'Mars/Olympus_Mons' } }),
  ]);

  it('is open inside the window and closed at the end hour', () => {
    const gate = new BusinessHoursGate(registry, pino({ level: 'silent' }));

    expect(gate.isOpen('tier_1', easternTime(8, 59))).toBe(false);
    expect(gate.isOpen('tier_1', easternTime(9))).toBe(true);
    expect(gate.isOpen('tier_1', easternTime(20, 59))).toBe(true);
    expect(gate.isOpen('tier_1', easternTime(21))).toBe(false);
  });

  it('fails open and warns when the timezone cannot be resolved', () => {
    const log = pino({ level: 'silent' });
    const warn = vi.spyOn(log, 'warn');
    const gate = new BusinessHoursGate(registry, log);

    expect(gate.isOpen('tier_2', easternTime(3))).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
