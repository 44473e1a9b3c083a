import { fixedClock, systemClock } from '../clock';

describe('clock', () => {
  it('fixedClock always reports the same instant', () => {
    const at = new Date('2025-05-01T08:00:00Z');
    const clock = fixedClock(at);
    expect(clock.now().toISOString()).toBe('2025-05-01T08:00:00.000Z');
    expect(clock.now()).not.toBe(clock.now());
  });

  it('systemClock reads the wall clock', () => {
    const before = Date.now();
    const now = systemClock.now().getTime();
    expect(now).toBeGreaterThanOrEqual(before);
  });
});
