import { describe, expect, it } from 'vitest';

import { RateWindow } from '../src/rate-window';

describe('RateWindow', () => {
  it('should reject a capacity that is not a positive integer', () => {
    expect(() => new RateWindow(0)).toThrow(
      'Capacity must be a positive integer',
    );
    expect(() => new RateWindow(1.5)).toThrow(
      'Capacity must be a positive integer',
    );
  });

  it('should count events strictly after a point in time', () => {
    const window = new RateWindow(10);
    [100, 200, 300, 400].forEach((ts) => window.add(ts));

    expect(window.countSince(0)).toBe(4);
    expect(window.countSince(200)).toBe(2);
    expect(window.countSince(400)).toBe(0);
  });

  it('should forget the oldest events once full', () => {
    const window = new RateWindow(3);
    [100, 200, 300, 400, 500].forEach((ts) => window.add(ts));

    expect(window.length).toBe(3);
    expect(window.countSince(0)).toBe(3);
    expect(window.countSince(350)).toBe(2);
  });
});
