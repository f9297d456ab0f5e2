import { describe, expect, it } from 'vitest';

import { formatTime } from './utils';

describe('formatTime', () => {
  it('formats zero as seconds', () => {
    expect(formatTime(0)).toBe('0s');
  });

  it('omits empty units', () => {
    expect(formatTime(59)).toBe('59s');
    expect(formatTime(60)).toBe('1m');
    expect(formatTime(3600)).toBe('1h');
    expect(formatTime(3605)).toBe('1h 5s');
  });

  it('combines hours, minutes and seconds', () => {
    expect(formatTime(3723)).toBe('1h 2m 3s');
  });
});
