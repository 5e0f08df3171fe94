import { describe, it, expect } from 'vitest';
import { parseTime } from '../../src/collectors/time';
import { rawOutput } from '../helpers/factories';

describe('parseTime', () => {
  it('should derive boot time from router clock and whole seconds of uptime', () => {
    const result = parseTime(rawOutput('time', '1598394934\n1810779.30 1804583.20\n'));
    if (!result.ok) throw result.error;

    expect(result.samples.map((s) => [s.name, s.value])).toEqual([
      ['node_time_seconds', 1598394934],
      ['node_boot_time_seconds', 1596584155],
    ]);
  });

  it('should fail without the uptime line', () => {
    const result = parseTime(rawOutput('time', '1598394934\n'));
    expect(result.ok).toBe(false);
  });

  it('should fail on non-numeric values', () => {
    const result = parseTime(rawOutput('time', 'Thu Jan  1 00:00:00 UTC 1970\n1810779.30 1804583.20\n'));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toContain('non-numeric time values');
  });
});
