import { describe, it, expect } from 'vitest';
import { parseLoadavg } from '../../src/collectors/loadavg';
import { rawOutput } from '../helpers/factories';

describe('parseLoadavg', () => {
  it('should emit the three load averages', () => {
    const result = parseLoadavg(rawOutput('loadavg', '0.08 0.13 0.09 2/38 23618\n'));
    if (!result.ok) throw result.error;

    expect(result.samples.map((s) => [s.name, s.value])).toEqual([
      ['node_load1', 0.08],
      ['node_load5', 0.13],
      ['node_load15', 0.09],
    ]);
    expect(result.samples[0].help).toBe('1m load average.');
  });

  it('should fail when fewer than three averages are present', () => {
    const result = parseLoadavg(rawOutput('loadavg', '0.08 0.13\n'));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toContain('expected three load averages');
  });
});
