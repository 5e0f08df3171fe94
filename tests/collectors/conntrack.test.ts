import { describe, it, expect } from 'vitest';
import { parseConntrack } from '../../src/collectors/conntrack';
import { rawOutput } from '../helpers/factories';

describe('parseConntrack', () => {
  it('should emit entries and the table limit', () => {
    const result = parseConntrack(rawOutput('conntrack', '187\n8192\n'));
    if (!result.ok) throw result.error;

    expect(result.samples.map((s) => [s.name, s.value])).toEqual([
      ['node_nf_conntrack_entries', 187],
      ['node_nf_conntrack_entries_limit', 8192],
    ]);
  });

  it('should omit the limit when it is not reported', () => {
    const result = parseConntrack(rawOutput('conntrack', '187\n'));
    if (!result.ok) throw result.error;

    expect(result.samples.map((s) => s.name)).toEqual(['node_nf_conntrack_entries']);
  });

  it('should fail when the count is not a number', () => {
    const result = parseConntrack(rawOutput('conntrack', 'cat: can\'t open \'/proc/sys/net/netfilter/nf_conntrack_count\'\n'));
    expect(result.ok).toBe(false);
  });
});
