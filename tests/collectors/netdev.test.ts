import { describe, it, expect } from 'vitest';
import { parseNetdev } from '../../src/collectors/netdev';
import { rawOutput } from '../helpers/factories';

const HEADER = [
  'Inter-|   Receive                                                |  Transmit',
  ' face |bytes    packets errs drop fifo frame compressed multicast|bytes    packets errs drop fifo colls carrier compressed',
];

const PROC_NET_DEV = [
  ...HEADER,
  '    lo:    1000      10    0    0    0     0          0         0     1000      10    0    0    0     0       0          0',
  '  eth0:12345 100 1 2 0 0 0 5 54321 200 0 0 0 0 0 0',
].join('\n');

describe('parseNetdev', () => {
  it('should emit receive and transmit counters per interface', () => {
    const result = parseNetdev(rawOutput('netdev', PROC_NET_DEV));
    if (!result.ok) throw result.error;

    expect(result.samples).toHaveLength(32);
    const eth0 = new Map(
      result.samples.filter((s) => s.labels.device === 'eth0').map((s) => [s.name, s.value])
    );
    expect(eth0.get('node_network_receive_bytes_total')).toBe(12345);
    expect(eth0.get('node_network_receive_errs_total')).toBe(1);
    expect(eth0.get('node_network_receive_drop_total')).toBe(2);
    expect(eth0.get('node_network_receive_multicast_total')).toBe(5);
    expect(eth0.get('node_network_transmit_bytes_total')).toBe(54321);
    expect(eth0.get('node_network_transmit_packets_total')).toBe(200);
  });

  it('should describe each statistic like node_exporter', () => {
    const result = parseNetdev(rawOutput('netdev', PROC_NET_DEV));
    if (!result.ok) throw result.error;

    expect(result.samples[0]).toEqual({
      name: 'node_network_receive_bytes_total',
      kind: 'counter',
      help: 'Network device statistic receive_bytes.',
      labels: { device: 'lo' },
      value: 1000,
    });
  });

  it('should fall back to the default columns without a header', () => {
    const result = parseNetdev(rawOutput('netdev', 'br0: 1 2 3 4 5 6 7 8 9 10 11 12 13 14 15 16\n'));
    if (!result.ok) throw result.error;

    expect(result.samples[8].name).toBe('node_network_transmit_bytes_total');
    expect(result.samples[8].value).toBe(9);
    expect(result.samples[13].name).toBe('node_network_transmit_colls_total');
  });

  it('should accept a header with no interfaces', () => {
    const result = parseNetdev(rawOutput('netdev', HEADER.join('\n')));
    if (!result.ok) throw result.error;

    expect(result.samples).toEqual([]);
  });

  it('should fail on a malformed interface line', () => {
    const result = parseNetdev(rawOutput('netdev', `${HEADER.join('\n')}\neth0: 1 x 3\n`));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toContain('malformed statistics for eth0');
    expect(result.error.context).toBe('eth0: 1 x 3');
  });

  it('should fail on unrelated output', () => {
    const result = parseNetdev(rawOutput('netdev', 'Permission denied\n'));
    expect(result.ok).toBe(false);
  });
});
