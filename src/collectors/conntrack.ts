import type { CollectorDefinition, RawOutput, ParseResult } from '../types/collector.types';
import { parseNumber, splitLines } from '../utils/text';
import { gauge, parsed, parseFailure } from './helpers';

// 2.6 kernels expose ip_conntrack_*, newer ones nf_conntrack_*
const CONNTRACK_COMMAND =
  'cat /proc/sys/net/ipv4/netfilter/ip_conntrack_count /proc/sys/net/ipv4/netfilter/ip_conntrack_max 2>/dev/null' +
  ' || cat /proc/sys/net/netfilter/nf_conntrack_count /proc/sys/net/netfilter/nf_conntrack_max';

export function parseConntrack(raw: RawOutput): ParseResult {
  const [count, max] = splitLines(raw.text).map((line) => parseNumber(line.trim()));

  if (count === undefined) {
    return parseFailure(raw, 'connection count not found');
  }

  const samples = [
    gauge(
      'node_nf_conntrack_entries',
      'Number of currently allocated flow entries for connection tracking.',
      count
    ),
  ];
  if (max !== undefined) {
    samples.push(
      gauge('node_nf_conntrack_entries_limit', 'Maximum size of connection tracking table.', max)
    );
  }
  return parsed(samples);
}

export const conntrackCollector: CollectorDefinition = {
  name: 'conntrack',
  description: 'Connection tracking table usage',
  command: CONNTRACK_COMMAND,
  parse: parseConntrack,
};
