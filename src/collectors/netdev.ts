import type { CollectorDefinition, RawOutput, ParseResult } from '../types/collector.types';
import type { MetricSample } from '../types/metric.types';
import { parseNumber, splitFields, splitLines } from '../utils/text';
import { counter, parsed, parseFailure } from './helpers';

// Column names used when the header is missing or unreadable
const DEFAULT_RECEIVE_FIELDS = [
  'bytes', 'packets', 'errs', 'drop', 'fifo', 'frame', 'compressed', 'multicast',
];
const DEFAULT_TRANSMIT_FIELDS = [
  'bytes', 'packets', 'errs', 'drop', 'fifo', 'colls', 'carrier', 'compressed',
];

interface Columns {
  receive: string[];
  transmit: string[];
  fromHeader: boolean;
}

/**
 * Read column names from the second header line:
 *
 *   face |bytes    packets errs drop ...|bytes    packets errs drop ...
 */
function readHeader(lines: string[]): Columns {
  const header = lines.find((line) => line.includes('|') && /bytes/.test(line));
  const parts = header?.split('|');
  if (!parts || parts.length < 3) {
    return { receive: DEFAULT_RECEIVE_FIELDS, transmit: DEFAULT_TRANSMIT_FIELDS, fromHeader: false };
  }
  return { receive: splitFields(parts[1]), transmit: splitFields(parts[2]), fromHeader: true };
}

export function parseNetdev(raw: RawOutput): ParseResult {
  const lines = splitLines(raw.text);
  const columns = readHeader(lines);
  const samples: MetricSample[] = [];

  for (const line of lines) {
    // "eth0:123 ..." on older kernels has no space after the colon
    const match = line.match(/^\s*([^\s:|]+):\s*(.*)$/);
    if (!match) {
      continue;
    }
    const [, device, rest] = match;
    const values = splitFields(rest).map(parseNumber);
    if (values.length === 0 || values.some((v) => v === undefined)) {
      return parseFailure(raw, `malformed statistics for ${device}`, line);
    }

    const receiveCount = Math.min(columns.receive.length, values.length);
    for (let i = 0; i < receiveCount; i++) {
      samples.push(statistic('receive', columns.receive[i], values[i] ?? 0, device));
    }
    const transmitCount = Math.min(columns.transmit.length, values.length - receiveCount);
    for (let i = 0; i < transmitCount; i++) {
      samples.push(
        statistic('transmit', columns.transmit[i], values[receiveCount + i] ?? 0, device)
      );
    }
  }

  if (samples.length === 0 && !columns.fromHeader) {
    return parseFailure(raw, 'neither a header nor interface lines found');
  }

  return parsed(samples);
}

function statistic(
  direction: 'receive' | 'transmit',
  field: string,
  value: number,
  device: string
): MetricSample {
  return counter(
    `node_network_${direction}_${field}_total`,
    `Network device statistic ${direction}_${field}.`,
    value,
    { device }
  );
}

export const netdevCollector: CollectorDefinition = {
  name: 'netdev',
  description: 'Per-interface traffic counters from /proc/net/dev',
  command: 'cat /proc/net/dev',
  parse: parseNetdev,
};
