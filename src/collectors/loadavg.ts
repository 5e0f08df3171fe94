import type { CollectorDefinition, RawOutput, ParseResult } from '../types/collector.types';
import { parseNumber, splitFields } from '../utils/text';
import { gauge, parsed, parseFailure } from './helpers';

/**
 * /proc/loadavg: "0.01 0.02 0.03 2/38 23618". Only the three averages are used.
 */
export function parseLoadavg(raw: RawOutput): ParseResult {
  const [one, five, fifteen] = splitFields(raw.text).slice(0, 3).map(parseNumber);

  if (one === undefined || five === undefined || fifteen === undefined) {
    return parseFailure(raw, 'expected three load averages');
  }

  return parsed([
    gauge('node_load1', '1m load average.', one),
    gauge('node_load5', '5m load average.', five),
    gauge('node_load15', '15m load average.', fifteen),
  ]);
}

export const loadavgCollector: CollectorDefinition = {
  name: 'loadavg',
  description: 'Load averages from /proc/loadavg',
  command: 'cat /proc/loadavg',
  parse: parseLoadavg,
};
