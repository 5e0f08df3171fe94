import type { CollectorDefinition, RawOutput, ParseResult } from '../types/collector.types';
import { parseNumber, splitFields, splitLines } from '../utils/text';
import { gauge, parsed, parseFailure } from './helpers';

/**
 * Output of `date +%s && cat /proc/uptime`:
 *
 *   1598394934
 *   1810779.30 1804583.20
 *
 * Boot time is the router clock minus whole seconds of uptime, so it stays
 * constant between scrapes.
 */
export function parseTime(raw: RawOutput): ParseResult {
  const lines = splitLines(raw.text);
  if (lines.length < 2) {
    return parseFailure(raw, 'expected epoch seconds followed by /proc/uptime');
  }

  const now = parseNumber(lines[0].trim());
  const uptime = parseNumber(splitFields(lines[1])[0]);
  if (now === undefined || uptime === undefined) {
    return parseFailure(raw, 'non-numeric time values');
  }

  return parsed([
    gauge('node_time_seconds', 'System time in seconds since epoch (1970).', now),
    gauge('node_boot_time_seconds', 'Node boot time, in unixtime.', now - Math.floor(uptime)),
  ]);
}

export const timeCollector: CollectorDefinition = {
  name: 'time',
  description: 'Router clock and boot time',
  command: 'date +%s && cat /proc/uptime',
  parse: parseTime,
};
