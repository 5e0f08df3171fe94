import type { CollectorDefinition, RawOutput, ParseResult } from '../types/collector.types';
import type { MetricSample } from '../types/metric.types';
import { parseNumber, splitLines } from '../utils/text';
import { gauge, parsed, parseFailure } from './helpers';

const KIB = 1024;

/**
 * Field name as node_exporter spells it: "Active(anon)" becomes "Active_anon"
 */
function metricField(field: string): string {
  return field.replace(/\((.*)\)/, '_$1').replace(/[^a-zA-Z0-9_]/g, '_');
}

/**
 * Reads the `Field: value [kB]` lines of /proc/meminfo. Anything else, such as
 * the `total: used: free:` summary table older kernels print first, is
 * skipped, as are fields with a value or unit this parser does not know.
 */
export function parseMeminfo(raw: RawOutput): ParseResult {
  const samples: MetricSample[] = [];

  for (const line of splitLines(raw.text)) {
    const match = line.match(/^\s*([^:\s]+):\s*(\S+)(?:\s+(\S+))?\s*$/);
    if (!match) continue;

    const [, field, rawValue, unit] = match;
    const value = parseNumber(rawValue);
    if (value === undefined) continue;

    const name = metricField(field);
    if (unit === undefined) {
      samples.push(gauge(`node_memory_${name}`, `Memory information field ${name}.`, value));
    } else if (unit.toLowerCase() === 'kb') {
      samples.push(
        gauge(`node_memory_${name}_bytes`, `Memory information field ${name}_bytes.`, value * KIB)
      );
    }
  }

  if (samples.length === 0) {
    return parseFailure(raw, 'no memory fields found');
  }

  return parsed(samples);
}

export const meminfoCollector: CollectorDefinition = {
  name: 'meminfo',
  description: 'Memory statistics from /proc/meminfo',
  command: 'cat /proc/meminfo',
  parse: parseMeminfo,
};
