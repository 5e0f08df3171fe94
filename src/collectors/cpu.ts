import type { CollectorDefinition, RawOutput, ParseResult } from '../types/collector.types';
import type { MetricSample } from '../types/metric.types';
import { parseNumber, splitFields, splitLines } from '../utils/text';
import { counter, gauge, parsed, parseFailure } from './helpers';

// Kernel USER_HZ; /proc/stat counts in 1/100 s on every Tomato build
const USER_HZ = 100;

// Column order of a cpuN line. Older kernels stop after idle or iowait.
const CPU_MODES = ['user', 'nice', 'system', 'idle', 'iowait', 'irq', 'softirq', 'steal'];
const REQUIRED_MODES = 4;

const CPU_HELP = 'Seconds the CPUs spent in each mode.';

const SINGLE_VALUE_COUNTERS = new Map<string, [string, string]>([
  ['intr', ['node_intr_total', 'Total number of interrupts serviced.']],
  ['ctxt', ['node_context_switches_total', 'Total number of context switches.']],
  ['processes', ['node_forks_total', 'Total number of forks.']],
]);

const SINGLE_VALUE_GAUGES = new Map<string, [string, string]>([
  ['procs_running', ['node_procs_running', 'Number of processes in runnable state.']],
  ['procs_blocked', ['node_procs_blocked', 'Number of processes blocked waiting for I/O to complete.']],
]);

export function parseCpuStat(raw: RawOutput): ParseResult {
  const cpuSamples: MetricSample[] = [];
  const otherSamples: MetricSample[] = [];

  for (const line of splitLines(raw.text)) {
    const [key, ...values] = splitFields(line);

    const cpuMatch = key.match(/^cpu(\d+)$/);
    if (cpuMatch) {
      const jiffies = values.map(parseNumber);
      const modeCount = Math.min(jiffies.length, CPU_MODES.length);
      if (modeCount < REQUIRED_MODES || jiffies.slice(0, modeCount).some((j) => j === undefined)) {
        return parseFailure(raw, `malformed ${key} line`, line);
      }
      for (let i = 0; i < modeCount; i++) {
        cpuSamples.push(
          counter('node_cpu_seconds_total', CPU_HELP, (jiffies[i] ?? 0) / USER_HZ, {
            cpu: cpuMatch[1],
            mode: CPU_MODES[i],
          })
        );
      }
      continue;
    }

    // intr carries per-IRQ counts after the total; only the total is kept
    const value = parseNumber(values[0]);
    if (value === undefined) {
      continue;
    }
    const counterMetric = SINGLE_VALUE_COUNTERS.get(key);
    const gaugeMetric = SINGLE_VALUE_GAUGES.get(key);
    if (counterMetric) {
      otherSamples.push(counter(counterMetric[0], counterMetric[1], value));
    } else if (gaugeMetric) {
      otherSamples.push(gauge(gaugeMetric[0], gaugeMetric[1], value));
    }
  }

  if (cpuSamples.length === 0) {
    return parseFailure(raw, 'no per-CPU lines found');
  }

  return parsed([...cpuSamples, ...otherSamples]);
}

export const cpuCollector: CollectorDefinition = {
  name: 'cpu',
  description: 'CPU time per mode and kernel activity counters from /proc/stat',
  command: 'cat /proc/stat',
  parse: parseCpuStat,
};
