import { describe, it, expect } from 'vitest';
import { parseCpuStat } from '../../src/collectors/cpu';
import { rawOutput } from '../helpers/factories';

const PROC_STAT = [
  'cpu  1500 40 600 80000 100 0 12 0',
  'cpu0 1000 20 300 40000 50 0 6 0',
  'cpu1 500 20 300 40000 50 0 6 0',
  'intr 123456 10 20 30',
  'ctxt 98765',
  'btime 1598394934',
  'processes 4321',
  'procs_running 2',
  'procs_blocked 0',
].join('\n');

describe('parseCpuStat', () => {
  it('should emit one counter per CPU and mode in seconds', () => {
    const result = parseCpuStat(rawOutput('cpu', PROC_STAT));

    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const cpu0 = result.samples.filter(
      (s) => s.name === 'node_cpu_seconds_total' && s.labels.cpu === '0'
    );
    expect(cpu0.map((s) => [s.labels.mode, s.value])).toEqual([
      ['user', 10],
      ['nice', 0.2],
      ['system', 3],
      ['idle', 400],
      ['iowait', 0.5],
      ['irq', 0],
      ['softirq', 0.06],
      ['steal', 0],
    ]);
    expect(cpu0.every((s) => s.kind === 'counter')).toBe(true);
  });

  it('should skip the aggregate cpu line', () => {
    const result = parseCpuStat(rawOutput('cpu', PROC_STAT));
    if (!result.ok) throw result.error;

    const cpus = new Set(
      result.samples.filter((s) => s.name === 'node_cpu_seconds_total').map((s) => s.labels.cpu)
    );
    expect([...cpus]).toEqual(['0', '1']);
  });

  it('should emit kernel activity metrics after the CPU samples', () => {
    const result = parseCpuStat(rawOutput('cpu', PROC_STAT));
    if (!result.ok) throw result.error;

    const others = result.samples.filter((s) => s.name !== 'node_cpu_seconds_total');
    expect(others.map((s) => [s.name, s.kind, s.value])).toEqual([
      ['node_intr_total', 'counter', 123456],
      ['node_context_switches_total', 'counter', 98765],
      ['node_forks_total', 'counter', 4321],
      ['node_procs_running', 'gauge', 2],
      ['node_procs_blocked', 'gauge', 0],
    ]);
    expect(result.samples).toHaveLength(16 + 5);
  });

  it('should accept older kernels with four columns', () => {
    const result = parseCpuStat(rawOutput('cpu', 'cpu0 100 0 50 900\n'));
    if (!result.ok) throw result.error;

    expect(result.samples.map((s) => s.labels.mode)).toEqual(['user', 'nice', 'system', 'idle']);
    expect(result.samples.map((s) => s.value)).toEqual([1, 0, 0.5, 9]);
  });

  it('should fail on a CPU line with too few columns', () => {
    const result = parseCpuStat(rawOutput('cpu', 'cpu0 100 0 50\n', 'cat /proc/stat'));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('ParseError');
    expect(result.error.context).toBe('cpu0 100 0 50');
    expect(result.error.message).toBe(
      'cpu: malformed cpu0 line (command: cat /proc/stat, output: "cpu0 100 0 50")'
    );
  });

  it('should fail on a non-numeric column', () => {
    const result = parseCpuStat(rawOutput('cpu', 'cpu0 100 x 50 900\n'));
    expect(result.ok).toBe(false);
  });

  it('should fail when no per-CPU line is present', () => {
    const result = parseCpuStat(rawOutput('cpu', 'sh: cat: not found\n'));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toContain('no per-CPU lines found');
    expect(result.error.context).toBe('sh: cat: not found');
  });
});
