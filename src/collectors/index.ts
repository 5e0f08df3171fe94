import type { CollectorDefinition, CollectorName } from '../types/collector.types';
import { cpuCollector } from './cpu';
import { meminfoCollector } from './meminfo';
import { loadavgCollector } from './loadavg';
import { timeCollector } from './time';
import { unameCollector } from './uname';
import { netdevCollector } from './netdev';
import { filesystemCollector } from './filesystem';
import { wirelessCollector } from './wireless';
import { conntrackCollector } from './conntrack';

// Re-exports for direct usage
export { parseCpuStat } from './cpu';
export { parseMeminfo } from './meminfo';
export { parseLoadavg } from './loadavg';
export { parseTime } from './time';
export { parseUname } from './uname';
export { parseNetdev } from './netdev';
export { parseFilesystems } from './filesystem';
export { parseWireless } from './wireless';
export { parseConntrack } from './conntrack';

/**
 * All collectors, in the order a scrape runs them
 */
const collectorDefinitions: CollectorDefinition[] = [
  cpuCollector,
  meminfoCollector,
  loadavgCollector,
  timeCollector,
  unameCollector,
  netdevCollector,
  filesystemCollector,
  wirelessCollector,
  conntrackCollector,
];

/**
 * Build the collector catalog keyed by collector name
 */
export function getCollectorCatalog(): Map<CollectorName, CollectorDefinition> {
  const catalog = new Map<CollectorName, CollectorDefinition>();

  for (const definition of collectorDefinitions) {
    catalog.set(definition.name, definition);
  }

  return catalog;
}
