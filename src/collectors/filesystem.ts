import type { CollectorDefinition, RawOutput, ParseResult } from '../types/collector.types';
import type { MetricSample } from '../types/metric.types';
import { parseNumber, splitFields, splitLines, splitSections } from '../utils/text';
import { gauge, parsed, parseFailure } from './helpers';

const SECTION_SEPARATOR = '---df---';
const BLOCK_SIZE = 1024;

// node_exporter's default exclusions
const IGNORED_FS_TYPES = new Set([
  'autofs', 'binfmt_misc', 'bpf', 'cgroup', 'cgroup2', 'configfs', 'debugfs', 'devpts',
  'devtmpfs', 'fusectl', 'hugetlbfs', 'iso9660', 'mqueue', 'nsfs', 'overlay', 'proc',
  'procfs', 'pstore', 'rootfs', 'rpc_pipefs', 'securityfs', 'selinuxfs', 'squashfs',
  'erofs', 'sysfs', 'tracefs', 'usbfs',
]);
const IGNORED_MOUNT_POINTS = /^\/(dev|proc|sys)($|\/)/;

interface MountEntry {
  device: string;
  fstype: string;
  readonly: boolean;
}

interface DfRow {
  device: string;
  blocks: number;
  used: number;
  available: number;
  mountpoint: string;
}

/**
 * /proc/mounts escapes blanks in paths as octal, e.g. "\040"
 */
function unescapeMountPath(value: string): string {
  return value.replace(/\\([0-7]{3})/g, (_, octal: string) =>
    String.fromCharCode(parseInt(octal, 8))
  );
}

function readMounts(text: string): Map<string, MountEntry> {
  const mounts = new Map<string, MountEntry>();
  for (const line of splitLines(text)) {
    const [device, mountpoint, fstype, options] = splitFields(line);
    if (!mountpoint || !fstype) {
      continue;
    }
    // Later entries shadow earlier mounts on the same path
    mounts.set(unescapeMountPath(mountpoint), {
      device,
      fstype,
      readonly: (options ?? '').split(',').includes('ro'),
    });
  }
  return mounts;
}

/**
 * Read `df -k` rows. BusyBox wraps a long device name onto its own line.
 */
function readDf(text: string): DfRow[] | string {
  const rows: DfRow[] = [];
  let pendingDevice: string | undefined;

  for (const line of splitLines(text)) {
    if (/^Filesystem\s/.test(line)) {
      continue;
    }
    let fields = splitFields(line);
    if (fields.length === 1) {
      pendingDevice = fields[0];
      continue;
    }
    if (pendingDevice !== undefined) {
      fields = [pendingDevice, ...fields];
      pendingDevice = undefined;
    }
    if (fields.length < 6) {
      return line;
    }

    const [device, blocks, used, available] = fields;
    const [blockCount, usedCount, availableCount] = [blocks, used, available].map(parseNumber);
    if (blockCount === undefined || usedCount === undefined || availableCount === undefined) {
      return line;
    }
    rows.push({
      device,
      blocks: blockCount,
      used: usedCount,
      available: availableCount,
      mountpoint: fields.slice(5).join(' '),
    });
  }

  return rows;
}

export function parseFilesystems(raw: RawOutput): ParseResult {
  const sections = splitSections(raw.text, SECTION_SEPARATOR);
  const mounts = sections.length > 1 ? readMounts(sections[0]) : new Map<string, MountEntry>();
  const dfText = sections[sections.length - 1];

  if (!/^Filesystem\s/m.test(dfText)) {
    return parseFailure(raw, 'df header not found', dfText);
  }

  const rows = readDf(dfText);
  if (typeof rows === 'string') {
    return parseFailure(raw, 'malformed df row', rows);
  }

  const samples: MetricSample[] = [];
  const seen = new Set<string>();

  for (const row of rows) {
    const mount = mounts.get(row.mountpoint);
    const fstype = mount?.fstype ?? 'unknown';
    if (
      seen.has(row.mountpoint) ||
      IGNORED_FS_TYPES.has(fstype) ||
      row.device === 'rootfs' ||
      IGNORED_MOUNT_POINTS.test(row.mountpoint)
    ) {
      continue;
    }
    seen.add(row.mountpoint);

    const labels = { device: mount?.device ?? row.device, fstype, mountpoint: row.mountpoint };
    samples.push(
      gauge('node_filesystem_size_bytes', 'Filesystem size in bytes.', row.blocks * BLOCK_SIZE, labels),
      gauge(
        'node_filesystem_free_bytes',
        'Filesystem free space in bytes.',
        (row.blocks - row.used) * BLOCK_SIZE,
        labels
      ),
      gauge(
        'node_filesystem_avail_bytes',
        'Filesystem space available to non-root users in bytes.',
        row.available * BLOCK_SIZE,
        labels
      )
    );
    if (mount) {
      samples.push(
        gauge('node_filesystem_readonly', 'Filesystem read-only status.', mount.readonly ? 1 : 0, labels)
      );
    }
  }

  return parsed(samples);
}

export const filesystemCollector: CollectorDefinition = {
  name: 'filesystem',
  description: 'Mounted file system capacity from /proc/mounts and df',
  command: `cat /proc/mounts; echo ${SECTION_SEPARATOR}; df -k`,
  parse: parseFilesystems,
};
