import type { CollectorDefinition, RawOutput, ParseResult } from '../types/collector.types';
import { splitLines } from '../utils/text';
import { gauge, parsed, parseFailure } from './helpers';

// One field per line, in the order the command prints them
const UNAME_FIELDS = ['sysname', 'nodename', 'release', 'version', 'machine'] as const;

export function parseUname(raw: RawOutput): ParseResult {
  const lines = splitLines(raw.text).map((line) => line.trim());
  if (lines.length < UNAME_FIELDS.length) {
    return parseFailure(raw, `expected ${UNAME_FIELDS.length} lines of uname output`);
  }

  const [sysname, nodename, release, version, machine] = lines;

  return parsed([
    gauge(
      'node_uname_info',
      'Labeled system information as provided by the uname system call.',
      1,
      {
        domainname: '(none)',
        machine,
        nodename,
        release,
        sysname,
        version,
      }
    ),
  ]);
}

export const unameCollector: CollectorDefinition = {
  name: 'uname',
  description: 'Kernel and host identification',
  command: 'uname -s; uname -n; uname -r; uname -v; uname -m',
  parse: parseUname,
};
