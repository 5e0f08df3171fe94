import type { CollectorDefinition, RawOutput, ParseResult } from '../types/collector.types';
import type { MetricSample } from '../types/metric.types';
import { parseNumber, splitFields, splitLines } from '../utils/text';
import { gauge, parsed, parseFailure } from './helpers';

const DONE_MARKER = 'wl-done';

/**
 * Walks every Broadcom radio with the `wl` utility. Prints, per radio:
 *
 *   iface eth1
 *   -92                          (noise floor)
 *   sta 00:11:22:33:44:55 -45    (one line per associated station)
 *
 * The trailing marker keeps output non-empty on routers without radios.
 */
const WIRELESS_COMMAND = [
  'for i in $(nvram get wl_ifnames); do',
  'echo "iface $i";',
  'wl -i $i noise;',
  "for m in $(wl -i $i assoclist | cut -d' ' -f2); do",
  'echo "sta $m $(wl -i $i rssi $m)";',
  'done;',
  'done;',
  `echo ${DONE_MARKER}`,
].join(' ');

interface Radio {
  device: string;
  noise?: number;
  stations: Array<{ mac: string; rssi?: number }>;
}

export function parseWireless(raw: RawOutput): ParseResult {
  const radios: Radio[] = [];
  let finished = false;

  for (const line of splitLines(raw.text)) {
    const [keyword, ...rest] = splitFields(line);
    const current = radios[radios.length - 1];

    if (keyword === DONE_MARKER) {
      finished = true;
    } else if (keyword === 'iface' && rest[0]) {
      radios.push({ device: rest[0], stations: [] });
    } else if (keyword === 'sta' && current && rest[0]) {
      current.stations.push({ mac: rest[0].toLowerCase(), rssi: parseNumber(rest[1]) });
    } else if (current && current.noise === undefined) {
      // "-92" or "noise is -92 dBm" depending on the driver
      const noise = line.match(/(-?\d+)\s*(?:dBm)?\s*$/i);
      if (noise) {
        current.noise = Number(noise[1]);
      }
    }
  }

  if (!finished && radios.length === 0) {
    return parseFailure(raw, 'no radio sections found');
  }

  const samples: MetricSample[] = [];
  for (const radio of radios) {
    const device = { device: radio.device };
    if (radio.noise !== undefined) {
      samples.push(gauge('tomato_wifi_noise_dbm', 'Noise floor of the radio in dBm.', radio.noise, device));
    }
    samples.push(
      gauge(
        'tomato_wifi_stations',
        'Number of stations associated with the radio.',
        radio.stations.length,
        device
      )
    );
    for (const station of radio.stations) {
      if (station.rssi === undefined) {
        continue;
      }
      samples.push(
        gauge(
          'node_wifi_station_signal_dbm',
          'The current WiFi signal strength, in decibel-milliwatts (dBm).',
          station.rssi,
          { device: radio.device, mac_address: station.mac }
        )
      );
    }
  }

  return parsed(samples);
}

export const wirelessCollector: CollectorDefinition = {
  name: 'wireless',
  description: 'Radio noise and associated station signal strength via wl',
  command: WIRELESS_COMMAND,
  parse: parseWireless,
};
