import { describe, it, expect } from 'vitest';
import { getCollectorCatalog } from '../../src/collectors';
import { COLLECTOR_NAMES } from '../../src/types/collector.types';

describe('getCollectorCatalog', () => {
  it('should contain every collector in execution order', () => {
    const catalog = getCollectorCatalog();
    expect([...catalog.keys()]).toEqual([...COLLECTOR_NAMES]);
  });

  it('should key each definition by its own name', () => {
    for (const [name, definition] of getCollectorCatalog()) {
      expect(definition.name).toBe(name);
      expect(definition.command.length).toBeGreaterThan(0);
    }
  });

  it('should return a fresh map on every call', () => {
    const first = getCollectorCatalog();
    first.delete('cpu');
    expect(getCollectorCatalog().has('cpu')).toBe(true);
  });

  it('should chain the filesystem commands around a separator', () => {
    expect(getCollectorCatalog().get('filesystem')?.command).toBe(
      'cat /proc/mounts; echo ---df---; df -k'
    );
  });
});
