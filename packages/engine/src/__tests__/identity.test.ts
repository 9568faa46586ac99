import { describe, it, expect } from 'vitest';
import {
  aliasesFor,
  buildAliasMap,
  displayLabel,
  findDeviceByAlias,
  preferredArgument,
  resolveAlias,
} from '../identity.js';
import { makeDevice } from './fixtures.js';

describe('@tailwarden/engine - identity', () => {
  describe('aliasesFor', () => {
    it('collects name, id, addresses and hostinfo names', () => {
      const device = makeDevice({
        name: 'n',
        id: 'd1',
        tailnetAddresses: ['100.64.0.2'],
        hostinfo: { Hostname: 'h', DNSName: 'd' },
      });
      expect(aliasesFor(device)).toEqual(new Set(['n', '100.64.0.2', 'd1', 'h', 'd']));
    });

    it('skips empty values', () => {
      const device = makeDevice({ name: '', tailnetAddresses: ['', '100.64.0.3'], hostinfo: { Hostname: '' } });
      expect(aliasesFor(device)).toEqual(new Set(['100.64.0.3']));
    });
  });

  describe('preferredArgument', () => {
    it('prefers the advertised Hostname over the name', () => {
      expect(preferredArgument(makeDevice({ name: 'alias', hostinfo: { Hostname: 'exit-host' } }))).toBe(
        'exit-host',
      );
    });

    it('falls back through DNSName, name, address and id', () => {
      expect(preferredArgument(makeDevice({ name: 'n', hostinfo: { DNSName: 'n.tail.ts.net.' } }))).toBe(
        'n.tail.ts.net.',
      );
      expect(preferredArgument(makeDevice({ name: 'n', id: 'd1' }))).toBe('n');
      expect(preferredArgument(makeDevice({ tailnetAddresses: ['', '100.64.0.4'], id: 'd1' }))).toBe(
        '100.64.0.4',
      );
      expect(preferredArgument(makeDevice({ id: 'd1' }))).toBe('d1');
    });

    it('returns null when nothing identifies the device', () => {
      expect(preferredArgument(makeDevice())).toBeNull();
    });
  });

  describe('buildAliasMap', () => {
    it('maps every alias to the canonical argument', () => {
      const map = buildAliasMap([
        makeDevice({ name: 'box', id: 'n1', tailnetAddresses: ['100.64.0.5'], hostinfo: { Hostname: 'box-host' } }),
      ]);
      expect(resolveAlias(map, 'box')).toBe('box-host');
      expect(resolveAlias(map, 'n1')).toBe('box-host');
      expect(resolveAlias(map, '100.64.0.5')).toBe('box-host');
      expect(resolveAlias(map, 'box-host')).toBe('box-host');
      expect(resolveAlias(map, 'unknown')).toBeNull();
    });

    it('keeps the first device for a shared alias', () => {
      const map = buildAliasMap([
        makeDevice({ name: 'shared', hostinfo: { Hostname: 'first-host' } }),
        makeDevice({ name: 'shared', hostinfo: { Hostname: 'second-host' } }),
      ]);
      expect(resolveAlias(map, 'shared')).toBe('first-host');
      expect(resolveAlias(map, 'second-host')).toBe('second-host');
    });

    it('skips devices without an argument', () => {
      expect(buildAliasMap([makeDevice()]).size).toBe(0);
    });
  });

  describe('lookup helpers', () => {
    it('finds the first device carrying an alias', () => {
      const a = makeDevice({ name: 'a', tailnetAddresses: ['100.64.0.7'] });
      const b = makeDevice({ name: 'b', tailnetAddresses: ['100.64.0.7'] });
      expect(findDeviceByAlias([a, b], '100.64.0.7')).toBe(a);
      expect(findDeviceByAlias([a, b], 'b')).toBe(b);
      expect(findDeviceByAlias([a, b], 'c')).toBeNull();
    });

    it('labels devices by name, then argument', () => {
      expect(displayLabel(makeDevice({ name: 'box', hostinfo: { Hostname: 'box-host' } }))).toBe('box');
      expect(displayLabel(makeDevice({ id: 'd1' }))).toBe('d1');
      expect(displayLabel(makeDevice())).toBe('unknown');
    });
  });
});
