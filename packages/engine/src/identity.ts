/**
 * Device identity - maps the many names a device goes by to the one argument
 * `tailscale set --exit-node=` accepts.
 *
 * Status reports a device by name, id, addresses and hostinfo, while the
 * exit-node command wants a single argument. Alias maps are rebuilt from every
 * snapshot and never outlive it.
 */

import type { Device } from '@tailwarden/types';

export type AliasMap = Map<string, string>;

/**
 * Every identifier the device may be referred to by.
 */
export function aliasesFor(device: Device): Set<string> {
  const aliases = new Set<string>();
  const add = (value: string | undefined) => {
    if (value) {
      aliases.add(value);
    }
  };

  add(device.name);
  add(device.id);
  for (const address of device.tailnetAddresses) {
    add(address);
  }
  add(device.hostinfo['Hostname']);
  add(device.hostinfo['DNSName']);
  return aliases;
}

/**
 * Canonical exit-node argument: Hostname, DNSName, name, first address, then id.
 */
export function preferredArgument(device: Device): string | null {
  return (
    device.hostinfo['Hostname'] ||
    device.hostinfo['DNSName'] ||
    device.name ||
    device.tailnetAddresses.find((address) => address !== '') ||
    device.id ||
    null
  );
}

/**
 * Map each alias of each device to that device's canonical argument.
 * When two devices share an alias the first one keeps it.
 */
export function buildAliasMap(devices: readonly Device[]): AliasMap {
  const map: AliasMap = new Map();
  for (const device of devices) {
    const argument = preferredArgument(device);
    if (!argument) continue;
    for (const alias of aliasesFor(device)) {
      if (!map.has(alias)) {
        map.set(alias, argument);
      }
    }
  }
  return map;
}

export function resolveAlias(aliasMap: AliasMap, alias: string): string | null {
  return aliasMap.get(alias) ?? null;
}

export function findDeviceByAlias(devices: readonly Device[], alias: string): Device | null {
  return devices.find((device) => aliasesFor(device).has(alias)) ?? null;
}

/**
 * Label for pickers: the name, falling back to the argument itself.
 */
export function displayLabel(device: Device): string {
  return device.name || preferredArgument(device) || 'unknown';
}
