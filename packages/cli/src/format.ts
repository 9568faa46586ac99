import { displayLabel } from '@tailwarden/engine';
import type { ControllerView } from '@tailwarden/engine';
import type { Device } from '@tailwarden/types';

const COLUMN_GAP = '  ';

export function formatAddresses(addresses: readonly string[]): string {
  return addresses.length > 0 ? addresses.join(', ') : '-';
}

function isActive(device: Device, active: Device | null): boolean {
  if (!active) return device.isExitNode;
  return device.id !== undefined ? device.id === active.id : device === active;
}

function exitColumn(device: Device, active: Device | null): string {
  if (isActive(device, active)) return 'active';
  return device.exitNodeOption ? 'yes' : '-';
}

/**
 * Lay rows out in left-aligned columns. The last column is not padded.
 */
export function formatColumns(rows: readonly string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row.map((cell, i) => (i < row.length - 1 ? cell.padEnd(widths[i] ?? 0) : cell)).join(COLUMN_GAP),
  );
}

export function formatDeviceTable(devices: readonly Device[], active: Device | null): string[] {
  const rows = [['NAME', 'ADDRESSES', 'ONLINE', 'EXIT', 'OS']];
  for (const device of devices) {
    rows.push([
      displayLabel(device),
      formatAddresses(device.tailnetAddresses),
      device.online ? 'yes' : 'no',
      exitColumn(device, active),
      device.os ?? '-',
    ]);
  }
  return formatColumns(rows);
}

export function formatSummary(view: ControllerView): string[] {
  const lines = [
    `Backend:   ${view.backendState ?? 'unknown'}`,
    `Connected: ${view.connected ? 'yes' : 'no'}`,
    `Addresses: ${formatAddresses(view.selfAddresses)}`,
    `Exit node: ${view.exitNode.activeArgument ?? 'none'}`,
  ];
  if (view.transition) {
    lines.push(`Pending:   ${view.transition}`);
  }
  if (view.statusError) {
    lines.push(`Error:     ${view.statusError}`);
  }
  return lines;
}
