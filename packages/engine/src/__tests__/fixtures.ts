import { vi } from 'vitest';
import { createStatusSnapshot } from '@tailwarden/types';
import type { Device, StatusSnapshot } from '@tailwarden/types';

export function makeDevice(overrides: Partial<Device> = {}): Device {
  return {
    tailnetAddresses: [],
    online: true,
    exitNodeOption: false,
    isExitNode: false,
    hostinfo: {},
    ...overrides,
  };
}

export const selfDevice = makeDevice({ name: 'me', id: 'n0', tailnetAddresses: ['100.64.0.1'] });

export const boxNode = makeDevice({
  name: 'box',
  id: 'n1',
  tailnetAddresses: ['100.64.0.5'],
  exitNodeOption: true,
  hostinfo: { Hostname: 'box-host' },
});

export const otherNode = makeDevice({
  name: 'other',
  id: 'n2',
  tailnetAddresses: ['100.64.0.6'],
  exitNodeOption: true,
  hostinfo: { Hostname: 'other-host' },
});

export interface SnapshotOptions {
  connected?: boolean;
  backendState?: string;
  peers?: Device[];
  active?: Device | null;
}

export function makeSnapshot(options: SnapshotOptions = {}): StatusSnapshot {
  const connected = options.connected ?? true;
  const peers = (options.peers ?? []).map((device) =>
    options.active && device.id === options.active.id ? { ...device, isExitNode: true } : device,
  );
  const active = options.active ? (peers.find((d) => d.id === options.active?.id) ?? null) : null;
  return createStatusSnapshot({
    backendState: options.backendState ?? (connected ? 'Running' : 'Stopped'),
    self: connected ? selfDevice : { ...selfDevice, tailnetAddresses: [] },
    peers,
    activeExitNode: active,
  });
}

/**
 * In-process stand-in for the tailscale CLI. `state.snapshot` is what the
 * next status() call returns.
 */
export function createFakeClient(initial: StatusSnapshot) {
  const state = { snapshot: initial };
  return {
    state,
    status: vi.fn(async (): Promise<StatusSnapshot> => state.snapshot),
    up: vi.fn(async (_extraArgs?: string[]): Promise<void> => {}),
    down: vi.fn(async (): Promise<void> => {}),
    setExitNode: vi.fn(async (_argument: string | null): Promise<void> => {}),
  };
}

export function deferred<T>() {
  let resolve!: (value: T) => void;
  let reject!: (reason: unknown) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Let every queued promise callback run. Real timers only.
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
