import { describe, it, expect, vi } from 'vitest';
import {
  DeviceSchema,
  TimingConfigSchema,
  ConnectivityError,
  EngineError,
  TypedEventEmitter,
  createNotice,
  createStatusSnapshot,
  errorMessage,
  isConnectedState,
  resolveTiming,
  type Device,
} from '../index.js';

function device(overrides: Partial<Device> = {}): Device {
  return {
    name: 'node',
    tailnetAddresses: ['100.64.0.9'],
    online: true,
    exitNodeOption: false,
    isExitNode: false,
    hostinfo: {},
    ...overrides,
  };
}

describe('@tailwarden/types', () => {
  // ─────────────────────────────────────────────────────────────────────
  // CONNECTED DERIVATION
  // ─────────────────────────────────────────────────────────────────────

  describe('isConnectedState', () => {
    const states = ['Running', 'running', 'RUNNING', 'Stopped', 'Starting', 'NeedsLogin', ''];
    const addressSets: string[][] = [[], ['100.64.0.1'], ['100.64.0.1', 'fd7a:115c:a1e0::1']];

    it('is running AND has addresses, for every combination', () => {
      for (const state of states) {
        for (const addresses of addressSets) {
          const expected = state.toLowerCase() === 'running' && addresses.length > 0;
          expect(isConnectedState(state, addresses)).toBe(expected);
        }
      }
    });
  });

  describe('createStatusSnapshot', () => {
    it('derives connected from backend state and self addresses', () => {
      const snapshot = createStatusSnapshot({
        backendState: 'Running',
        self: device({ name: 'me' }),
      });
      expect(snapshot.connected).toBe(true);
    });

    it('is not connected when self has no addresses', () => {
      const snapshot = createStatusSnapshot({
        backendState: 'Running',
        self: device({ name: 'me', tailnetAddresses: [] }),
      });
      expect(snapshot.connected).toBe(false);
    });

    it('is not connected without a self device', () => {
      const snapshot = createStatusSnapshot({ backendState: 'Running' });
      expect(snapshot.connected).toBe(false);
      expect(snapshot.self).toBeNull();
      expect(snapshot.devices).toEqual([]);
    });

    it('lists self first and derives eligible exit nodes', () => {
      const self = device({ name: 'me' });
      const exit = device({ name: 'exit', exitNodeOption: true });
      const plain = device({ name: 'plain' });

      const snapshot = createStatusSnapshot({
        backendState: 'Stopped',
        self,
        peers: [exit, plain],
      });

      expect(snapshot.devices.map((d) => d.name)).toEqual(['me', 'exit', 'plain']);
      expect(snapshot.exitNodes.map((d) => d.name)).toEqual(['exit']);
      expect(snapshot.activeExitNode).toBeNull();
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // ZOD SCHEMAS
  // ─────────────────────────────────────────────────────────────────────

  describe('DeviceSchema', () => {
    it('validates a device', () => {
      const result = DeviceSchema.safeParse(device({ id: 'n1', os: 'linux' }));
      expect(result.success).toBe(true);
    });

    it('rejects non-string hostinfo values', () => {
      const result = DeviceSchema.safeParse({ ...device(), hostinfo: { Hostname: 42 } });
      expect(result.success).toBe(false);
    });
  });

  describe('TimingConfigSchema', () => {
    it('fills in defaults', () => {
      expect(resolveTiming()).toEqual({
        refreshIntervalMs: 5000,
        pollIntervalMs: 300,
        connectTimeoutMs: 15000,
        disconnectTimeoutMs: 6000,
        disconnectGraceMs: 1500,
        interactionDebounceMs: 350,
        debounceRetryMs: 300,
        minRefreshSpacingMs: 800,
      });
    });

    it('accepts overrides that keep the ordering', () => {
      const timing = resolveTiming({ connectTimeoutMs: 30000, pollIntervalMs: 100 });
      expect(timing.connectTimeoutMs).toBe(30000);
      expect(timing.pollIntervalMs).toBe(100);
    });

    it('rejects a grace period longer than the disconnect timeout', () => {
      const result = TimingConfigSchema.safeParse({ disconnectGraceMs: 7000 });
      expect(result.success).toBe(false);
    });

    it('rejects a disconnect timeout longer than the connect timeout', () => {
      const result = TimingConfigSchema.safeParse({ disconnectTimeoutMs: 20000 });
      expect(result.success).toBe(false);
    });

    it('rejects a debounce longer than the refresh spacing', () => {
      expect(() => resolveTiming({ interactionDebounceMs: 900 })).toThrow();
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // ERRORS
  // ─────────────────────────────────────────────────────────────────────

  describe('errors', () => {
    it('ConnectivityError keeps exit code and command', () => {
      const error = new ConnectivityError('boom', { exitCode: 1, command: 'tailscale down' });
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('ConnectivityError');
      expect(error.exitCode).toBe(1);
      expect(error.command).toBe('tailscale down');
    });

    it('EngineError carries a code', () => {
      const error = new EngineError('CONVERGENCE_TIMEOUT', 'timed out waiting for state change');
      expect(error.code).toBe('CONVERGENCE_TIMEOUT');
      expect(error.message).toBe('timed out waiting for state change');
    });

    it('errorMessage never returns an empty string', () => {
      expect(errorMessage(new Error('bad'))).toBe('bad');
      expect(errorMessage(new Error(''))).toBe('Error');
      expect(errorMessage('')).toBe('unknown error');
      expect(errorMessage(undefined)).toBe('unknown error');
      expect(errorMessage(7)).toBe('7');
      expect(errorMessage(null, 'command failed')).toBe('command failed');
    });
  });

  describe('createNotice', () => {
    it('keeps errors on screen longer than info', () => {
      expect(createNotice('info', 'Connected')).toEqual({
        level: 'info',
        text: 'Connected',
        durationMs: 4000,
      });
      expect(createNotice('error', 'nope').durationMs).toBe(10000);
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // TYPED EVENT EMITTER
  // ─────────────────────────────────────────────────────────────────────

  describe('TypedEventEmitter', () => {
    class Counter extends TypedEventEmitter<{ tick: (n: number) => void }> {}

    it('delivers typed events', () => {
      const counter = new Counter();
      const handler = vi.fn();
      counter.on('tick', handler);
      counter.emit('tick', 3);
      counter.off('tick', handler);
      counter.emit('tick', 4);
      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith(3);
    });

    it('once fires a single time', () => {
      const counter = new Counter();
      const handler = vi.fn();
      counter.once('tick', handler);
      counter.emit('tick', 1);
      counter.emit('tick', 2);
      expect(handler).toHaveBeenCalledTimes(1);
    });
  });
});
