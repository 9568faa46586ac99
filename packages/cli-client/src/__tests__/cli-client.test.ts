import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import { ConnectivityError, silentLogger } from '@tailwarden/types';
import { TailscaleCli, runCommand, shouldRetryWithSudo } from '../index.js';

vi.mock('child_process', () => {
  return {
    spawn: vi.fn(),
  };
});

vi.mock('fs/promises', () => {
  return {
    access: vi.fn(),
  };
});

import { spawn } from 'child_process';
import { access } from 'fs/promises';

function createMockProcess() {
  const stdout = new EventEmitter();
  const stderr = new EventEmitter();
  const processEmitter = new EventEmitter();
  return Object.assign(processEmitter, {
    stdout,
    stderr,
    kill: vi.fn(),
    pid: 12345,
  });
}

/**
 * A process that prints its output and exits on the next tick.
 */
function exitingProcess(code: number, out = '', err = '') {
  const proc = createMockProcess();
  process.nextTick(() => {
    if (out) proc.stdout.emit('data', Buffer.from(out));
    if (err) proc.stderr.emit('data', Buffer.from(err));
    proc.emit('close', code, null);
  });
  return proc;
}

function queueExit(code: number, out = '', err = '') {
  vi.mocked(spawn).mockImplementationOnce(() => exitingProcess(code, out, err) as any);
}

const statusJson = JSON.stringify({
  BackendState: 'Running',
  Self: { ID: 'nSelf', HostName: 'me', TailscaleIPs: ['100.64.0.1'] },
  Peer: {
    'nodekey:a': {
      ID: 'nA',
      HostName: 'exit-box',
      TailscaleIPs: ['100.64.0.2'],
      ExitNodeOption: true,
      ExitNode: true,
    },
  },
});

describe('@tailwarden/cli-client', () => {
  let cli: TailscaleCli;

  beforeEach(() => {
    vi.mocked(spawn).mockReset();
    vi.mocked(access).mockReset();
    cli = new TailscaleCli('/usr/bin/tailscale', { logger: silentLogger });
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.useRealTimers();
  });

  describe('status', () => {
    it('runs status --json and parses the snapshot', async () => {
      queueExit(0, statusJson);

      const snapshot = await cli.status();

      expect(spawn).toHaveBeenCalledWith(
        '/usr/bin/tailscale',
        ['status', '--json'],
        expect.objectContaining({ stdio: ['ignore', 'pipe', 'pipe'] }),
      );
      expect(snapshot.connected).toBe(true);
      expect(snapshot.activeExitNode?.name).toBe('exit-box');
    });

    it('rejects with ConnectivityError on a non-zero exit', async () => {
      queueExit(1, '', 'failed to connect to local tailscaled\n');

      const error = await cli.status().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConnectivityError);
      expect((error as ConnectivityError).message).toBe(
        'Failed to fetch tailscale status: failed to connect to local tailscaled',
      );
      expect((error as ConnectivityError).exitCode).toBe(1);
    });

    it('reports connectivity as false when status fails', async () => {
      queueExit(1, '', 'not running');
      expect(await cli.isConnected()).toBe(false);
    });

    it('returns the current exit node name', async () => {
      queueExit(0, statusJson);
      expect(await cli.currentExitNode()).toBe('exit-box');
    });
  });

  describe('commands', () => {
    it('passes extra arguments to up', async () => {
      queueExit(0);
      await cli.up(['--accept-dns=false']);
      expect(vi.mocked(spawn).mock.calls[0][1]).toEqual(['up', '--accept-dns=false']);
    });

    it('surfaces down failures', async () => {
      queueExit(1, '', 'Access denied');
      await expect(cli.down()).rejects.toThrow('Failed to bring tailscale down: Access denied');
    });

    it('sets an exit node', async () => {
      queueExit(0);
      await cli.setExitNode('exit-box');
      expect(vi.mocked(spawn).mock.calls[0][1]).toEqual([
        'set',
        '--accept-routes=true',
        '--exit-node=exit-box',
      ]);
    });

    it('clears the exit node', async () => {
      queueExit(0);
      await cli.setExitNode(null);
      expect(vi.mocked(spawn).mock.calls[0][1]).toEqual([
        'set',
        '--accept-routes=false',
        '--exit-node=',
      ]);
    });

    it('retries a permission failure through sudo', async () => {
      vi.stubEnv('PATH', '/usr/bin');
      vi.mocked(access).mockResolvedValue(undefined);
      queueExit(1, '', 'Access denied: prefs write access denied (permission denied)');
      queueExit(0);

      await cli.setExitNode('exit-box');

      expect(spawn).toHaveBeenCalledTimes(2);
      expect(vi.mocked(spawn).mock.calls[1][0]).toBe('/usr/bin/sudo');
      expect(vi.mocked(spawn).mock.calls[1][1]).toEqual([
        '-n',
        '/usr/bin/tailscale',
        'set',
        '--accept-routes=true',
        '--exit-node=exit-box',
      ]);
    });

    it('reports the sudo failure when the retry fails too', async () => {
      vi.stubEnv('PATH', '/usr/bin');
      vi.mocked(access).mockResolvedValue(undefined);
      queueExit(1, '', 'permission denied');
      queueExit(1, '', 'sudo: a password is required');

      await expect(cli.setExitNode('exit-box')).rejects.toThrow(
        'Failed to set exit node: sudo: a password is required',
      );
    });

    it('does not retry when sudo is disabled', async () => {
      const noSudo = new TailscaleCli('/usr/bin/tailscale', { logger: silentLogger, allowSudo: false });
      queueExit(1, '', 'permission denied');

      await expect(noSudo.setExitNode('exit-box')).rejects.toThrow(
        'Failed to set exit node: permission denied',
      );
      expect(spawn).toHaveBeenCalledTimes(1);
    });
  });

  describe('create', () => {
    it('resolves the binary on PATH', async () => {
      vi.stubEnv('PATH', '/bin:/usr/bin');
      vi.mocked(access).mockImplementation(async (path) => {
        if (path !== '/usr/bin/tailscale') {
          throw new Error('ENOENT');
        }
      });

      const created = await TailscaleCli.create({ logger: silentLogger });
      expect(created.getExecutable()).toBe('/usr/bin/tailscale');
    });

    it('rejects when the binary is missing', async () => {
      vi.stubEnv('PATH', '/bin:/usr/bin');
      vi.mocked(access).mockRejectedValue(new Error('ENOENT'));

      await expect(TailscaleCli.create({ logger: silentLogger })).rejects.toThrow(
        'tailscale command not found in PATH',
      );
    });
  });

  describe('runCommand', () => {
    it('kills the process and reports 124 on timeout', async () => {
      vi.useFakeTimers();
      const proc = createMockProcess();
      vi.mocked(spawn).mockReturnValueOnce(proc as any);

      const pending = runCommand('/bin/slow', ['wait'], 1000);
      await vi.advanceTimersByTimeAsync(1000);
      const result = await pending;

      expect(proc.kill).toHaveBeenCalledWith('SIGKILL');
      expect(result).toEqual({
        code: 124,
        stdout: '',
        stderr: 'Timeout: /bin/slow wait did not finish within 1000 ms',
      });
    });

    it('reports 127 when the process cannot start', async () => {
      const proc = createMockProcess();
      vi.mocked(spawn).mockReturnValueOnce(proc as any);

      const pending = runCommand('/missing', [], 1000);
      proc.emit('error', new Error('spawn /missing ENOENT'));

      expect(await pending).toEqual({ code: 127, stdout: '', stderr: 'spawn /missing ENOENT' });
    });
  });

  describe('shouldRetryWithSudo', () => {
    it('matches permission failures only', () => {
      expect(shouldRetryWithSudo(1, 'Operation not permitted')).toBe(true);
      expect(shouldRetryWithSudo(1, 'must be root')).toBe(true);
      expect(shouldRetryWithSudo(1, 'invalid exit node')).toBe(false);
      expect(shouldRetryWithSudo(0, 'permission denied')).toBe(false);
      expect(shouldRetryWithSudo(124, 'permission denied')).toBe(false);
    });
  });
});
