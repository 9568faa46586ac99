/**
 * TailscaleCli - Drives the local `tailscale` binary
 *
 * Every call spawns the CLI, waits for it to exit and maps a non-zero exit
 * into a ConnectivityError. Status output is parsed into a StatusSnapshot.
 *
 * No singletons - the executable path is provided by the consumer.
 */

import { ConnectivityError, createLogger } from '@tailwarden/types';
import type { ITailscaleClient, Logger, StatusSnapshot } from '@tailwarden/types';
import { TIMEOUT_EXIT_CODE, findExecutable, runCommand, type CommandResult } from './process.js';
import { parseStatusOutput } from './status-parser.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_EXECUTABLE = 'tailscale';
const DEFAULT_COMMAND_TIMEOUT_MS = 15000;
const DEFAULT_UP_TIMEOUT_MS = 60000;

const SUDO_HINTS = [
  'permission denied',
  'must be root',
  'requires root',
  'requires sudo',
  'sudo',
  'operation not permitted',
];

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface TailscaleCliOptions {
  /** Binary name or path. Defaults to `tailscale` on PATH. */
  executable?: string;
  logger?: Logger;
  /** Retry permission failures of `tailscale set` through `sudo -n` */
  allowSudo?: boolean;
  commandTimeoutMs?: number;
  upTimeoutMs?: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function outputText(result: CommandResult): string {
  return (result.stderr || result.stdout || '').trim();
}

/**
 * A failed `tailscale set` is worth retrying as root when its output looks
 * like a permission problem. Timeouts are never retried.
 */
export function shouldRetryWithSudo(exitCode: number, message: string): boolean {
  if (exitCode === 0 || exitCode === TIMEOUT_EXIT_CODE) {
    return false;
  }
  const lowered = message.toLowerCase();
  return SUDO_HINTS.some((hint) => lowered.includes(hint));
}

export async function tailscaleAvailable(executable = DEFAULT_EXECUTABLE): Promise<boolean> {
  return (await findExecutable(executable)) !== null;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class TailscaleCli implements ITailscaleClient {
  private readonly executable: string;
  private readonly log: Logger;
  private readonly allowSudo: boolean;
  private readonly commandTimeoutMs: number;
  private readonly upTimeoutMs: number;

  /**
   * Resolve the binary first. Rejects with ConnectivityError when it is missing.
   */
  static async create(options: TailscaleCliOptions = {}): Promise<TailscaleCli> {
    const requested = options.executable ?? DEFAULT_EXECUTABLE;
    const resolved = await findExecutable(requested);
    if (!resolved) {
      throw new ConnectivityError(`${requested} command not found in PATH`);
    }
    return new TailscaleCli(resolved, options);
  }

  constructor(executable: string, options: TailscaleCliOptions = {}) {
    this.executable = executable;
    this.log = options.logger ?? createLogger('TailscaleCli');
    this.allowSudo = options.allowSudo ?? true;
    this.commandTimeoutMs = options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.upTimeoutMs = options.upTimeoutMs ?? DEFAULT_UP_TIMEOUT_MS;
  }

  getExecutable(): string {
    return this.executable;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // STATUS
  // ─────────────────────────────────────────────────────────────────────────

  async status(): Promise<StatusSnapshot> {
    const result = await this.run(['status', '--json'], this.commandTimeoutMs);
    if (result.code !== 0) {
      throw new ConnectivityError(`Failed to fetch tailscale status: ${outputText(result)}`, {
        exitCode: result.code,
        command: 'status',
      });
    }
    return parseStatusOutput(result.stdout);
  }

  async isConnected(): Promise<boolean> {
    try {
      return (await this.status()).connected;
    } catch (error) {
      if (error instanceof ConnectivityError) {
        this.log.debug(`Status unavailable: ${error.message}`);
        return false;
      }
      throw error;
    }
  }

  /**
   * Display name of the exit node in use, or null.
   */
  async currentExitNode(): Promise<string | null> {
    const snapshot = await this.status();
    const active = snapshot.activeExitNode ?? snapshot.devices.find((d) => d.isExitNode);
    return active?.name ?? null;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // COMMANDS
  // ─────────────────────────────────────────────────────────────────────────

  async up(extraArgs: string[] = []): Promise<void> {
    const result = await this.run(['up', ...extraArgs], this.upTimeoutMs);
    if (result.code !== 0) {
      throw new ConnectivityError(`Failed to bring tailscale up: ${outputText(result)}`, {
        exitCode: result.code,
        command: 'up',
      });
    }
  }

  async down(): Promise<void> {
    const result = await this.run(['down'], this.commandTimeoutMs);
    if (result.code !== 0) {
      throw new ConnectivityError(`Failed to bring tailscale down: ${outputText(result)}`, {
        exitCode: result.code,
        command: 'down',
      });
    }
  }

  async setExitNode(argument: string | null): Promise<void> {
    const args = argument
      ? ['set', '--accept-routes=true', `--exit-node=${argument}`]
      : ['set', '--accept-routes=false', '--exit-node='];

    const result = await this.run(args, this.commandTimeoutMs);
    if (result.code === 0) {
      return;
    }

    let message = outputText(result);
    let exitCode = result.code;

    if (this.allowSudo && shouldRetryWithSudo(result.code, message)) {
      const sudo = await findExecutable('sudo');
      if (sudo) {
        this.log.info('Retrying exit node change through sudo');
        const retry = await runCommand(sudo, ['-n', this.executable, ...args], this.commandTimeoutMs);
        if (retry.code === 0) {
          return;
        }
        message = outputText(retry) || message;
        exitCode = retry.code;
      }
    }

    throw new ConnectivityError(`Failed to set exit node: ${message}`, {
      exitCode,
      command: 'set',
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private async run(args: string[], timeoutMs: number): Promise<CommandResult> {
    this.log.debug(`Running ${this.executable} ${args.join(' ')}`);
    const result = await runCommand(this.executable, args, timeoutMs);
    if (result.code !== 0) {
      this.log.warn(`${args[0]} exited with code ${result.code}`);
    }
    return result;
  }
}

export { runCommand, findExecutable, TIMEOUT_EXIT_CODE, SPAWN_FAILED_EXIT_CODE } from './process.js';
export type { CommandResult } from './process.js';
export {
  parseStatus,
  parseStatusOutput,
  parsePeer,
  shortHostname,
  RawStatusSchema,
  RawPeerSchema,
} from './status-parser.js';
export type { RawStatus, RawPeer } from './status-parser.js';
