import { z } from 'zod';
import { EventEmitter } from 'events';

// ═══════════════════════════════════════════════════════════════════════════
// DEVICE MODEL
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Backend state reported by `tailscale status` when the node is up.
 * Compared case-insensitively.
 */
export const RUNNING_BACKEND_STATE = 'running';

/**
 * A device on the tailnet, as seen in one status snapshot.
 * Rebuilt wholesale on every snapshot, never mutated in place.
 */
export const DeviceSchema = z.object({
  /** Short display name (e.g. "laptop" for "laptop.tail1234.ts.net") */
  name: z.string().optional(),
  /** Tailnet addresses, IPv4 and IPv6 */
  tailnetAddresses: z.array(z.string()),
  /** Operating system label */
  os: z.string().optional(),
  online: z.boolean(),
  /** Device advertises itself as an exit node */
  exitNodeOption: z.boolean(),
  /** Device is the exit node currently in use */
  isExitNode: z.boolean(),
  /** Free-form host metadata, e.g. `Hostname` and `DNSName` */
  hostinfo: z.record(z.string()),
  /** Stable node id */
  id: z.string().optional(),
});
export type Device = z.infer<typeof DeviceSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// STATUS SNAPSHOT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * One point-in-time result of querying backend status.
 */
export interface StatusSnapshot {
  backendState: string;
  self: Device | null;
  /** Every known device, self first */
  devices: Device[];
  /** Devices eligible as exit node */
  exitNodes: Device[];
  /** Derived from backendState and self addresses. See {@link isConnectedState}. */
  connected: boolean;
  activeExitNode: Device | null;
}

export interface StatusSnapshotInit {
  backendState: string;
  self?: Device | null;
  /** Peers, excluding self */
  peers?: Device[];
  activeExitNode?: Device | null;
}

export function isRunningState(backendState: string): boolean {
  return backendState.toLowerCase() === RUNNING_BACKEND_STATE;
}

/**
 * Connected means the backend is running AND this device holds a tailnet address.
 */
export function isConnectedState(backendState: string, selfAddresses: readonly string[]): boolean {
  return isRunningState(backendState) && selfAddresses.length > 0;
}

/**
 * The only way to build a snapshot; `connected` and `exitNodes` are always derived.
 */
export function createStatusSnapshot(init: StatusSnapshotInit): StatusSnapshot {
  const self = init.self ?? null;
  const devices = self ? [self, ...(init.peers ?? [])] : [...(init.peers ?? [])];
  return {
    backendState: init.backendState,
    self,
    devices,
    exitNodes: devices.filter((d) => d.exitNodeOption),
    connected: isConnectedState(init.backendState, self?.tailnetAddresses ?? []),
    activeExitNode: init.activeExitNode ?? null,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// STATUS / COMMAND COLLABORATOR
// ═══════════════════════════════════════════════════════════════════════════

export interface StatusSource {
  status(): Promise<StatusSnapshot>;
}

/**
 * The external process that owns the VPN. Every method rejects with
 * {@link ConnectivityError} when the underlying command fails.
 */
export interface ITailscaleClient extends StatusSource {
  up(extraArgs?: string[]): Promise<void>;
  down(): Promise<void>;
  /** `null` clears the exit node */
  setExitNode(argument: string | null): Promise<void>;
}

// ═══════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A command run against the tailscale binary failed.
 */
export class ConnectivityError extends Error {
  readonly exitCode: number | undefined;
  readonly command: string | undefined;

  constructor(message: string, options?: { exitCode?: number; command?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ConnectivityError';
    this.exitCode = options?.exitCode;
    this.command = options?.command;
  }
}

export type EngineErrorCode =
  | 'UNAVAILABLE'
  | 'COMMAND_FAILED'
  | 'CONVERGENCE_TIMEOUT'
  | 'STATUS_UNAVAILABLE';

export const CONVERGENCE_TIMEOUT_MESSAGE = 'timed out waiting for state change';
export const UNAVAILABLE_MESSAGE = 'tailscale is not available';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
  }
}

/**
 * Normalize any thrown value to a non-empty message.
 */
export function errorMessage(error: unknown, fallback = 'unknown error'): string {
  if (error instanceof Error) {
    return error.message || error.name || fallback;
  }
  if (typeof error === 'string') {
    return error || fallback;
  }
  if (error === undefined || error === null) {
    return fallback;
  }
  return String(error) || fallback;
}

// ═══════════════════════════════════════════════════════════════════════════
// TIMING CONFIG
// ═══════════════════════════════════════════════════════════════════════════

export const TimingConfigSchema = z
  .object({
    /** Background status refresh */
    refreshIntervalMs: z.number().int().positive().default(5000),
    /** Convergence poll tick */
    pollIntervalMs: z.number().int().positive().default(300),
    connectTimeoutMs: z.number().int().positive().default(15000),
    disconnectTimeoutMs: z.number().int().positive().default(6000),
    /** After this long, a non-running backend counts as disconnected */
    disconnectGraceMs: z.number().int().positive().default(1500),
    interactionDebounceMs: z.number().int().positive().default(350),
    /** Delay used when a debounced refresh lands too close to the previous one */
    debounceRetryMs: z.number().int().positive().default(300),
    minRefreshSpacingMs: z.number().int().positive().default(800),
  })
  .superRefine((t, ctx) => {
    if (!(t.pollIntervalMs < t.disconnectGraceMs)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['pollIntervalMs'],
        message: 'pollIntervalMs must be shorter than disconnectGraceMs',
      });
    }
    if (!(t.disconnectGraceMs < t.disconnectTimeoutMs)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['disconnectGraceMs'],
        message: 'disconnectGraceMs must be shorter than disconnectTimeoutMs',
      });
    }
    if (!(t.disconnectTimeoutMs <= t.connectTimeoutMs)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['disconnectTimeoutMs'],
        message: 'disconnectTimeoutMs must not exceed connectTimeoutMs',
      });
    }
    if (!(t.interactionDebounceMs < t.minRefreshSpacingMs)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['interactionDebounceMs'],
        message: 'interactionDebounceMs must be shorter than minRefreshSpacingMs',
      });
    }
    if (!(t.minRefreshSpacingMs <= t.refreshIntervalMs)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minRefreshSpacingMs'],
        message: 'minRefreshSpacingMs must not exceed refreshIntervalMs',
      });
    }
  });
export type TimingConfig = z.output<typeof TimingConfigSchema>;
export type TimingOverrides = z.input<typeof TimingConfigSchema>;

/**
 * Fill in defaults and validate ordering. Throws a ZodError on bad input.
 */
export function resolveTiming(overrides?: TimingOverrides): TimingConfig {
  return TimingConfigSchema.parse(overrides ?? {});
}

// ═══════════════════════════════════════════════════════════════════════════
// NOTICES
// ═══════════════════════════════════════════════════════════════════════════

export type NoticeLevel = 'info' | 'error';

/**
 * Transient message for a status bar.
 */
export interface Notice {
  level: NoticeLevel;
  text: string;
  /** How long a status bar should keep it */
  durationMs: number;
}

export const INFO_NOTICE_MS = 4000;
export const ERROR_NOTICE_MS = 10000;

export function createNotice(level: NoticeLevel, text: string): Notice {
  return { level, text, durationMs: level === 'error' ? ERROR_NOTICE_MS : INFO_NOTICE_MS };
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER INTERFACE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Simple logger interface. Consumers can provide their own logger.
 */
export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Create a logger with a prefix tag.
 */
export function createLogger(prefix: string): Logger {
  return {
    info: (msg, ...args) => console.log(`[${prefix}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[${prefix}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[${prefix}] ${msg}`, ...args),
    debug: (msg, ...args) => console.debug(`[${prefix}] ${msg}`, ...args),
  };
}

/**
 * Logger that drops everything. Handy in tests.
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

// ═══════════════════════════════════════════════════════════════════════════
// TYPED EVENT EMITTER
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Type-safe EventEmitter. Extend with an event map to get typed on/off/emit.
 *
 * Usage: `class Foo extends TypedEventEmitter<{ myEvent: (x: number) => void }>`
 */
export class TypedEventEmitter<
  Events extends {} = {},
> extends EventEmitter {
  override on<K extends string & keyof Events>(
    event: K,
    listener: Events[K] & ((...args: any[]) => void),
  ): this {
    return super.on(event, listener);
  }

  override once<K extends string & keyof Events>(
    event: K,
    listener: Events[K] & ((...args: any[]) => void),
  ): this {
    return super.once(event, listener);
  }

  override off<K extends string & keyof Events>(
    event: K,
    listener: Events[K] & ((...args: any[]) => void),
  ): this {
    return super.off(event, listener);
  }

  override emit<K extends string & keyof Events>(
    event: K,
    ...args: Events[K] extends (...args: infer A) => any ? A : never
  ): boolean {
    return super.emit(event, ...args);
  }
}
