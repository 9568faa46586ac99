/**
 * ConvergencePoller - Waits for the backend to reach a connection target
 *
 * `tailscale up` and `tailscale down` return before the node has actually
 * changed state. After one of them succeeds, the poller re-fetches status
 * every tick until:
 * 1. `connected` matches the target
 * 2. (disconnect only) the backend left `running` after the grace period
 * 3. (disconnect only) status itself can no longer be fetched
 * 4. the direction timeout elapses
 *
 * One session at a time. Starting a new session supersedes the old one and
 * late results of the old session are dropped.
 */

import {
  CONVERGENCE_TIMEOUT_MESSAGE,
  ConnectivityError,
  UNAVAILABLE_MESSAGE,
  createLogger,
  errorMessage,
  isRunningState,
} from '@tailwarden/types';
import type { Logger, StatusSnapshot, StatusSource } from '@tailwarden/types';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_POLL_INTERVAL_MS = 300;
const DEFAULT_CONNECT_TIMEOUT_MS = 15000;
const DEFAULT_DISCONNECT_TIMEOUT_MS = 6000;
const DEFAULT_DISCONNECT_GRACE_MS = 1500;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface PollerTimingConfig {
  pollIntervalMs?: number;
  connectTimeoutMs?: number;
  disconnectTimeoutMs?: number;
  disconnectGraceMs?: number;
}

export interface PollRequest {
  targetConnected: boolean;
  /** Start the disconnect grace clock now */
  downStartedNow?: boolean;
}

export type PollPhase = 'idle' | 'polling';

export type ConvergedReason = 'matched' | 'backend-stopped' | 'status-unavailable';
export type AbortReason = 'unavailable' | 'superseded' | 'cancelled';

export type PollOutcome =
  | {
      kind: 'converged';
      /** Always the session target */
      connected: boolean;
      reason: ConvergedReason;
      /** Snapshot that settled the session, null when status was unavailable */
      snapshot: StatusSnapshot | null;
    }
  | { kind: 'timed-out'; targetConnected: boolean; message: string }
  | { kind: 'aborted'; reason: AbortReason; message: string };

export type PollFinishCallback = (outcome: PollOutcome) => void;

interface PollSession {
  id: number;
  targetConnected: boolean;
  startedAt: number;
  downStartedAt: number | null;
  fetching: boolean;
  intervalHandle: ReturnType<typeof setInterval> | null;
  onFinish: PollFinishCallback;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class ConvergencePoller {
  private readonly source: StatusSource | null;
  private readonly log: Logger;
  private readonly pollIntervalMs: number;
  private readonly connectTimeoutMs: number;
  private readonly disconnectTimeoutMs: number;
  private readonly disconnectGraceMs: number;
  private session: PollSession | null = null;
  private nextSessionId = 1;

  constructor(source: StatusSource | null, logger?: Logger, timing?: PollerTimingConfig) {
    this.source = source;
    this.log = logger ?? createLogger('ConvergencePoller');
    this.pollIntervalMs = timing?.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.connectTimeoutMs = timing?.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.disconnectTimeoutMs = timing?.disconnectTimeoutMs ?? DEFAULT_DISCONNECT_TIMEOUT_MS;
    this.disconnectGraceMs = timing?.disconnectGraceMs ?? DEFAULT_DISCONNECT_GRACE_MS;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // STATE
  // ─────────────────────────────────────────────────────────────────────────

  getPhase(): PollPhase {
    return this.session ? 'polling' : 'idle';
  }

  isPolling(): boolean {
    return this.session !== null;
  }

  getTarget(): boolean | null {
    return this.session?.targetConnected ?? null;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────

  start(request: PollRequest, onFinish: PollFinishCallback): void {
    if (this.session) {
      this.finish(this.session, {
        kind: 'aborted',
        reason: 'superseded',
        message: 'superseded by a new transition',
      });
    }

    if (!this.source) {
      this.invoke(onFinish, { kind: 'aborted', reason: 'unavailable', message: UNAVAILABLE_MESSAGE });
      return;
    }

    const now = Date.now();
    const session: PollSession = {
      id: this.nextSessionId++,
      targetConnected: request.targetConnected,
      startedAt: now,
      downStartedAt: request.downStartedNow ? now : null,
      fetching: false,
      intervalHandle: null,
      onFinish,
    };
    this.session = session;
    this.log.debug(
      `Session ${session.id} polling for ${request.targetConnected ? 'connected' : 'disconnected'}`,
    );

    session.intervalHandle = setInterval(() => {
      this.tick(session);
    }, this.pollIntervalMs);
  }

  /**
   * End the active session, if any, with an aborted outcome.
   */
  abort(message: string, reason: AbortReason = 'cancelled'): void {
    if (!this.session) return;
    this.finish(this.session, { kind: 'aborted', reason, message });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // POLLING
  // ─────────────────────────────────────────────────────────────────────────

  private tick(session: PollSession): void {
    if (this.session !== session || !this.source) return;

    if (session.fetching) {
      // A slow status call must not keep the session alive past its deadline
      if (this.isExpired(session, Date.now())) {
        this.timeOut(session);
      }
      return;
    }

    session.fetching = true;
    this.source
      .status()
      .then(
        (snapshot) => this.evaluate(session, snapshot, null),
        (error: unknown) => this.evaluate(session, null, error),
      )
      .catch((error: unknown) => {
        this.log.error(`Poll tick failed: ${errorMessage(error)}`);
      });
  }

  private evaluate(session: PollSession, snapshot: StatusSnapshot | null, error: unknown): void {
    if (this.session !== session) {
      this.log.debug(`Dropping late result of session ${session.id}`);
      return;
    }
    session.fetching = false;
    const now = Date.now();
    const target = session.targetConnected;

    if (snapshot) {
      if (snapshot.connected === target) {
        this.converge(session, 'matched', snapshot);
        return;
      }
      if (
        !target &&
        session.downStartedAt !== null &&
        now - session.downStartedAt >= this.disconnectGraceMs &&
        !isRunningState(snapshot.backendState)
      ) {
        this.converge(session, 'backend-stopped', snapshot);
        return;
      }
    } else {
      this.log.debug(`Status unavailable while polling: ${errorMessage(error)}`);
      if (!target && error instanceof ConnectivityError) {
        this.converge(session, 'status-unavailable', null);
        return;
      }
    }

    if (this.isExpired(session, now)) {
      this.timeOut(session);
    }
  }

  private isExpired(session: PollSession, now: number): boolean {
    const timeoutMs = session.targetConnected ? this.connectTimeoutMs : this.disconnectTimeoutMs;
    return now - session.startedAt >= timeoutMs;
  }

  private converge(session: PollSession, reason: ConvergedReason, snapshot: StatusSnapshot | null): void {
    this.finish(session, {
      kind: 'converged',
      connected: session.targetConnected,
      reason,
      snapshot,
    });
  }

  private timeOut(session: PollSession): void {
    this.finish(session, {
      kind: 'timed-out',
      targetConnected: session.targetConnected,
      message: CONVERGENCE_TIMEOUT_MESSAGE,
    });
  }

  private finish(session: PollSession, outcome: PollOutcome): void {
    if (session.intervalHandle) {
      clearInterval(session.intervalHandle);
      session.intervalHandle = null;
    }
    if (this.session === session) {
      this.session = null;
    }
    this.log.debug(`Session ${session.id} finished: ${outcome.kind}`);
    this.invoke(session.onFinish, outcome);
  }

  private invoke(onFinish: PollFinishCallback, outcome: PollOutcome): void {
    try {
      onFinish(outcome);
    } catch (error) {
      this.log.error(`Error in poll finish callback: ${errorMessage(error)}`);
    }
  }
}
