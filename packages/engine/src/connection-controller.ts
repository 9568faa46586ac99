/**
 * ConnectionController - Owns connection and exit-node state for a control surface
 *
 * Wires the dispatcher, poller, reconciler and debouncer together and exposes
 * only operations plus a view. A UI or a test drives it through these and
 * listens for events; nothing else touches its state.
 *
 * Lifecycle:
 *   start() -> refresh now and every refreshIntervalMs
 *   connect()/disconnect() -> command -> poll until converged -> final refresh
 *   stop() -> timers cleared, poll aborted, open transition failed
 */

import {
  EngineError,
  TypedEventEmitter,
  UNAVAILABLE_MESSAGE,
  createLogger,
  createNotice,
  resolveTiming,
} from '@tailwarden/types';
import type {
  Device,
  ITailscaleClient,
  Logger,
  Notice,
  StatusSnapshot,
  TimingConfig,
  TimingOverrides,
} from '@tailwarden/types';
import { CommandDispatcher } from './command-dispatcher.js';
import { ConvergencePoller, type PollOutcome } from './convergence-poller.js';
import { ExitNodeReconciler, type ExitNodeIntent, type ExitNodeView } from './exit-node-reconciler.js';
import { InteractionDebouncer } from './interaction-debouncer.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const TRANSITION_BUSY_MESSAGE = 'a connection change is already in progress';
export const STOPPED_MESSAGE = 'controller stopped';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface ControllerConfig {
  /** null when the tailscale binary could not be found */
  client: ITailscaleClient | null;
  logger?: Logger;
  timing?: TimingOverrides;
  /** Extra arguments for `tailscale up` */
  upArgs?: string[];
}

export type TransitionDirection = 'connect' | 'disconnect';
export type TransitionState = 'connecting' | 'disconnecting';

export interface TransitionResult {
  direction: TransitionDirection;
  ok: boolean;
  /** Connection state the transition settled on, null when it failed */
  connected: boolean | null;
  error: EngineError | null;
}

export interface ControllerView {
  available: boolean;
  backendState: string | null;
  connected: boolean;
  selfAddresses: string[];
  devices: Device[];
  canConnect: boolean;
  canDisconnect: boolean;
  transition: TransitionState | null;
  polling: boolean;
  exitNode: ExitNodeView;
  lastRefreshAt: number | null;
  statusError: string | null;
}

export interface ConnectionControllerEvents {
  transitionFinished: (result: TransitionResult) => void;
  snapshot: (snapshot: StatusSnapshot) => void;
  viewChanged: (view: ControllerView) => void;
  notice: (notice: Notice) => void;
  exitNodeConfirmed: (intent: ExitNodeIntent) => void;
  exitNodeFailed: (message: string) => void;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class ConnectionController extends TypedEventEmitter<ConnectionControllerEvents> {
  private readonly client: ITailscaleClient | null;
  private readonly log: Logger;
  private readonly timing: TimingConfig;
  private readonly upArgs: string[];

  private readonly dispatcher: CommandDispatcher;
  private readonly poller: ConvergencePoller;
  private readonly reconciler: ExitNodeReconciler;
  private readonly debouncer: InteractionDebouncer;

  private snapshot: StatusSnapshot | null = null;
  private statusError: string | null = null;
  private lastRefreshAt: number | null = null;
  private refreshing = false;
  private refreshQueued = false;
  private transition: TransitionState | null = null;
  private transitionGeneration = 0;
  private stopped = false;
  private refreshHandle: ReturnType<typeof setInterval> | null = null;

  constructor(config: ControllerConfig) {
    super();
    this.client = config.client;
    this.log = config.logger ?? createLogger('ConnectionController');
    this.timing = resolveTiming(config.timing);
    this.upArgs = config.upArgs ?? [];

    this.dispatcher = new CommandDispatcher(this.log);
    this.poller = new ConvergencePoller(this.client, this.log, this.timing);
    this.reconciler = new ExitNodeReconciler(this.client, this.dispatcher, this.log);
    this.debouncer = new InteractionDebouncer(
      {
        refresh: () => this.refresh(),
        lastRefreshAt: () => this.lastRefreshAt,
      },
      this.log,
      this.timing,
    );

    this.setupReconcilerHandlers();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────

  start(): void {
    if (this.refreshHandle) return;
    this.stopped = false;

    if (!this.client) {
      this.statusError = UNAVAILABLE_MESSAGE;
      this.log.warn(UNAVAILABLE_MESSAGE);
      this.emit('notice', createNotice('error', UNAVAILABLE_MESSAGE));
      this.emitView();
      return;
    }

    this.log.info('Starting');
    this.refresh();
    this.refreshHandle = setInterval(() => {
      this.refresh();
    }, this.timing.refreshIntervalMs);
  }

  stop(): void {
    this.stopped = true;
    if (this.refreshHandle) {
      clearInterval(this.refreshHandle);
      this.refreshHandle = null;
    }
    this.refreshQueued = false;
    this.debouncer.cancel();
    this.poller.abort(STOPPED_MESSAGE);

    // up/down may still be running; its callback is ignored from here on
    if (this.transition !== null) {
      this.finishTransition({
        direction: this.transition === 'connecting' ? 'connect' : 'disconnect',
        ok: false,
        connected: null,
        error: new EngineError('COMMAND_FAILED', STOPPED_MESSAGE),
      });
    }
    this.log.info('Stopped');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // STATUS
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Fetch status. A refresh asked for while one is running is folded into a
   * single follow-up refresh.
   */
  refresh(): void {
    const client = this.client;
    if (!client) return;

    if (this.refreshing) {
      this.refreshQueued = true;
      return;
    }
    this.refreshing = true;

    this.dispatcher.submit(
      () => client.status(),
      (snapshot) => {
        this.refreshing = false;
        this.lastRefreshAt = Date.now();
        this.applySnapshot(snapshot);
        this.drainRefreshQueue();
      },
      (message) => {
        this.refreshing = false;
        this.lastRefreshAt = Date.now();
        this.statusError = message;
        this.log.debug(`Status refresh failed: ${message}`);
        this.emitView();
        this.drainRefreshQueue();
      },
    );
  }

  getSnapshot(): StatusSnapshot | null {
    return this.snapshot;
  }

  notifyInteraction(): void {
    this.debouncer.notify();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // CONNECTION
  // ─────────────────────────────────────────────────────────────────────────

  connect(): boolean {
    return this.beginTransition('connect');
  }

  disconnect(): boolean {
    return this.beginTransition('disconnect');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // EXIT NODE
  // ─────────────────────────────────────────────────────────────────────────

  setExitNode(enable: boolean, target?: string | null): boolean {
    return this.reconciler.request(enable, target);
  }

  selectExitNode(target: string): boolean {
    return this.reconciler.select(target);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // VIEW
  // ─────────────────────────────────────────────────────────────────────────

  getView(): ControllerView {
    const available = this.client !== null;
    const connected = this.snapshot?.connected ?? false;
    const polling = this.poller.isPolling();
    const idle = available && this.transition === null && !polling;

    return {
      available,
      backendState: this.snapshot?.backendState ?? null,
      connected,
      selfAddresses: this.snapshot?.self?.tailnetAddresses ?? [],
      devices: this.snapshot?.devices ?? [],
      canConnect: idle && !connected,
      canDisconnect: idle && connected,
      transition: this.transition,
      polling,
      exitNode: this.reconciler.getView(),
      lastRefreshAt: this.lastRefreshAt,
      statusError: this.statusError,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private setupReconcilerHandlers(): void {
    this.reconciler.on('viewChanged', () => {
      this.emitView();
    });

    this.reconciler.on('notice', (notice) => {
      this.emit('notice', notice);
    });

    this.reconciler.on('intentConfirmed', (intent) => {
      this.emit('exitNodeConfirmed', intent);
    });

    this.reconciler.on('commandFinished', (ok, message) => {
      if (!ok) {
        this.emit('exitNodeFailed', message ?? 'exit node change failed');
      }
      if (!this.stopped) {
        this.refresh();
      }
    });
  }

  private beginTransition(direction: TransitionDirection): boolean {
    const client = this.client;
    if (!client) {
      this.emit('notice', createNotice('error', UNAVAILABLE_MESSAGE));
      return false;
    }
    if (this.transition !== null || this.poller.isPolling()) {
      this.emit('notice', createNotice('info', TRANSITION_BUSY_MESSAGE));
      return false;
    }

    const targetConnected = direction === 'connect';
    const generation = ++this.transitionGeneration;
    this.stopped = false;
    this.transition = targetConnected ? 'connecting' : 'disconnecting';
    this.log.info(targetConnected ? 'Connecting' : 'Disconnecting');
    this.emitView();

    this.dispatcher.submit(
      () => (targetConnected ? client.up(this.upArgs) : client.down()),
      () => {
        if (generation !== this.transitionGeneration || this.transition === null) return;
        this.poller.start(
          { targetConnected, downStartedNow: !targetConnected },
          (outcome) => this.handlePollOutcome(direction, outcome),
        );
        this.emitView();
      },
      (message) => {
        if (generation !== this.transitionGeneration) return;
        this.finishTransition({
          direction,
          ok: false,
          connected: null,
          error: new EngineError('COMMAND_FAILED', message),
        });
        this.poller.abort(message);
      },
    );
    return true;
  }

  private handlePollOutcome(direction: TransitionDirection, outcome: PollOutcome): void {
    switch (outcome.kind) {
      case 'converged':
        if (outcome.snapshot) {
          this.applySnapshot(outcome.snapshot);
        }
        this.finishTransition({ direction, ok: true, connected: outcome.connected, error: null });
        break;

      case 'timed-out':
        this.finishTransition({
          direction,
          ok: false,
          connected: null,
          error: new EngineError('CONVERGENCE_TIMEOUT', outcome.message),
        });
        break;

      case 'aborted':
        if (outcome.reason === 'superseded') {
          return;
        }
        this.finishTransition({
          direction,
          ok: false,
          connected: null,
          error: new EngineError(
            outcome.reason === 'unavailable' ? 'UNAVAILABLE' : 'COMMAND_FAILED',
            outcome.message,
          ),
        });
        break;
    }
  }

  private finishTransition(result: TransitionResult): void {
    if (this.transition === null) return;
    this.transition = null;

    if (result.ok) {
      this.log.info(result.direction === 'connect' ? 'Connected' : 'Disconnected');
      this.emit('notice', createNotice('info', result.direction === 'connect' ? 'Connected' : 'Disconnected'));
    } else {
      const message = result.error?.message ?? 'transition failed';
      this.log.warn(`${result.direction} failed: ${message}`);
      this.emit('notice', createNotice('error', message));
    }

    this.emit('transitionFinished', result);
    this.emitView();
    if (!this.stopped) {
      this.refresh();
    }
  }

  private applySnapshot(snapshot: StatusSnapshot): void {
    this.snapshot = snapshot;
    this.statusError = null;
    // reconcile() emits viewChanged, which reaches listeners through emitView
    this.reconciler.reconcile(snapshot);
    this.emit('snapshot', snapshot);
  }

  private drainRefreshQueue(): void {
    if (this.refreshQueued) {
      this.refreshQueued = false;
      this.refresh();
    }
  }

  private emitView(): void {
    this.emit('viewChanged', this.getView());
  }
}
