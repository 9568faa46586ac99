/**
 * ExitNodeReconciler - Tracks the desired exit node against what status reports
 *
 * A request records an intent and dispatches `setExitNode`. The command
 * returning does not mean the node switched, so the intent stays pending
 * until a snapshot shows it satisfied. Matching goes through device aliases
 * because status and the command name devices differently.
 */

import { UNAVAILABLE_MESSAGE, TypedEventEmitter, createLogger, createNotice } from '@tailwarden/types';
import type { Device, ITailscaleClient, Logger, Notice, StatusSnapshot } from '@tailwarden/types';
import type { CommandDispatcher } from './command-dispatcher.js';
import {
  type AliasMap,
  aliasesFor,
  buildAliasMap,
  displayLabel,
  findDeviceByAlias,
  preferredArgument,
  resolveAlias,
} from './identity.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const NO_EXIT_NODES_MESSAGE = 'no exit nodes available';
export const EXIT_NODE_BUSY_MESSAGE = 'an exit node change is already in progress';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface ExitNodeIntent {
  enabled: boolean;
  /** Canonical argument, null when clearing */
  target: string | null;
}

export interface ExitNodeOption {
  argument: string;
  label: string;
  online: boolean;
}

export interface ExitNodeView {
  /** Toggle state: the pending intent while unconfirmed, else what status shows */
  enabled: boolean;
  selectedArgument: string | null;
  activeArgument: string | null;
  options: ExitNodeOption[];
  /** A setExitNode command is in flight */
  busy: boolean;
  /** An intent is waiting for confirmation */
  pending: boolean;
}

export interface ExitNodeReconcilerEvents {
  intentConfirmed: (intent: ExitNodeIntent) => void;
  /** The setExitNode command returned; message is set on failure */
  commandFinished: (ok: boolean, message: string | null) => void;
  viewChanged: () => void;
  notice: (notice: Notice) => void;
}

// ═══════════════════════════════════════════════════════════════════════════
// MATCHING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Whether the observed active exit node fulfils the intent.
 *
 * Enabling is satisfied when the active argument equals the target, or when
 * the target (plus the aliases of the eligible device it names) shares an
 * alias with the active device.
 */
export function intentSatisfied(
  intent: ExitNodeIntent,
  active: Device | null,
  activeArgument: string | null,
  eligible: readonly Device[],
): boolean {
  if (!intent.enabled) {
    return active === null;
  }
  if (!active || !intent.target) {
    return false;
  }
  if (activeArgument === intent.target) {
    return true;
  }

  const targetAliases = new Set([intent.target]);
  const targetDevice = findDeviceByAlias(eligible, intent.target);
  if (targetDevice) {
    for (const alias of aliasesFor(targetDevice)) {
      targetAliases.add(alias);
    }
  }
  for (const alias of aliasesFor(active)) {
    if (targetAliases.has(alias)) {
      return true;
    }
  }
  return false;
}

/**
 * Canonical argument of the active device: the first of its aliases the
 * alias map knows, else its own preferred argument.
 */
export function resolveActiveArgument(active: Device | null, aliasMap: AliasMap): string | null {
  if (!active) return null;
  for (const alias of aliasesFor(active)) {
    const argument = resolveAlias(aliasMap, alias);
    if (argument) {
      return argument;
    }
  }
  return preferredArgument(active);
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class ExitNodeReconciler extends TypedEventEmitter<ExitNodeReconcilerEvents> {
  private readonly client: ITailscaleClient | null;
  private readonly dispatcher: CommandDispatcher;
  private readonly log: Logger;

  private eligible: Device[] = [];
  private aliasMap: AliasMap = new Map();
  private active: Device | null = null;
  private activeArgument: string | null = null;

  private intent: ExitNodeIntent | null = null;
  private busy = false;
  private lastApplied: string | null = null;
  private selected: string | null = null;

  constructor(client: ITailscaleClient | null, dispatcher: CommandDispatcher, logger?: Logger) {
    super();
    this.client = client;
    this.dispatcher = dispatcher;
    this.log = logger ?? createLogger('ExitNodeReconciler');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // STATE
  // ─────────────────────────────────────────────────────────────────────────

  isBusy(): boolean {
    return this.busy;
  }

  getIntent(): ExitNodeIntent | null {
    return this.intent ? { ...this.intent } : null;
  }

  getLastApplied(): string | null {
    return this.lastApplied;
  }

  getView(): ExitNodeView {
    const options: ExitNodeOption[] = [];
    for (const device of this.eligible) {
      const argument = preferredArgument(device);
      if (argument) {
        options.push({ argument, label: displayLabel(device), online: device.online });
      }
    }

    const pendingUnsatisfied = this.intent !== null && !this.isSatisfied(this.intent);
    return {
      enabled: this.intent && pendingUnsatisfied ? this.intent.enabled : this.active !== null,
      selectedArgument: this.selected,
      activeArgument: this.activeArgument,
      options,
      busy: this.busy,
      pending: this.intent !== null,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // REQUESTS
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Ask for an exit node (or none). Returns false when the request was
   * rejected; a notice explains why.
   */
  request(enable: boolean, targetArgument?: string | null): boolean {
    const client = this.client;
    if (!client) {
      this.notify('error', UNAVAILABLE_MESSAGE);
      return false;
    }
    if (this.busy) {
      this.notify('info', EXIT_NODE_BUSY_MESSAGE);
      return false;
    }

    let target: string | null = null;
    if (enable) {
      target = targetArgument ? this.canonical(targetArgument) : this.fallbackTarget();
      if (!target) {
        this.notify('error', NO_EXIT_NODES_MESSAGE);
        return false;
      }
      this.selected = target;
    }

    const intent: ExitNodeIntent = { enabled: enable, target };
    this.intent = intent;
    this.busy = true;
    this.log.info(enable ? `Setting exit node to ${target}` : 'Clearing exit node');
    this.emit('viewChanged');

    this.dispatcher.submit(
      () => client.setExitNode(target),
      () => {
        this.busy = false;
        if (target) {
          this.lastApplied = target;
        }
        this.notify('info', target ? `Exit node set to ${target}` : 'Exit node cleared');
        this.emit('commandFinished', true, null);
        this.emit('viewChanged');
      },
      (message) => {
        this.busy = false;
        if (this.intent === intent) {
          this.intent = null;
        }
        this.log.warn(`Exit node change failed: ${message}`);
        this.notify('error', message);
        this.emit('commandFinished', false, message);
        this.emit('viewChanged');
      },
    );
    return true;
  }

  /**
   * Record the user's pick. Applied right away when the toggle is on.
   */
  select(targetArgument: string): boolean {
    const target = this.canonical(targetArgument);
    this.selected = target;
    if (this.getView().enabled && target !== this.activeArgument) {
      return this.request(true, target);
    }
    this.emit('viewChanged');
    return true;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // RECONCILIATION
  // ─────────────────────────────────────────────────────────────────────────

  reconcile(snapshot: StatusSnapshot): void {
    this.eligible = snapshot.exitNodes;
    this.aliasMap = buildAliasMap(snapshot.exitNodes);
    this.active = snapshot.activeExitNode;
    this.activeArgument = resolveActiveArgument(this.active, this.aliasMap);

    if (this.selected === null && this.activeArgument) {
      this.selected = this.activeArgument;
    }

    const intent = this.intent;
    if (intent && !this.busy && this.isSatisfied(intent)) {
      this.intent = null;
      this.log.info(intent.enabled ? `Exit node ${intent.target} confirmed` : 'Exit node cleared');
      this.emit('intentConfirmed', { ...intent });
    }

    this.emit('viewChanged');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private isSatisfied(intent: ExitNodeIntent): boolean {
    return intentSatisfied(intent, this.active, this.activeArgument, this.eligible);
  }

  private canonical(argument: string): string {
    return resolveAlias(this.aliasMap, argument) ?? argument;
  }

  private isEligible(argument: string): boolean {
    return this.eligible.some((device) => preferredArgument(device) === argument);
  }

  private fallbackTarget(): string | null {
    if (this.selected && this.isEligible(this.selected)) {
      return this.selected;
    }
    if (this.lastApplied && this.isEligible(this.lastApplied)) {
      return this.lastApplied;
    }
    for (const device of this.eligible) {
      const argument = preferredArgument(device);
      if (argument) {
        return argument;
      }
    }
    return null;
  }

  private notify(level: Notice['level'], text: string): void {
    this.emit('notice', createNotice(level, text));
  }
}
