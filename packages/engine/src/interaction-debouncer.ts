/**
 * InteractionDebouncer - Collapses bursts of interaction into one refresh
 *
 * The first notify() arms a delayed refresh; further notifies while it is
 * armed are absorbed. A refresh never fires closer than the minimum spacing
 * to the previous one, whoever triggered that one.
 */

import { createLogger } from '@tailwarden/types';
import type { Logger } from '@tailwarden/types';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_DEBOUNCE_MS = 350;
const DEFAULT_RETRY_MS = 300;
const DEFAULT_MIN_SPACING_MS = 800;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface DebouncerTimingConfig {
  interactionDebounceMs?: number;
  debounceRetryMs?: number;
  minRefreshSpacingMs?: number;
}

export interface DebouncerHooks {
  /** Start a refresh */
  refresh: () => void;
  /** When the last refresh completed, or null if none has */
  lastRefreshAt: () => number | null;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class InteractionDebouncer {
  private readonly hooks: DebouncerHooks;
  private readonly log: Logger;
  private readonly debounceMs: number;
  private readonly retryMs: number;
  private readonly minSpacingMs: number;
  private timeoutHandle: ReturnType<typeof setTimeout> | null = null;

  constructor(hooks: DebouncerHooks, logger?: Logger, timing?: DebouncerTimingConfig) {
    this.hooks = hooks;
    this.log = logger ?? createLogger('InteractionDebouncer');
    this.debounceMs = timing?.interactionDebounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.retryMs = timing?.debounceRetryMs ?? DEFAULT_RETRY_MS;
    this.minSpacingMs = timing?.minRefreshSpacingMs ?? DEFAULT_MIN_SPACING_MS;
  }

  notify(): void {
    if (this.timeoutHandle) return;
    this.schedule(this.debounceMs);
  }

  cancel(): void {
    if (this.timeoutHandle) {
      clearTimeout(this.timeoutHandle);
      this.timeoutHandle = null;
    }
  }

  isScheduled(): boolean {
    return this.timeoutHandle !== null;
  }

  private schedule(delayMs: number): void {
    this.timeoutHandle = setTimeout(() => {
      this.timeoutHandle = null;
      this.fire();
    }, delayMs);
  }

  private fire(): void {
    const last = this.hooks.lastRefreshAt();
    if (last !== null && Date.now() - last < this.minSpacingMs) {
      this.log.debug('Refresh too soon after the previous one, retrying');
      this.schedule(this.retryMs);
      return;
    }
    this.hooks.refresh();
  }
}
