/**
 * CommandDispatcher - Runs collaborator calls off the caller's stack
 *
 * Each submitted task settles into exactly one callback. Tasks are
 * independent; callers gate overlapping work with their own busy flags.
 */

import { createLogger, errorMessage } from '@tailwarden/types';
import type { Logger } from '@tailwarden/types';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type Task<T> = () => T | Promise<T>;
export type SuccessCallback<T> = (result: T) => void;
export type FailureCallback = (message: string) => void;

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class CommandDispatcher {
  private readonly log: Logger;
  private inFlight = 0;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger('CommandDispatcher');
  }

  getInFlightCount(): number {
    return this.inFlight;
  }

  /**
   * Run `task` on a later turn of the event loop. A throw or rejection from
   * the task becomes a failure message; it never reaches the caller.
   */
  submit<T>(task: Task<T>, onSuccess: SuccessCallback<T>, onFailure: FailureCallback): void {
    this.inFlight++;

    Promise.resolve()
      .then(task)
      .then(
        (result) => {
          this.inFlight--;
          this.deliver('success', () => onSuccess(result));
        },
        (error: unknown) => {
          this.inFlight--;
          const message = errorMessage(error, 'command failed');
          this.log.debug(`Task failed: ${message}`);
          this.deliver('failure', () => onFailure(message));
        },
      )
      .catch((error: unknown) => {
        this.log.error(`Dispatcher error: ${errorMessage(error)}`);
      });
  }

  private deliver(kind: 'success' | 'failure', callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.log.error(`Error in ${kind} callback: ${errorMessage(error)}`);
    }
  }
}
