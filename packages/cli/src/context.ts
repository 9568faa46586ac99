/**
 * Shared setup for the commands: locate the binary, build a controller and
 * turn controller events into promises a command can await.
 */

import { z } from 'zod';
import type { ArgsDef } from 'citty';
import { TailscaleCli } from '@tailwarden/cli-client';
import { ConnectionController } from '@tailwarden/engine';
import type { ControllerView, ExitNodeIntent, TransitionResult } from '@tailwarden/engine';
import {
  CONVERGENCE_TIMEOUT_MESSAGE,
  ConnectivityError,
  EngineError,
  UNAVAILABLE_MESSAGE,
} from '@tailwarden/types';
import type { Logger, StatusSnapshot, TimingOverrides } from '@tailwarden/types';
import { createCliLogger, setVerbose } from './logger.js';

export const TAILSCALE_ENV = 'TAILWARDEN_TAILSCALE';

export const sharedArgs = {
  tailscale: {
    type: 'string',
    description: `Path to the tailscale binary (env: ${TAILSCALE_ENV})`,
  },
  verbose: {
    type: 'boolean',
    description: 'Show debug output',
    default: false,
  },
} satisfies ArgsDef;

export const timeoutArg = {
  timeout: {
    type: 'string',
    description: 'Seconds to wait for the change to show up in status',
    default: '30',
  },
} satisfies ArgsDef;

const TimeoutSecondsSchema = z.coerce.number().positive();

export function parseTimeoutMs(value: string): number {
  const result = TimeoutSecondsSchema.safeParse(value);
  if (!result.success) {
    throw new Error(`Invalid --timeout: ${value}`);
  }
  return result.data * 1000;
}

/**
 * `--up-args "--accept-dns=false --ssh"` -> ['--accept-dns=false', '--ssh']
 */
export function splitArgs(value: string | undefined): string[] {
  return (value ?? '').split(/\s+/).filter((arg) => arg !== '');
}

export interface CliContext {
  controller: ConnectionController;
  client: TailscaleCli | null;
  logger: Logger;
}

export interface ContextOptions {
  tailscale?: string;
  verbose?: boolean;
  upArgs?: string[];
  timing?: TimingOverrides;
}

export async function createContext(options: ContextOptions): Promise<CliContext> {
  setVerbose(options.verbose ?? false);
  const logger = createCliLogger();
  const executable = options.tailscale || process.env[TAILSCALE_ENV] || 'tailscale';

  let client: TailscaleCli | null = null;
  try {
    client = await TailscaleCli.create({ executable, logger });
  } catch (error) {
    if (!(error instanceof ConnectivityError)) {
      throw error;
    }
    logger.warn(error.message);
  }

  const controller = new ConnectionController({
    client,
    logger,
    upArgs: options.upArgs,
    timing: options.timing,
  });
  return { controller, client, logger };
}

/**
 * Refresh once and resolve with the snapshot, or reject with STATUS_UNAVAILABLE.
 */
export function refreshOnce(controller: ConnectionController): Promise<StatusSnapshot> {
  return new Promise((resolve, reject) => {
    if (!controller.getView().available) {
      reject(new EngineError('UNAVAILABLE', UNAVAILABLE_MESSAGE));
      return;
    }
    const cleanup = () => {
      controller.off('snapshot', onSnapshot);
      controller.off('viewChanged', onView);
    };
    const onSnapshot = (snapshot: StatusSnapshot) => {
      cleanup();
      resolve(snapshot);
    };
    const onView = (view: ControllerView) => {
      if (view.statusError) {
        cleanup();
        reject(new EngineError('STATUS_UNAVAILABLE', view.statusError));
      }
    };
    controller.on('snapshot', onSnapshot);
    controller.on('viewChanged', onView);
    controller.refresh();
  });
}

export function waitForTransition(controller: ConnectionController): Promise<TransitionResult> {
  return new Promise((resolve) => {
    controller.once('transitionFinished', resolve);
  });
}

/**
 * Resolve once a snapshot confirms the requested exit node. Rejects when the
 * command fails or nothing is confirmed within `timeoutMs`.
 */
export function waitForExitNode(controller: ConnectionController, timeoutMs: number): Promise<ExitNodeIntent> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      cleanup();
      reject(new EngineError('CONVERGENCE_TIMEOUT', CONVERGENCE_TIMEOUT_MESSAGE));
    }, timeoutMs);

    const cleanup = () => {
      clearTimeout(timer);
      controller.off('exitNodeConfirmed', onConfirmed);
      controller.off('exitNodeFailed', onFailed);
    };
    const onConfirmed = (intent: ExitNodeIntent) => {
      cleanup();
      resolve(intent);
    };
    const onFailed = (message: string) => {
      cleanup();
      reject(new EngineError('COMMAND_FAILED', message));
    };
    controller.on('exitNodeConfirmed', onConfirmed);
    controller.on('exitNodeFailed', onFailed);
  });
}

// ─────────────────────────────────────────────────────────────────────────
// KEYPRESSES
// ─────────────────────────────────────────────────────────────────────────

const CTRL_C = '\u0003';

export interface KeypressInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  resume(): unknown;
  pause(): unknown;
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  off(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
}

/**
 * Read a terminal in raw mode and turn each keypress into a debounced
 * refresh. Raw mode swallows the SIGINT for Ctrl-C, so that key calls
 * `onInterrupt` instead. Returns a function that restores the terminal.
 */
export function forwardKeypresses(
  input: KeypressInput,
  controller: Pick<ConnectionController, 'notifyInteraction'>,
  onInterrupt: () => void,
): () => void {
  if (!input.isTTY || !input.setRawMode) {
    return () => {};
  }

  const onData = (chunk: Buffer | string) => {
    const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    if (text.includes(CTRL_C)) {
      onInterrupt();
      return;
    }
    controller.notifyInteraction();
  };

  input.setRawMode(true);
  input.on('data', onData);
  input.resume();

  return () => {
    input.off('data', onData);
    input.setRawMode?.(false);
    input.pause();
  };
}
