// ═══════════════════════════════════════════════════════════════════════════
// tailwarden — Unified entry point for tailscale connection control
// ═══════════════════════════════════════════════════════════════════════════

import { TailscaleCli } from '@tailwarden/cli-client';
import { ConnectionController } from '@tailwarden/engine';
import { ConnectivityError, createLogger } from '@tailwarden/types';
import type { Logger, TimingOverrides } from '@tailwarden/types';

// Controller (primary API)
export { ConnectionController, STOPPED_MESSAGE, TRANSITION_BUSY_MESSAGE } from '@tailwarden/engine';
export type {
  ControllerConfig,
  ControllerView,
  ConnectionControllerEvents,
  TransitionDirection,
  TransitionState,
  TransitionResult,
} from '@tailwarden/engine';

// Engine parts
export { CommandDispatcher, ConvergencePoller, ExitNodeReconciler, InteractionDebouncer } from '@tailwarden/engine';
export type {
  PollOutcome,
  PollRequest,
  ExitNodeIntent,
  ExitNodeView,
  ExitNodeOption,
} from '@tailwarden/engine';
export {
  aliasesFor,
  preferredArgument,
  buildAliasMap,
  resolveAlias,
  findDeviceByAlias,
  intentSatisfied,
  NO_EXIT_NODES_MESSAGE,
} from '@tailwarden/engine';

// tailscale CLI
export { TailscaleCli, parseStatus, parseStatusOutput, tailscaleAvailable } from '@tailwarden/cli-client';
export type { TailscaleCliOptions } from '@tailwarden/cli-client';

// Types & utilities
export {
  createLogger,
  createStatusSnapshot,
  isConnectedState,
  resolveTiming,
  ConnectivityError,
  EngineError,
  TypedEventEmitter,
} from '@tailwarden/types';
export type {
  Device,
  StatusSnapshot,
  ITailscaleClient,
  StatusSource,
  EngineErrorCode,
  Logger,
  Notice,
  TimingConfig,
  TimingOverrides,
} from '@tailwarden/types';

// ═══════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════

export interface CreateControllerOptions {
  /** Binary name or path, `tailscale` by default */
  executable?: string;
  logger?: Logger;
  timing?: TimingOverrides;
  upArgs?: string[];
}

/**
 * Locate the tailscale binary and build a controller around it. A missing
 * binary yields a controller whose view reports `available: false`.
 */
export async function createController(options: CreateControllerOptions = {}): Promise<ConnectionController> {
  const logger = options.logger ?? createLogger('tailwarden');
  let client: TailscaleCli | null = null;
  try {
    client = await TailscaleCli.create({ executable: options.executable, logger });
  } catch (error) {
    if (!(error instanceof ConnectivityError)) {
      throw error;
    }
    logger.warn(error.message);
  }
  return new ConnectionController({ client, logger, timing: options.timing, upArgs: options.upArgs });
}
