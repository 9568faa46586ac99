export {
  aliasesFor,
  preferredArgument,
  buildAliasMap,
  resolveAlias,
  findDeviceByAlias,
  displayLabel,
} from './identity.js';
export type { AliasMap } from './identity.js';

export { CommandDispatcher } from './command-dispatcher.js';
export type { Task, SuccessCallback, FailureCallback } from './command-dispatcher.js';

export { ConvergencePoller } from './convergence-poller.js';
export type {
  PollerTimingConfig,
  PollRequest,
  PollPhase,
  PollOutcome,
  PollFinishCallback,
  ConvergedReason,
  AbortReason,
} from './convergence-poller.js';

export {
  ExitNodeReconciler,
  intentSatisfied,
  resolveActiveArgument,
  NO_EXIT_NODES_MESSAGE,
  EXIT_NODE_BUSY_MESSAGE,
} from './exit-node-reconciler.js';
export type {
  ExitNodeIntent,
  ExitNodeOption,
  ExitNodeView,
  ExitNodeReconcilerEvents,
} from './exit-node-reconciler.js';

export { InteractionDebouncer } from './interaction-debouncer.js';
export type { DebouncerTimingConfig, DebouncerHooks } from './interaction-debouncer.js';

export { ConnectionController, STOPPED_MESSAGE, TRANSITION_BUSY_MESSAGE } from './connection-controller.js';
export type {
  ControllerConfig,
  ControllerView,
  ConnectionControllerEvents,
  TransitionDirection,
  TransitionState,
  TransitionResult,
} from './connection-controller.js';
