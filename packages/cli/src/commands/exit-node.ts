import { defineCommand } from 'citty';
import { consola } from 'consola';
import { errorMessage } from '@tailwarden/types';
import {
  createContext,
  parseTimeoutMs,
  refreshOnce,
  sharedArgs,
  timeoutArg,
  waitForExitNode,
} from '../context.js';

/** Refresh faster than the default while waiting for confirmation */
const CONFIRM_REFRESH_MS = 1000;

export const exitNodeCommand = defineCommand({
  meta: {
    name: 'exit-node',
    description: 'Route traffic through an exit node, or stop with --off',
  },
  args: {
    target: {
      type: 'positional',
      description: 'Name, address or id of the exit node (defaults to the last one used)',
      required: false,
    },
    off: {
      type: 'boolean',
      description: 'Clear the exit node',
      default: false,
    },
    ...sharedArgs,
    ...timeoutArg,
  },
  async run({ args }) {
    let timeoutMs: number;
    try {
      timeoutMs = parseTimeoutMs(args.timeout);
    } catch (error) {
      consola.error(errorMessage(error));
      process.exitCode = 1;
      return;
    }

    const { controller } = await createContext({
      tailscale: args.tailscale,
      verbose: args.verbose,
      timing: { refreshIntervalMs: CONFIRM_REFRESH_MS },
    });

    controller.on('notice', (notice) => {
      if (notice.level === 'error') {
        consola.error(notice.text);
      } else {
        consola.info(notice.text);
      }
    });

    try {
      await refreshOnce(controller);
    } catch (error) {
      consola.error(errorMessage(error));
      process.exitCode = 1;
      return;
    }

    if (!controller.setExitNode(!args.off, args.target || null)) {
      process.exitCode = 1;
      return;
    }

    // Confirmation needs a later snapshot, so listening after the request is safe
    const confirmed = waitForExitNode(controller, timeoutMs);
    controller.start();
    try {
      const intent = await confirmed;
      consola.success(intent.enabled ? `Using exit node ${intent.target}` : 'Exit node cleared');
    } catch (error) {
      consola.error(errorMessage(error));
      process.exitCode = 1;
    } finally {
      controller.stop();
    }
  },
});
