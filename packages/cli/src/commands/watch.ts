import { defineCommand } from 'citty';
import { consola } from 'consola';
import type { ControllerView } from '@tailwarden/engine';
import { createContext, forwardKeypresses, sharedArgs } from '../context.js';
import { formatDeviceTable, formatSummary } from '../format.js';

/**
 * Fingerprint of the parts of a view worth printing again.
 */
function viewKey(view: ControllerView): string {
  return JSON.stringify([
    view.backendState,
    view.connected,
    view.transition,
    view.exitNode.activeArgument,
    view.exitNode.pending,
    view.statusError,
    view.devices.map((d) => [d.id, d.online]),
  ]);
}

export const watchCommand = defineCommand({
  meta: {
    name: 'watch',
    description: 'Follow connection and exit node state until interrupted',
  },
  args: {
    ...sharedArgs,
  },
  async run({ args }) {
    const { controller } = await createContext({ tailscale: args.tailscale, verbose: args.verbose });
    let lastKey = '';

    controller.on('viewChanged', (view: ControllerView) => {
      const key = viewKey(view);
      if (key === lastKey) return;
      lastKey = key;

      consola.info(`State at ${new Date().toLocaleTimeString()}`);
      for (const line of formatSummary(view)) {
        consola.log(line);
      }
      if (view.devices.length > 0) {
        const active = view.devices.find((d) => d.isExitNode) ?? null;
        for (const line of formatDeviceTable(view.devices, active)) {
          consola.log(line);
        }
      }
    });

    controller.on('notice', (notice) => {
      if (notice.level === 'error') {
        consola.error(notice.text);
      } else {
        consola.success(notice.text);
      }
    });

    controller.on('transitionFinished', (result) => {
      consola.debug(`Transition ${result.direction} finished (ok=${result.ok})`);
    });

    let restoreInput = () => {};
    const shutdown = () => {
      consola.info('Shutting down...');
      restoreInput();
      controller.stop();
      process.exit(0);
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    controller.start();
    if (!controller.getView().available) {
      process.exitCode = 1;
      process.off('SIGINT', shutdown);
      process.off('SIGTERM', shutdown);
      return;
    }

    restoreInput = forwardKeypresses(process.stdin, controller, shutdown);
    consola.debug('Press any key to refresh, Ctrl-C to quit');
  },
});
