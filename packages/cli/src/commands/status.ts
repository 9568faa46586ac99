import { defineCommand } from 'citty';
import { consola } from 'consola';
import { errorMessage } from '@tailwarden/types';
import type { StatusSnapshot } from '@tailwarden/types';
import { createContext, refreshOnce, sharedArgs } from '../context.js';
import { formatDeviceTable, formatSummary } from '../format.js';

export const statusCommand = defineCommand({
  meta: {
    name: 'status',
    description: 'Show connection state, devices and the active exit node',
  },
  args: {
    ...sharedArgs,
  },
  async run({ args }) {
    const { controller } = await createContext({ tailscale: args.tailscale, verbose: args.verbose });

    let snapshot: StatusSnapshot;
    try {
      snapshot = await refreshOnce(controller);
    } catch (error) {
      consola.error(errorMessage(error));
      process.exitCode = 1;
      return;
    }

    for (const line of formatSummary(controller.getView())) {
      consola.log(line);
    }
    consola.log('');
    for (const line of formatDeviceTable(snapshot.devices, snapshot.activeExitNode)) {
      consola.log(line);
    }
  },
});
