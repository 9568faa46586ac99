import { defineCommand } from 'citty';
import { consola } from 'consola';
import { createContext, sharedArgs, splitArgs, waitForTransition } from '../context.js';
import type { ContextOptions } from '../context.js';

/**
 * Run one connect or disconnect through the controller and report how it ended.
 */
async function runTransition(direction: 'connect' | 'disconnect', options: ContextOptions): Promise<void> {
  const { controller } = await createContext(options);

  controller.on('notice', (notice) => {
    if (notice.level === 'error') {
      consola.error(notice.text);
    } else {
      consola.success(notice.text);
    }
  });

  const finished = waitForTransition(controller);
  const accepted = direction === 'connect' ? controller.connect() : controller.disconnect();
  if (!accepted) {
    process.exitCode = 1;
    return;
  }

  consola.start(direction === 'connect' ? 'Bringing tailscale up...' : 'Bringing tailscale down...');
  const result = await finished;
  controller.stop();
  if (!result.ok) {
    process.exitCode = 1;
  }
}

export const upCommand = defineCommand({
  meta: {
    name: 'up',
    description: 'Connect and wait until status reports the node as connected',
  },
  args: {
    ...sharedArgs,
    'up-args': {
      type: 'string',
      description: 'Extra arguments for `tailscale up`, space separated',
    },
  },
  async run({ args }) {
    await runTransition('connect', {
      tailscale: args.tailscale,
      verbose: args.verbose,
      upArgs: splitArgs(args['up-args']),
    });
  },
});

export const downCommand = defineCommand({
  meta: {
    name: 'down',
    description: 'Disconnect and wait until status reports the node as down',
  },
  args: {
    ...sharedArgs,
  },
  async run({ args }) {
    await runTransition('disconnect', { tailscale: args.tailscale, verbose: args.verbose });
  },
});
