import { defineCommand } from 'citty';
import { statusCommand } from './commands/status.js';
import { upCommand, downCommand } from './commands/connection.js';
import { exitNodeCommand } from './commands/exit-node.js';
import { watchCommand } from './commands/watch.js';

export const main = defineCommand({
  meta: {
    name: 'tailwarden',
    version: '0.1.0',
    description: 'Connect, disconnect and pick exit nodes through the tailscale CLI',
  },
  subCommands: {
    status: statusCommand,
    up: upCommand,
    down: downCommand,
    'exit-node': exitNodeCommand,
    watch: watchCommand,
  },
});
