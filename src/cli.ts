#!/usr/bin/env node
import { Command } from 'commander';
import { authCommand } from './commands/auth.js';
import { discoverCommand } from './commands/discover.js';
import { DEFAULT_SERVICE_NAME, installServiceCommand, serviceCommand } from './commands/service.js';
import { syncCommand } from './commands/sync.js';

const program = new Command();

program
  .name('snsync')
  .description('discover storage nodes and keep the monitoring dashboard in sync with them')
  .version('0.1.0')
  .option('-c, --config <path>', 'config file path')
  .option('-t, --token <token>', 'api token from the dashboard')
  .option('--url <url>', 'dashboard api url')
  .option('--log-level <level>', 'log level (debug, info, warn, error)');

program
  .command('discover')
  .description('find storage nodes and register them with the dashboard')
  .option('--from-docker', 'look for nodes in docker containers')
  .option('--docker-host <host>', 'docker daemon address (default: local socket)')
  .option('-s, --server <ip>', 'host to scan (default: detected local address)')
  .option('-p, --ports <ports>', 'comma separated ports to scan')
  .option('--port-range <range>', 'port range to scan, e.g. 14000-14005')
  .option('--range', 'scan the port range from the config file')
  .option('--auto', 'scan the common dashboard ports')
  .option('--timeout <seconds>', 'per port timeout')
  .option('--json', 'print results as json')
  .action(discoverCommand);

program
  .command('sync')
  .description('keep registered nodes up to date with the dashboard')
  .option('-i, --interval <seconds>', 'seconds between sync cycles')
  .option('--batch-size <n>', 'nodes refreshed at the same time')
  .option('--once', 'run a single cycle and exit')
  .action(syncCommand);

program
  .command('auth')
  .description('check that the api token works')
  .action(authCommand);

program
  .command('install-service')
  .description('run the sync daemon as a pm2 service')
  .option('--name <name>', 'service name', DEFAULT_SERVICE_NAME)
  .action(installServiceCommand);

program
  .command('service')
  .description('manage the pm2 service')
  .argument('<action>', 'status, start, stop, restart or remove')
  .option('--name <name>', 'service name', DEFAULT_SERVICE_NAME)
  .action(serviceCommand);

program.parseAsync(process.argv).catch(err => {
  console.error(`\n❌ ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
