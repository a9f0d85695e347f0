import { Command } from 'commander';
import { Pm2Supervisor, ServiceStatus } from '../lib/supervisor.js';
import { createContext } from './context.js';

export const DEFAULT_SERVICE_NAME = 'snsync';

export interface ServiceOptions {
  name: string;
}

export async function installServiceCommand(options: ServiceOptions, command: Command) {
  const { config, logger } = createContext(command.optsWithGlobals());

  if (!config.api.token) {
    logger.warn('no api token configured, the service will not be able to sync until one is set');
  }

  const supervisor = new Pm2Supervisor({ logger });

  const env: Record<string, string> = { SNSYNC_API_URL: config.api.url };
  if (config.api.token) {
    env.SNSYNC_API_TOKEN = config.api.token;
  }

  try {
    const ecosystemPath = await supervisor.install({
      name: options.name,
      script: process.argv[1],
      args: ['sync'],
      cwd: process.cwd(),
      env
    });
    console.log(`\n✓ service "${options.name}" installed (${ecosystemPath})`);
    console.log(`check it with: snsync service status --name ${options.name}\n`);
  } catch (err) {
    console.error(`\n❌ failed to install service: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  }
}

function printStatus(status: ServiceStatus) {
  const uptime = status.uptime ? Math.round((Date.now() - status.uptime) / 1000) : 0;
  console.log(`\nservice: ${status.name}`);
  console.log(`status: ${status.status ?? 'unknown'}`);
  console.log(`pid: ${status.pid ?? '-'}`);
  console.log(`uptime: ${Math.floor(uptime / 3600)}h ${Math.floor((uptime / 60) % 60)}m`);
  console.log(`restarts: ${status.restarts ?? 0}`);
  console.log(`memory: ${((status.memory ?? 0) / (1024 * 1024)).toFixed(1)} MB`);
  console.log(`cpu: ${status.cpu ?? 0}%\n`);
}

export const SERVICE_ACTIONS = ['status', 'start', 'stop', 'restart', 'remove'] as const;
export type ServiceAction = (typeof SERVICE_ACTIONS)[number];

function isServiceAction(value: string): value is ServiceAction {
  return SERVICE_ACTIONS.some(a => a === value);
}

export async function serviceCommand(action: string, options: ServiceOptions, command: Command) {
  const { logger } = createContext(command.optsWithGlobals());

  if (!isServiceAction(action)) {
    console.error(`\n❌ unknown action "${action}", expected one of: ${SERVICE_ACTIONS.join(', ')}`);
    process.exit(1);
  }

  const supervisor = new Pm2Supervisor({ logger });
  if (!(await supervisor.isAvailable())) {
    console.error('\n❌ pm2 is not installed. install it with: npm install -g pm2\n');
    process.exit(1);
  }

  if (action === 'status') {
    const status = await supervisor.status(options.name);
    if (!status) {
      console.log(`\nservice "${options.name}" is not installed\n`);
      return;
    }
    printStatus(status);
    return;
  }

  const ok = await supervisor[action](options.name);
  if (!ok) {
    console.error(`\n❌ failed to ${action} service "${options.name}"\n`);
    process.exit(1);
  }
  console.log(`\n✓ service "${options.name}": ${action} done\n`);
}
