// process supervisor - keeps the sync daemon running as a managed service.
// pm2 is the only implementation for now

import { execFile } from 'child_process';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { promisify } from 'util';
import type { Logger } from 'pino';
import { z } from 'zod';

export interface ServiceDefinition {
  name: string;
  script: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
  errorFile?: string;
  outFile?: string;
  logFile?: string;
  maxMemoryRestart?: string;
}

export interface ServiceStatus {
  name: string;
  pid?: number;
  status?: string;
  uptime?: number;
  restarts?: number;
  memory?: number;
  cpu?: number;
}

export interface ProcessSupervisor {
  isAvailable(): Promise<boolean>;
  // returns the path of whatever file the supervisor was started from
  install(definition: ServiceDefinition): Promise<string>;
  status(name: string): Promise<ServiceStatus | null>;
  start(name: string): Promise<boolean>;
  stop(name: string): Promise<boolean>;
  restart(name: string): Promise<boolean>;
  remove(name: string): Promise<boolean>;
}

// rejects when the command exits non-zero
export type CommandRunner = (command: string, args: string[]) => Promise<{ stdout: string; stderr: string }>;

const execFileAsync = promisify(execFile);

export const runCommand: CommandRunner = async (command, args) => {
  const { stdout, stderr } = await execFileAsync(command, args);
  return { stdout, stderr };
};

const pm2ProcessSchema = z.object({
  name: z.string(),
  pid: z.number().optional(),
  pm2_env: z
    .object({
      status: z.string().optional(),
      pm_uptime: z.number().optional(),
      restart_time: z.number().optional(),
    })
    .passthrough()
    .optional(),
  monit: z
    .object({
      memory: z.number().optional(),
      cpu: z.number().optional(),
    })
    .optional(),
});

export function buildEcosystem(definition: ServiceDefinition) {
  const { name } = definition;
  return {
    apps: [{
      name,
      script: definition.script,
      args: (definition.args ?? []).join(' '),
      cwd: definition.cwd ?? process.cwd(),
      env: definition.env ?? {},
      error_file: definition.errorFile ?? `/var/log/${name}-error.log`,
      out_file: definition.outFile ?? `/var/log/${name}-out.log`,
      log_file: definition.logFile ?? `/var/log/${name}.log`,
      time: true,
      autorestart: true,
      watch: false,
      max_memory_restart: definition.maxMemoryRestart ?? '200M',
      instances: 1,
      exec_mode: 'fork',
      min_uptime: '10s',
      max_restarts: 15
    }]
  };
}

interface Pm2SupervisorOptions {
  logger: Logger;
  runner?: CommandRunner;
  // where ecosystem files are written
  directory?: string;
  writeFile?: (path: string, contents: string) => Promise<void>;
}

export class Pm2Supervisor implements ProcessSupervisor {
  private logger: Logger;
  private run: CommandRunner;
  private directory: string;
  private write: (path: string, contents: string) => Promise<void>;

  constructor(options: Pm2SupervisorOptions) {
    this.logger = options.logger;
    this.run = options.runner ?? runCommand;
    this.directory = options.directory ?? process.cwd();
    this.write = options.writeFile ?? ((path, contents) => writeFile(path, contents, 'utf8'));
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.run('pm2', ['--version']);
      return true;
    } catch (err) {
      this.logger.debug({ err }, 'pm2 not found');
      return false;
    }
  }

  async install(definition: ServiceDefinition): Promise<string> {
    if (!(await this.isAvailable())) {
      throw new Error('pm2 is not installed. install it with: npm install -g pm2');
    }

    const ecosystemPath = join(this.directory, `${definition.name}.config.js`);
    const ecosystem = buildEcosystem(definition);
    await this.write(ecosystemPath, `module.exports = ${JSON.stringify(ecosystem, null, 2)};\n`);

    // replace whatever ran under this name before
    if (await this.status(definition.name)) {
      await this.remove(definition.name);
    }

    await this.run('pm2', ['start', ecosystemPath]);
    await this.run('pm2', ['save']);
    this.logger.info({ name: definition.name, ecosystemPath }, 'pm2 service installed');
    return ecosystemPath;
  }

  async status(name: string): Promise<ServiceStatus | null> {
    const { stdout } = await this.run('pm2', ['jlist']);
    const processes = z.array(pm2ProcessSchema).parse(JSON.parse(stdout));

    const proc = processes.find(p => p.name === name);
    if (!proc) return null;

    return {
      name: proc.name,
      pid: proc.pid,
      status: proc.pm2_env?.status,
      uptime: proc.pm2_env?.pm_uptime,
      restarts: proc.pm2_env?.restart_time,
      memory: proc.monit?.memory,
      cpu: proc.monit?.cpu
    };
  }

  start(name: string): Promise<boolean> {
    return this.action('start', name);
  }

  stop(name: string): Promise<boolean> {
    return this.action('stop', name);
  }

  restart(name: string): Promise<boolean> {
    return this.action('restart', name);
  }

  async remove(name: string): Promise<boolean> {
    await this.action('stop', name);
    const deleted = await this.action('delete', name);
    await this.run('pm2', ['save']);
    return deleted;
  }

  private async action(action: string, name: string): Promise<boolean> {
    try {
      await this.run('pm2', [action, name]);
      return true;
    } catch (err) {
      this.logger.error({ err, name }, `failed to ${action} service`);
      return false;
    }
  }
}
