import { ClientConfig, loadConfig } from '../lib/config.js';
import { createLogger, Logger } from '../lib/logger.js';

export interface GlobalOptions {
  config?: string;
  token?: string;
  url?: string;
  logLevel?: string;
}

export interface CommandContext {
  config: ClientConfig;
  logger: Logger;
}

export function createContext(globals: GlobalOptions, extra: { dockerHost?: string } = {}): CommandContext {
  let config: ClientConfig;
  try {
    config = loadConfig({
      configPath: globals.config,
      overrides: {
        token: globals.token,
        url: globals.url,
        logLevel: globals.logLevel,
        dockerHost: extra.dockerHost
      }
    });
  } catch (err) {
    console.error(`\n❌ ERROR: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }

  const logger = createLogger({
    level: config.logging.level,
    file: config.logging.file || undefined
  });

  return { config, logger };
}

export function requireToken(config: ClientConfig): string {
  if (!config.api.token) {
    console.error('\n❌ ERROR: api token required');
    console.error('pass --token, set SNSYNC_API_TOKEN or add api.token to your config file');
    console.error(`get one from ${config.api.url.replace(/\/api\/v\d+\/?$/, '')}/settings/api-tokens`);
    process.exit(1);
  }
  return config.api.token;
}

export function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    console.error(`\n❌ ERROR: ${flag} must be a positive whole number, got "${value}"`);
    process.exit(1);
  }
  return parsed;
}
