import convict from 'convict';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { DEFAULT_DOCKER_HOST } from './docker.js';
import { parsePort } from './ports.js';
import { SessionMode } from './types.js';

export interface ClientConfig {
  api: {
    token: string;
    url: string;
    timeout: number;
    sessionMode: SessionMode;
  };
  discovery: {
    fromDocker: boolean;
    dockerHost: string;
    commonPorts: number[];
    portRange: number[];
    timeout: number;
    imageAllowlist: string[];
    nameHints: string[];
    sessionMode: SessionMode;
  };
  sync: {
    interval: number;
    batchSize: number;
    probeTimeout: number;
    sessionMode: SessionMode;
  };
  logging: {
    level: string;
    file: string;
  };
}

// env gives us "14000,14001", files give us arrays
convict.addFormat({
  name: 'port-list',
  validate(value: unknown) {
    if (!Array.isArray(value) || value.some(p => !Number.isInteger(p) || p < 1 || p > 65535)) {
      throw new Error('must be a list of ports');
    }
  },
  coerce(value: unknown) {
    if (typeof value === 'string') {
      return value.split(',').filter(t => t.trim() !== '').map(parsePort);
    }
    return value;
  }
});

// zero would mean a spinning sync loop or an empty batch
convict.addFormat({
  name: 'positive-int',
  validate(value: unknown) {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      throw new Error('must be a positive integer');
    }
  },
  coerce(value: unknown) {
    return typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  }
});

const SESSION_MODES: SessionMode[] = ['shared', 'per-call'];

const schema: convict.Schema<ClientConfig> = {
  api: {
    token: {
      doc: 'api token from the dashboard',
      format: String,
      default: '',
      env: 'SNSYNC_API_TOKEN',
      sensitive: true
    },
    url: {
      doc: 'dashboard api base url',
      format: String,
      default: 'https://storj.cloud/api/v1',
      env: 'SNSYNC_API_URL'
    },
    timeout: {
      doc: 'dashboard request timeout in seconds',
      format: 'positive-int',
      default: 30,
      env: 'SNSYNC_API_TIMEOUT'
    },
    sessionMode: {
      doc: 'connection reuse for one-shot commands',
      format: SESSION_MODES,
      default: 'per-call',
      env: 'SNSYNC_API_SESSION_MODE'
    }
  },
  discovery: {
    fromDocker: {
      doc: 'look for nodes in docker containers when no scan is requested',
      format: Boolean,
      default: true,
      env: 'SNSYNC_FROM_DOCKER'
    },
    dockerHost: {
      doc: 'docker daemon address',
      format: String,
      default: DEFAULT_DOCKER_HOST,
      env: 'DOCKER_HOST'
    },
    commonPorts: {
      doc: 'dashboard ports tried by --auto',
      format: 'port-list',
      default: [14000, 14001, 14002, 14003, 14004, 14005],
      env: 'SNSYNC_COMMON_PORTS'
    },
    portRange: {
      doc: 'default range for range scans, [start, end]',
      format: 'port-list',
      default: [14000, 14010]
    },
    timeout: {
      doc: 'per port probe timeout in seconds',
      format: 'positive-int',
      default: 5,
      env: 'SNSYNC_DISCOVERY_TIMEOUT'
    },
    imageAllowlist: {
      doc: 'images that mark a container as a storage node',
      format: Array,
      default: ['storjlabs/storagenode', 'storj/storagenode']
    },
    nameHints: {
      doc: 'container name fragments that mark a storage node',
      format: Array,
      default: ['storj', 'storagenode']
    },
    sessionMode: {
      doc: 'connection reuse while probing during discovery',
      format: SESSION_MODES,
      default: 'per-call'
    }
  },
  sync: {
    interval: {
      doc: 'seconds between sync cycles',
      format: 'positive-int',
      default: 300,
      env: 'SNSYNC_SYNC_INTERVAL'
    },
    batchSize: {
      doc: 'nodes refreshed at the same time',
      format: 'positive-int',
      default: 10,
      env: 'SNSYNC_BATCH_SIZE'
    },
    probeTimeout: {
      doc: 'per node status probe timeout in seconds',
      format: 'positive-int',
      default: 10,
      env: 'SNSYNC_PROBE_TIMEOUT'
    },
    sessionMode: {
      doc: 'connection reuse for the long running sync client',
      format: SESSION_MODES,
      default: 'shared',
      env: 'SNSYNC_SYNC_SESSION_MODE'
    }
  },
  logging: {
    level: {
      doc: 'log level',
      format: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
      env: 'SNSYNC_LOG_LEVEL'
    },
    file: {
      doc: 'also write logs to this file',
      format: String,
      default: '',
      env: 'SNSYNC_LOG_FILE'
    }
  }
};

// cli flags, highest precedence
export interface ConfigOverrides {
  token?: string;
  url?: string;
  logLevel?: string;
  dockerHost?: string;
}

export interface LoadConfigOptions {
  configPath?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
  // where to look when no path is given
  searchPaths?: string[];
}

export function defaultConfigPaths(): string[] {
  return [
    join(process.cwd(), 'snsync.config.json'),
    join(homedir(), '.snsync', 'config.json')
  ];
}

export function loadConfig(options: LoadConfigOptions = {}): ClientConfig {
  const config = convict(schema, { env: options.env ?? process.env, args: [] });

  if (options.configPath && !existsSync(options.configPath)) {
    throw new Error(`config file not found: ${options.configPath}`);
  }

  const paths = options.configPath
    ? [options.configPath]
    : (options.searchPaths ?? defaultConfigPaths());

  // first one that exists wins
  const path = paths.find(p => existsSync(p));
  if (path) {
    let contents: unknown;
    try {
      contents = JSON.parse(readFileSync(path, 'utf8'));
    } catch (err) {
      throw new Error(`invalid config file ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
    config.load(contents);
  }

  const overrides = options.overrides ?? {};
  if (overrides.token) config.set('api.token', overrides.token);
  if (overrides.url) config.set('api.url', overrides.url);
  if (overrides.logLevel) config.set('logging.level', overrides.logLevel);
  if (overrides.dockerHost) config.set('discovery.dockerHost', overrides.dockerHost);

  config.validate({ allowed: 'strict' });

  const properties = config.getProperties();
  if (properties.discovery.portRange.length !== 2) {
    throw new Error('discovery.portRange must be [start, end]');
  }
  return properties;
}
