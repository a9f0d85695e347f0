import { Command } from 'commander';
import { TransportError, UnauthorizedError } from '../lib/errors.js';
import { RegistryClient } from '../services/registry-client.js';
import { createContext, requireToken } from './context.js';

export async function authCommand(_options: unknown, command: Command) {
  const { config, logger } = createContext(command.optsWithGlobals());
  const token = requireToken(config);

  const registry = new RegistryClient({
    baseUrl: config.api.url,
    token,
    logger,
    sessionMode: config.api.sessionMode,
    timeoutMs: config.api.timeout * 1000
  });

  logger.info('testing authentication...');

  try {
    const account = await registry.validateCredential();
    console.log('\n✓ authentication successful');
    console.log(`user: ${account.email ?? 'unknown'}`);
    console.log(`permissions: ${(account.permissions ?? []).join(', ') || 'none'}\n`);
  } catch (err) {
    if (err instanceof UnauthorizedError) {
      console.error('\n❌ authentication failed: the dashboard rejected this api token\n');
      process.exit(1);
    }
    if (err instanceof TransportError) {
      console.error(`\n❌ authentication check failed: ${err.message}\n`);
      process.exit(1);
    }
    throw err;
  }
}
