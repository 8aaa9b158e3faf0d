#!/usr/bin/env node
import { Command } from 'commander';
import dotenv from 'dotenv';
import { FileEndpointCache } from './cache/fileCache.js';
import { ScopeClient } from './clients/auth.js';
import { PingClient } from './clients/ping.js';
import { EndpointResolver } from './clients/references.js';
import { loadConfig, type AppConfig } from './config.js';
import { runWithBoundary } from './errors.js';
import { StatusReporter } from './status/statusReporter.js';
import { createLogger } from './utils/logger.js';

dotenv.config();

const program = new Command();
program
  .name('svcstat')
  .description('Report service liveness and expand permission scopes.')
  .version('0.1.0');

program
  .command('status')
  .description('Query the current running status of services.')
  .argument('[services...]', 'Limit the report to these services (default: all known services).')
  .addHelpText(
    'after',
    `
When called without arguments, status reports every known service. Ping URLs
are discovered from the reference manifest and cached for 24 hours.`,
  )
  .action(async (services: string[]) => {
    process.exitCode = await handleStatus(services);
  });

program
  .command('expand-scope')
  .description('Expand the given scope set, including scopes implied by roles.')
  .argument('<scopes...>', 'Scopes to expand.')
  .action(async (scopes: string[]) => {
    process.exitCode = await handleExpandScope(scopes);
  });

await program.parseAsync();

async function handleStatus(services: string[]): Promise<number> {
  const config = loadConfig();
  const reporter = createStatusReporter(config);
  return reporter.run(services);
}

async function handleExpandScope(scopes: string[]): Promise<number> {
  const config = loadConfig();
  const client = new ScopeClient({ baseUrl: config.authBaseUrl, logger: createLogger('auth') });
  return runWithBoundary(async () => {
    const expanded = await client.expand(scopes);
    for (const scope of expanded) {
      console.log(scope);
    }
  });
}

function createStatusReporter(config: AppConfig): StatusReporter {
  const cache = new FileEndpointCache({
    filePath: config.pingUrlsCachePath,
    source: new EndpointResolver({ logger: createLogger('references') }),
    logger: createLogger('cache'),
  });
  return new StatusReporter({
    manifestUrl: config.manifestUrl,
    cache,
    pinger: new PingClient(),
  });
}
