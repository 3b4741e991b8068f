/**
 * MCP Resource Server entry point.
 *
 * - Serves RFC 9728 Protected Resource Metadata
 * - Validates bearer tokens through Authorization Server introspection
 * - Serves MCP tools to callers holding the required scope
 */

import 'dotenv/config';
import { createApp } from './app.js';
import { Config, ConfigError, loadConfig } from './config.js';
import { logger } from './utils/logger.js';

function main(): void {
  let config: Readonly<Config>;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Configuration error', error);
      process.exit(1);
    }
    throw error;
  }

  logger.setLevel(config.logLevel);

  const { app, dispose } = createApp(config);

  const httpServer = app.listen(config.port, config.host, () => {
    logger.info('Starting MCP Server', {
      host: config.host,
      port: config.port,
      resource: config.serverUrl,
      transport: config.transport,
    });
    logger.info('Authorization Server', {
      issuer: config.auth.issuer,
      introspectionEndpoint: config.auth.introspectionEndpoint,
      authorizationEndpoint: config.auth.authorizationEndpoint,
      tokenEndpoint: config.auth.tokenEndpoint,
      requiredScopes: config.auth.requiredScopes,
    });
  });

  httpServer.on('error', (error) => {
    logger.critical('Server error', { error: error.message });
    process.exit(1);
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    httpServer.close();
    dispose()
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error('Error during shutdown', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main();
