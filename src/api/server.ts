/**
 * API Server Entry Point
 *
 * Startup routine for the HTTP service:
 *
 * 1. Load and validate configuration from the environment
 * 2. Create the logger and start telemetry (if enabled)
 * 3. Build the token store and the persistence gateway
 * 4. Compose features (initializing the schema when a database is set)
 * 5. Build the Hono app and serve it on Node
 *
 * SIGINT and SIGTERM close the HTTP server, the database and the telemetry
 * SDK before exiting. A failure during startup is logged and exits with 1.
 *
 * Usage:
 *   npm start
 *
 * Environment Variables:
 *   PORT - Port to listen on (default: 8000)
 *   HOST - Interface to bind (default: 0.0.0.0)
 *   API_KEYS - Comma-separated bearer tokens; enables /v1/protected
 *   DATABASE_URL - SQLite or PostgreSQL database; enables /v1/users
 *   LOG_LEVEL - pino level (default: info)
 *   OTEL_ENABLED, OTEL_EXPORTER_OTLP_ENDPOINT, OTEL_SERVICE_NAME - telemetry
 *
 * @example
 * ```bash
 * API_KEYS=test-token DATABASE_URL=sqlite:///./data/app.db npm start
 * ```
 */

import { serve } from '@hono/node-server';
import { loadConfig, type AppConfig } from '../config';
import { TokenStore } from '../core/auth';
import { createLogger } from '../logger';
import { PROJECT_VERSION } from '../metadata';
import { PersistenceGateway } from '../storage';
import { setupTelemetry } from '../telemetry';
import { composeApplication } from './app';

// ============================================================================
// Server Startup
// ============================================================================

/**
 * Loads the configuration, or exits. Errors here are logged through a
 * default logger since LOG_LEVEL itself may be the problem.
 */
function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    createLogger().fatal({ err: error }, 'Failed to load configuration');
    process.exit(1);
  }
}

async function startServer(): Promise<void> {
  const config = loadConfigOrExit();
  const logger = createLogger({ level: config.logging.level });
  const log = logger.child({ module: 'server' });

  try {
    const telemetry = setupTelemetry(config.telemetry, logger);
    const tokenStore = TokenStore.fromConfig(config);
    const gateway = PersistenceGateway.fromConfig(config, logger);

    const { app, features } = await composeApplication({
      tokenStore,
      gateway,
      logger,
      exposeErrorDetails: config.server.nodeEnv !== 'production',
    });

    const server = serve(
      { fetch: app.fetch, port: config.server.port, hostname: config.server.host },
      (info) => {
        log.info(
          {
            address: info.address,
            port: info.port,
            environment: config.server.nodeEnv,
            version: PROJECT_VERSION,
            ...features,
          },
          `Server listening on http://${config.server.host}:${info.port}`
        );
      }
    );

    // Graceful shutdown handler
    let shuttingDown = false;
    const shutdown = (signal: NodeJS.Signals): void => {
      if (shuttingDown) return;
      shuttingDown = true;
      log.info({ signal }, 'Shutting down gracefully...');

      server.close(() => {
        const closed = gateway.close().catch((err: unknown) => {
          log.warn({ err }, 'Database close failed');
        });
        const flushed = (telemetry ? telemetry.shutdown() : Promise.resolve()).catch(
          (err: unknown) => {
            log.warn({ err }, 'Telemetry shutdown failed');
          }
        );
        void Promise.all([closed, flushed]).finally(() => {
          process.exit(0);
        });
      });
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } catch (error) {
    log.fatal({ err: error }, 'Failed to start');
    process.exit(1);
  }
}

// Start the server when this file is run directly
void startServer();
