/**
 * Feature Composition
 *
 * Decides, once at startup, which optional capabilities this process
 * serves:
 *
 * - authEnabled: at least one API key is configured, so the protected
 *   route group is mounted
 * - persistenceEnabled: DATABASE_URL is set, so the schema is initialized and
 *   the users route group is mounted
 *
 * The returned flags are frozen. Nothing re-evaluates them while the
 * process runs; a disabled group is simply absent and answers 404.
 */

import type { Logger } from '../logger';
import type { PersistenceGateway } from '../storage';
import type { TokenStore } from './auth';

export interface FeatureFlags {
  readonly authEnabled: boolean;
  readonly persistenceEnabled: boolean;
}

export interface FeatureDependencies {
  tokenStore: TokenStore;
  gateway: PersistenceGateway;
  logger: Logger;
}

/**
 * Computes the feature flags and prepares the enabled features.
 *
 * When persistence is enabled the database schema is created here, before
 * any request is served.
 */
export async function composeFeatures(deps: FeatureDependencies): Promise<FeatureFlags> {
  const log = deps.logger.child({ module: 'features' });

  const authEnabled = deps.tokenStore.isConfigured();
  const persistenceEnabled = deps.gateway.isConfigured();

  if (authEnabled) {
    log.info({ tokens: deps.tokenStore.size }, 'Authentication enabled, including protected routes');
  } else {
    log.info('Authentication disabled (API_KEYS not set), protected routes not mounted');
  }

  if (persistenceEnabled) {
    await deps.gateway.initializeSchema();
    log.info('Database configured, including user routes');
  } else {
    log.info('Database disabled (DATABASE_URL not set), user routes not mounted');
  }

  return Object.freeze({ authEnabled, persistenceEnabled });
}
