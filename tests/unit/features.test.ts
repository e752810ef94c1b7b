/**
 * Feature Composition Tests
 *
 * Tests for the startup decisions (which optional features are on) and the
 * route table built from them.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildRouteTable } from '../../src/api/routes';
import { TokenStore } from '../../src/core/auth';
import { composeFeatures } from '../../src/core/features';
import { createSilentLogger } from '../../src/logger';
import { PersistenceGateway } from '../../src/storage';

describe('composeFeatures', () => {
  const logger = createSilentLogger();
  const gateways: PersistenceGateway[] = [];

  function inMemoryGateway(): PersistenceGateway {
    const gateway = PersistenceGateway.inMemory(logger);
    gateways.push(gateway);
    return gateway;
  }

  afterEach(async () => {
    await Promise.all(gateways.splice(0).map((gateway) => gateway.close()));
  });

  it('should disable everything when nothing is configured', async () => {
    // Act
    const features = await composeFeatures({
      tokenStore: new TokenStore(),
      gateway: new PersistenceGateway(null),
      logger,
    });

    // Assert
    expect(features).toEqual({ authEnabled: false, persistenceEnabled: false });
  });

  it('should enable auth when at least one token is configured', async () => {
    const features = await composeFeatures({
      tokenStore: TokenStore.fromList(['test-token']),
      gateway: new PersistenceGateway(null),
      logger,
    });

    expect(features.authEnabled).toBe(true);
    expect(features.persistenceEnabled).toBe(false);
  });

  it('should enable persistence and initialize the schema when a database is configured', async () => {
    // Arrange
    const gateway = inMemoryGateway();
    const initializeSchema = vi.spyOn(gateway, 'initializeSchema');

    // Act
    const features = await composeFeatures({ tokenStore: new TokenStore(), gateway, logger });

    // Assert
    expect(features.persistenceEnabled).toBe(true);
    expect(initializeSchema).toHaveBeenCalledTimes(1);
  });

  it('should return frozen flags', async () => {
    const features = await composeFeatures({
      tokenStore: new TokenStore(),
      gateway: new PersistenceGateway(null),
      logger,
    });

    expect(Object.isFrozen(features)).toBe(true);
  });
});

describe('buildRouteTable', () => {
  const deps = {
    tokenStore: TokenStore.fromList(['test-token']),
    gateway: new PersistenceGateway(null),
  };

  it('should contain only the always-on groups when no feature is enabled', () => {
    const table = buildRouteTable({ authEnabled: false, persistenceEnabled: false }, deps);

    expect(table.map((group) => [group.name, group.prefix])).toEqual([
      ['root', '/'],
      ['healthcheck', '/healthcheck'],
      ['items', '/items'],
      ['v1-items', '/v1/items'],
    ]);
  });

  it('should add the protected group when auth is enabled', () => {
    const table = buildRouteTable({ authEnabled: true, persistenceEnabled: false }, deps);

    expect(table.map((group) => group.name)).toEqual([
      'root',
      'healthcheck',
      'items',
      'v1-items',
      'v1-protected',
    ]);
  });

  it('should add the users group when persistence is enabled', () => {
    const table = buildRouteTable({ authEnabled: true, persistenceEnabled: true }, deps);

    expect(table.map((group) => group.name)).toEqual([
      'root',
      'healthcheck',
      'items',
      'v1-items',
      'v1-protected',
      'v1-users',
    ]);
    expect(table[5]?.prefix).toBe('/v1/users');
  });

  it('should be frozen', () => {
    const table = buildRouteTable({ authEnabled: false, persistenceEnabled: false }, deps);

    expect(Object.isFrozen(table)).toBe(true);
  });
});
