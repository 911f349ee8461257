/**
 * Tracking Services Exports
 *
 * Main entry point for the live tracking core: geofence evaluation, the
 * subject ledger, subscriber fan-out and the ingest workflow.
 */

export { GeofenceEvaluator } from './GeofenceEvaluator';
export { GeoIndex } from './GeoIndex';
export { LocationLedger, transition } from './LocationLedger';
export { ConnectionRegistry } from './ConnectionRegistry';
export { LocationIngestService } from './LocationIngestService';
export { IncidentWebhookService } from './IncidentWebhookService';
export { SubscriptionGateway } from './SubscriptionGateway';
export { StaticTokenIdentityResolver } from './StaticTokenIdentityResolver';
export { createInMemoryStorage } from './storage/InMemoryTrackingStore';
export { RedisTrackingStore } from './storage/RedisTrackingStore';

// Re-export types and configuration
export * from '../../types/tracking';
export { trackingConfig, TrackingConfig } from '../../config/tracking';

import { ConnectionRegistry } from './ConnectionRegistry';
import { GeoIndex } from './GeoIndex';
import { IncidentWebhookService } from './IncidentWebhookService';
import { LocationIngestService } from './LocationIngestService';
import { LocationLedger } from './LocationLedger';
import { StaticTokenIdentityResolver } from './StaticTokenIdentityResolver';
import { createInMemoryStorage } from './storage/InMemoryTrackingStore';
import { RedisTrackingStore } from './storage/RedisTrackingStore';
import { IdentityResolver, TrackingServiceConfig, TrackingStorage } from '../../types/tracking';

export interface TrackingCore {
  geoIndex: GeoIndex;
  storage: TrackingStorage;
  ledger: LocationLedger;
  registry: ConnectionRegistry;
  webhooks: IncidentWebhookService;
  identities: IdentityResolver;
  ingest: LocationIngestService;
}

export interface TrackingCoreOverrides {
  geoIndex?: GeoIndex;
  storage?: TrackingStorage;
  identities?: IdentityResolver;
}

export function createStorage(config: TrackingServiceConfig['storage']): TrackingStorage {
  switch (config.driver) {
    case 'redis':
      return RedisTrackingStore.connect(config.redis);
    case 'memory':
      return createInMemoryStorage();
  }
}

/**
 * Factory function to wire the tracking core from configuration
 */
export function createTrackingCore(config: TrackingServiceConfig, overrides: TrackingCoreOverrides = {}): TrackingCore {
  const geoIndex = overrides.geoIndex ?? GeoIndex.fromSeed();
  const storage = overrides.storage ?? createStorage(config.storage);
  const identities = overrides.identities ?? new StaticTokenIdentityResolver(config.auth.staticTokens);

  const ledger = new LocationLedger(storage.subjects, storage.incidents, geoIndex, {
    guideReportsEnabled: config.ledger.guideReportsEnabled,
  });
  const registry = new ConnectionRegistry({ sendTimeout: config.realtime.sendTimeout });
  const webhooks = new IncidentWebhookService(config.webhooks);
  const ingest = new LocationIngestService(ledger, registry, geoIndex, storage.guidePositions, webhooks);

  return { geoIndex, storage, ledger, registry, webhooks, identities, ingest };
}
