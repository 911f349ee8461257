/**
 * Tracking Service Configuration
 *
 * This module provides configuration management for the live tracking core,
 * with environment-specific settings for development, production, and testing.
 */

import { DEFAULT_SEND_TIMEOUT, USER_ROLES, UserRole } from '@safetrail/shared';
import { ConfigurationError, StaticIdentity, TrackingServiceConfig } from '../types/tracking';

const KNOWN_ROLES: readonly string[] = Object.values(USER_ROLES);

function isUserRole(value: string): value is UserRole {
  return KNOWN_ROLES.includes(value);
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Parse `token:userId:role` entries separated by commas.
 */
export function parseStaticTokens(value: string | undefined): StaticIdentity[] {
  return parseList(value, []).map(entry => {
    const [token, userId, role] = entry.split(':');
    if (!token || !userId || !role || !isUserRole(role)) {
      throw new ConfigurationError(`Invalid AUTH_TOKENS entry: ${entry}`);
    }
    return { token, userId, role };
  });
}

export class TrackingConfig {
  private static instance: TrackingConfig;
  private config: TrackingServiceConfig;

  private constructor() {
    this.config = this.loadConfig();
  }

  public static getInstance(): TrackingConfig {
    if (!TrackingConfig.instance) {
      TrackingConfig.instance = new TrackingConfig();
    }
    return TrackingConfig.instance;
  }

  public getConfig(): TrackingServiceConfig {
    return this.config;
  }

  private loadConfig(): TrackingServiceConfig {
    const environment = process.env.NODE_ENV || 'development';

    // Base configuration
    const baseConfig: TrackingServiceConfig = {
      server: {
        host: process.env.HOST || '0.0.0.0',
        port: parseInt(process.env.PORT || '5000'),
      },
      realtime: {
        path: process.env.WS_PATH || '/ws/location',
        allowedOrigins: parseList(process.env.WS_ALLOWED_ORIGINS, [
          'http://localhost:5000',
          'https://localhost:5000',
        ]),
        sendTimeout: parseInt(process.env.WS_SEND_TIMEOUT || String(DEFAULT_SEND_TIMEOUT)),
      },
      ledger: {
        guideReportsEnabled: process.env.GUIDE_REPORTS_ENABLED !== 'false',
      },
      storage: {
        driver: process.env.STORAGE_DRIVER === 'redis' ? 'redis' : 'memory',
        redis: {
          host: process.env.REDIS_HOST || 'localhost',
          port: parseInt(process.env.REDIS_PORT || '6379'),
          db: parseInt(process.env.REDIS_DB || '0'),
          keyPrefix: process.env.REDIS_KEY_PREFIX || 'safetrail:',
        },
      },
      webhooks: {
        enabled: process.env.WEBHOOKS_ENABLED !== 'false',
        urls: parseList(process.env.WEBHOOK_URLS, []),
        secret: process.env.WEBHOOK_SECRET,
        timeout: parseInt(process.env.WEBHOOK_TIMEOUT || '10000'),
        maxRetries: parseInt(process.env.WEBHOOK_MAX_RETRIES || '3'),
        retryDelay: 2000,
      },
      auth: {
        staticTokens: parseStaticTokens(process.env.AUTH_TOKENS),
      },
    };

    // Environment-specific overrides
    switch (environment) {
      case 'production':
        return {
          ...baseConfig,
          realtime: {
            ...baseConfig.realtime,
            sendTimeout: 3000, // Drop slow subscribers sooner in production
          },
          webhooks: {
            ...baseConfig.webhooks,
            timeout: 5000,
            retryDelay: 5000,
          },
        };

      case 'test':
        return {
          ...baseConfig,
          realtime: {
            ...baseConfig.realtime,
            sendTimeout: 200,
          },
          storage: {
            ...baseConfig.storage,
            driver: 'memory',
          },
          webhooks: {
            ...baseConfig.webhooks,
            enabled: false, // Disable webhooks in tests
          },
        };

      case 'development':
      default:
        return baseConfig;
    }
  }

  public validateConfig(): boolean {
    const { server, realtime, storage, webhooks } = this.config;

    if (isNaN(server.port) || server.port < 1 || server.port > 65535) {
      throw new ConfigurationError('Invalid server port configuration');
    }

    if (!realtime.path.startsWith('/')) {
      throw new ConfigurationError('WebSocket path must start with "/"');
    }

    if (isNaN(realtime.sendTimeout) || realtime.sendTimeout < 1) {
      throw new ConfigurationError('Send timeout must be a positive number of milliseconds');
    }

    if (storage.driver === 'redis' && (!storage.redis.host || storage.redis.port < 1 || storage.redis.port > 65535)) {
      throw new ConfigurationError('Invalid Redis host or port configuration');
    }

    if (webhooks.enabled && webhooks.urls.length > 0 && (webhooks.timeout < 100 || webhooks.maxRetries < 0)) {
      throw new ConfigurationError('Invalid webhook configuration');
    }

    return true;
  }
}

// Export singleton instance
export const trackingConfig = TrackingConfig.getInstance();
