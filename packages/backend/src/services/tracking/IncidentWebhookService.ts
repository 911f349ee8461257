/**
 * Incident Webhook Service
 *
 * Delivers newly raised geofence incidents to external HTTP endpoints with
 * retries and an optional HMAC signature.
 */

import { EventEmitter } from 'events';
import axios from 'axios';
import crypto from 'crypto';
import { APP_NAME, APP_VERSION } from '@safetrail/shared';
import { Incident, PointOfInterest, TrackedSubject, WebhookSettings } from '../../types/tracking';

export interface IncidentWebhookPayload {
  incident: Incident;
  subject: {
    id: string;
    ownerUserId: string;
    guideId: string | null;
  };
  pointOfInterest: PointOfInterest;
  timestamp: string;
}

export interface WebhookDeliveryResult {
  url: string;
  success: boolean;
  statusCode?: number;
  responseTime: number;
  error?: string;
  retryCount: number;
}

export const SIGNATURE_HEADER = 'X-SafeTrail-Signature';

export class IncidentWebhookService extends EventEmitter {
  private settings: WebhookSettings;
  private stats = {
    webhooksDelivered: 0,
    deliveryFailures: 0,
    averageDeliveryTime: 0,
  };

  constructor(settings: WebhookSettings) {
    super();
    this.settings = settings;
  }

  isEnabled(): boolean {
    return this.settings.enabled && this.settings.urls.length > 0;
  }

  /**
   * Deliver an incident to every configured endpoint. Never rejects; the
   * outcome of each endpoint is in the returned results.
   */
  async notifyIncident(
    incident: Incident,
    subject: TrackedSubject,
    pointOfInterest: PointOfInterest
  ): Promise<WebhookDeliveryResult[]> {
    if (!this.isEnabled()) {
      return [];
    }

    const payload: IncidentWebhookPayload = {
      incident,
      subject: {
        id: subject.id,
        ownerUserId: subject.ownerUserId,
        guideId: subject.guideId,
      },
      pointOfInterest,
      timestamp: new Date().toISOString(),
    };

    return Promise.all(this.settings.urls.map(url => this.deliverWebhook(url, payload)));
  }

  generateSignature(payload: IncidentWebhookPayload): string {
    if (!this.settings.secret) return '';

    return crypto
      .createHmac('sha256', this.settings.secret)
      .update(JSON.stringify(payload))
      .digest('hex');
  }

  getWebhookStatistics(): {
    endpoints: number;
    webhooksDelivered: number;
    deliveryFailures: number;
    averageDeliveryTime: number;
  } {
    return {
      endpoints: this.settings.urls.length,
      ...this.stats,
    };
  }

  private async deliverWebhook(url: string, payload: IncidentWebhookPayload): Promise<WebhookDeliveryResult> {
    const startTime = Date.now();
    const signature = this.generateSignature(payload);
    let retryCount = 0;
    let lastError = '';
    let lastStatus: number | undefined;

    while (retryCount <= this.settings.maxRetries) {
      try {
        const response = await axios.post(url, payload, {
          timeout: this.settings.timeout,
          headers: {
            'Content-Type': 'application/json',
            'User-Agent': `${APP_NAME}-Webhook/${APP_VERSION}`,
            ...(signature ? { [SIGNATURE_HEADER]: signature } : {}),
          },
        });

        const responseTime = Date.now() - startTime;
        this.updateDeliveryStats(responseTime);

        const result: WebhookDeliveryResult = {
          url,
          success: true,
          statusCode: response.status,
          responseTime,
          retryCount,
        };
        this.emit('webhookDelivered', result);
        return result;

      } catch (error) {
        lastError = error instanceof Error ? error.message : String(error);
        lastStatus = axios.isAxiosError(error) ? error.response?.status : undefined;
        retryCount++;

        if (retryCount <= this.settings.maxRetries) {
          await this.delay(this.settings.retryDelay * retryCount);
        }
      }
    }

    this.stats.deliveryFailures++;
    const result: WebhookDeliveryResult = {
      url,
      success: false,
      statusCode: lastStatus,
      responseTime: Date.now() - startTime,
      error: lastError,
      retryCount: retryCount - 1,
    };
    console.error(`Incident webhook delivery to ${url} failed after ${result.retryCount} retries: ${lastError}`);
    this.emit('webhookFailed', result);
    return result;
  }

  private updateDeliveryStats(responseTime: number): void {
    const count = this.stats.webhooksDelivered + 1;
    this.stats.averageDeliveryTime =
      ((this.stats.averageDeliveryTime * this.stats.webhooksDelivered) + responseTime) / count;
    this.stats.webhooksDelivered = count;
  }

  private delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
