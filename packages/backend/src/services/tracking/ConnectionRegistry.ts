/**
 * Connection Registry
 *
 * Live subscriber connections tagged with the viewer's role and scope, and the
 * role-filtered fan-out over them. Admins see every subject, guides see their
 * assignees, tourists see only themselves.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { CLOSE_CODES, DEFAULT_SEND_TIMEOUT, UserRole } from '@safetrail/shared';
import { DeliveryReport, EventPayload, SubscriberTransport, Viewer } from '../../types/tracking';

export interface SubscriberConnection {
  readonly handle: string;
  readonly transport: SubscriberTransport;
  readonly viewer: Viewer;
  readonly connectedAt: string;
}

export interface RegistryOptions {
  sendTimeout: number; // milliseconds
}

export interface RegistryStats {
  total: number;
  byRole: Record<UserRole, number>;
  delivered: number;
  dropped: number;
}

class SendTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Send timed out after ${timeoutMs}ms`);
    this.name = 'SendTimeoutError';
  }
}

export class ConnectionRegistry extends EventEmitter {
  private connections: Map<string, SubscriberConnection> = new Map();
  private handlesByTransport: Map<SubscriberTransport, string> = new Map();
  private options: RegistryOptions;
  private counters = { delivered: 0, dropped: 0 };

  constructor(options?: Partial<RegistryOptions>) {
    super();
    this.options = {
      sendTimeout: DEFAULT_SEND_TIMEOUT,
      ...options,
    };
  }

  /**
   * Add a live subscriber. Registering the same transport twice returns the
   * original handle.
   */
  register(transport: SubscriberTransport, viewer: Viewer): string {
    const existing = this.handlesByTransport.get(transport);
    if (existing !== undefined) {
      return existing;
    }

    const connection: SubscriberConnection = {
      handle: uuidv4(),
      transport,
      viewer,
      connectedAt: new Date().toISOString(),
    };

    this.connections.set(connection.handle, connection);
    this.handlesByTransport.set(transport, connection.handle);
    this.emit('connectionRegistered', connection);
    return connection.handle;
  }

  /**
   * Remove a subscriber; unknown or already removed handles are ignored
   */
  unregister(handle: string): void {
    const connection = this.connections.get(handle);
    if (!connection) return;

    this.connections.delete(handle);
    this.handlesByTransport.delete(connection.transport);
    this.emit('connectionRemoved', connection);
  }

  has(handle: string): boolean {
    return this.connections.has(handle);
  }

  getViewer(handle: string): Viewer | null {
    return this.connections.get(handle)?.viewer ?? null;
  }

  size(): number {
    return this.connections.size;
  }

  /**
   * Admins, the subject's own tourist connection(s), and guides assigned to
   * the subject. Nobody else.
   */
  async notifySubjectUpdate(subjectId: string, payload: EventPayload): Promise<DeliveryReport> {
    return this.deliver(this.select(viewer => {
      switch (viewer.role) {
        case 'admin':
          return true;
        case 'tourist':
          return viewer.subjectId === subjectId;
        case 'guide':
          return viewer.assignedSubjectIds.has(subjectId);
      }
    }), payload);
  }

  /**
   * Admins, and tourists whose active subject is assigned to this guide.
   * Guides never see each other.
   */
  async notifyGuidePosition(guideId: string, payload: EventPayload): Promise<DeliveryReport> {
    return this.deliver(this.select(viewer => {
      switch (viewer.role) {
        case 'admin':
          return true;
        case 'tourist':
          return viewer.subjectId !== null && viewer.assignedGuideId === guideId;
        case 'guide':
          return false;
      }
    }), payload);
  }

  async notifyRoleBroadcast(role: UserRole, payload: EventPayload): Promise<DeliveryReport> {
    return this.deliver(this.select(viewer => viewer.role === role), payload);
  }

  /**
   * Point the owner's live tourist connections at a newly started subject
   */
  bindTouristSubject(userId: string, subjectId: string, guideId: string | null): void {
    for (const connection of this.snapshot()) {
      const { viewer } = connection;
      if (viewer.role === 'tourist' && viewer.userId === userId) {
        viewer.subjectId = subjectId;
        viewer.assignedGuideId = guideId;
      }
    }
  }

  grantGuideAccess(guideId: string, subjectId: string): void {
    for (const connection of this.snapshot()) {
      const { viewer } = connection;
      if (viewer.role === 'guide' && viewer.userId === guideId) {
        viewer.assignedSubjectIds.add(subjectId);
      }
    }
  }

  /**
   * Remove a closed subject from every viewer scope
   */
  revokeSubject(subjectId: string): void {
    for (const connection of this.snapshot()) {
      const { viewer } = connection;
      switch (viewer.role) {
        case 'tourist':
          if (viewer.subjectId === subjectId) {
            viewer.subjectId = null;
            viewer.assignedGuideId = null;
          }
          break;
        case 'guide':
          viewer.assignedSubjectIds.delete(subjectId);
          break;
        case 'admin':
          break;
      }
    }
  }

  getStats(): RegistryStats {
    const byRole: Record<UserRole, number> = { admin: 0, guide: 0, tourist: 0 };
    for (const connection of this.connections.values()) {
      byRole[connection.viewer.role]++;
    }
    return {
      total: this.connections.size,
      byRole,
      delivered: this.counters.delivered,
      dropped: this.counters.dropped,
    };
  }

  /**
   * Close every transport and forget all connections
   */
  closeAll(code: number, reason: string): void {
    for (const connection of this.snapshot()) {
      try {
        connection.transport.close(code, reason);
      } catch (error) {
        console.warn(`Failed to close subscriber ${connection.handle}:`, error);
      }
      this.unregister(connection.handle);
    }
  }

  private snapshot(): SubscriberConnection[] {
    return Array.from(this.connections.values());
  }

  private select(predicate: (viewer: Viewer) => boolean): SubscriberConnection[] {
    return this.snapshot().filter(connection => predicate(connection.viewer));
  }

  /**
   * Send to every target in parallel. A target that fails or exceeds the send
   * timeout is dropped once the round completes; the others are unaffected.
   */
  private async deliver(targets: SubscriberConnection[], payload: EventPayload): Promise<DeliveryReport> {
    if (targets.length === 0) {
      return { delivered: 0, dropped: 0 };
    }

    const message = JSON.stringify(payload);
    const failed: Array<{ connection: SubscriberConnection; error: unknown }> = [];

    await Promise.all(targets.map(async connection => {
      try {
        await this.sendWithTimeout(connection.transport, message);
      } catch (error) {
        failed.push({ connection, error });
      }
    }));

    for (const { connection, error } of failed) {
      this.drop(connection, error);
    }

    const report: DeliveryReport = {
      delivered: targets.length - failed.length,
      dropped: failed.length,
    };
    this.counters.delivered += report.delivered;
    this.counters.dropped += report.dropped;
    return report;
  }

  private drop(connection: SubscriberConnection, error: unknown): void {
    // Already gone if a concurrent disconnect won the race
    if (!this.connections.has(connection.handle)) return;

    console.warn(`Dropping subscriber ${connection.handle} (${connection.viewer.role}):`, error);
    this.unregister(connection.handle);
    try {
      connection.transport.close(CLOSE_CODES.INTERNAL_ERROR, 'Delivery failed');
    } catch (closeError) {
      console.warn(`Failed to close subscriber ${connection.handle}:`, closeError);
    }
    this.emit('connectionDropped', { handle: connection.handle, viewer: connection.viewer, error });
  }

  private sendWithTimeout(transport: SubscriberTransport, message: string): Promise<void> {
    const timeoutMs = this.options.sendTimeout;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new SendTimeoutError(timeoutMs)), timeoutMs);
    });

    return Promise.race([Promise.resolve().then(() => transport.send(message)), timeout]).finally(() => {
      if (timer) clearTimeout(timer);
    });
  }
}
