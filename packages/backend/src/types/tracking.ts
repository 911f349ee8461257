/**
 * Tracking types for the SafeTrail live location core
 *
 * Points of interest, tracked subjects, incidents, subscriber viewers and the
 * error taxonomy shared by the ledger, the registry and the HTTP surface.
 */

import {
  IncidentSeverity,
  IncidentStatus,
  OutboundEvent,
  SubjectStatus,
  UserRole,
} from '@safetrail/shared';

// Points of interest
export interface PointOfInterest {
  readonly id: number;
  readonly name: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly radiusMeters: number;
}

export interface Coordinate {
  latitude: number;
  longitude: number;
}

export interface FenceEvaluation {
  distanceMeters: number;
  insideFence: boolean;
}

// Tracked subjects
export type SubjectKind = 'tourist' | 'trip';

export type ModeOfTravel = 'car' | 'train' | 'bus' | 'flight';

export interface TrackedSubject {
  readonly id: string;
  readonly kind: SubjectKind;
  readonly ownerUserId: string;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly status: SubjectStatus;
  readonly poiId: number;
  readonly guideId: string | null;
  readonly isActive: boolean;
  readonly startingLocation?: string;
  readonly modeOfTravel?: ModeOfTravel;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly closedAt: string | null;
}

export interface NewSubject {
  id?: string;
  kind: SubjectKind;
  ownerUserId: string;
  poiId: number;
  guideId?: string | null;
  position?: Coordinate | null;
  startingLocation?: string;
  modeOfTravel?: ModeOfTravel;
}

export interface PositionResult {
  status: SubjectStatus;
  insideFence: boolean;
}

export interface LedgerUpdate extends PositionResult {
  subject: TrackedSubject;
  incident: Incident | null;
}

// Incidents
export interface Incident {
  readonly id: string;
  readonly subjectId: string;
  readonly timestamp: string;
  readonly severity: IncidentSeverity;
  readonly incidentType: 'Geofence';
  readonly status: IncidentStatus;
  readonly latitude: number;
  readonly longitude: number;
  readonly poiId: number;
}

export interface GuidePosition {
  readonly guideId: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly updatedAt: string;
}

// Identity
export interface AuthenticatedIdentity {
  userId: string;
  role: UserRole;
}

export interface IdentityResolver {
  resolve(token: string): Promise<AuthenticatedIdentity | null>;
}

// Subscribers
export type Viewer =
  | { role: 'admin'; userId: string }
  | { role: 'guide'; userId: string; assignedSubjectIds: Set<string> }
  | { role: 'tourist'; userId: string; subjectId: string | null; assignedGuideId: string | null };

export interface SubscriberTransport {
  send(data: string): Promise<void>;
  close(code: number, reason: string): void;
}

export interface DeliveryReport {
  delivered: number;
  dropped: number;
}

export type EventPayload = OutboundEvent;

// Storage
export interface SubjectRepository {
  findById(subjectId: string): Promise<TrackedSubject | null>;
  save(subject: TrackedSubject): Promise<void>;
  list(): Promise<TrackedSubject[]>;
}

export interface IncidentLog {
  append(incident: Incident): Promise<void>;
  listBySubject(subjectId: string): Promise<Incident[]>;
  list(): Promise<Incident[]>;
}

export interface GuidePositionStore {
  save(position: GuidePosition): Promise<void>;
  list(): Promise<GuidePosition[]>;
}

export interface TrackingStorage {
  subjects: SubjectRepository;
  incidents: IncidentLog;
  guidePositions: GuidePositionStore;
  close(): Promise<void>;
}

// Service configuration
export interface RedisStorageConfig {
  host: string;
  port: number;
  db: number;
  keyPrefix: string;
}

export interface WebhookSettings {
  enabled: boolean;
  urls: string[];
  secret?: string;
  timeout: number; // milliseconds
  maxRetries: number;
  retryDelay: number; // milliseconds
}

export interface StaticIdentity extends AuthenticatedIdentity {
  token: string;
}

export interface TrackingServiceConfig {
  server: {
    host: string;
    port: number;
  };
  realtime: {
    path: string;
    allowedOrigins: string[];
    sendTimeout: number; // milliseconds
  };
  ledger: {
    guideReportsEnabled: boolean;
  };
  storage: {
    driver: 'memory' | 'redis';
    redis: RedisStorageConfig;
  };
  webhooks: WebhookSettings;
  auth: {
    staticTokens: StaticIdentity[];
  };
}

// Error Types
export class TrackingError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TrackingError';
  }
}

export class InvalidArgumentError extends TrackingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_ARGUMENT', 400, details);
    this.name = 'InvalidArgumentError';
  }
}

export class UnauthenticatedError extends TrackingError {
  constructor(message: string = 'Not authenticated', details?: Record<string, unknown>) {
    super(message, 'UNAUTHENTICATED', 401, details);
    this.name = 'UnauthenticatedError';
  }
}

export class ForbiddenError extends TrackingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FORBIDDEN', 403, details);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends TrackingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', 404, details);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends TrackingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFLICT', 409, details);
    this.name = 'ConflictError';
  }
}

export class ConfigurationError extends TrackingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 500, details);
    this.name = 'ConfigurationError';
  }
}
