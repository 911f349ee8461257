/**
 * Location Ingest Service - coordinates the live tracking workflow
 *
 * validate → authorize → evaluate geofence → update ledger → fan out.
 * Also owns the trip lifecycle and the role-scoped read side used by
 * dashboards and map views.
 */

import { EventEmitter } from 'events';
import {
  EVENT_TYPES,
  IncidentCreatedEvent,
  LocationUpdateEvent,
  TouristStatusChangeEvent,
  USER_ROLES,
} from '@safetrail/shared';
import {
  AuthenticatedIdentity,
  ForbiddenError,
  GuidePosition,
  GuidePositionStore,
  Incident,
  InvalidArgumentError,
  LedgerUpdate,
  ModeOfTravel,
  NotFoundError,
  PointOfInterest,
  PositionResult,
  TrackedSubject,
  UnauthenticatedError,
  Viewer,
} from '../../types/tracking';
import { ConnectionRegistry } from './ConnectionRegistry';
import { GeoIndex } from './GeoIndex';
import { GeofenceEvaluator } from './GeofenceEvaluator';
import { IncidentWebhookService } from './IncidentWebhookService';
import { LocationLedger } from './LocationLedger';
import { GeospatialValidator } from './utils/GeospatialValidator';
import { KeyedMutex } from './utils/KeyedMutex';

export interface LocationReportInput {
  subjectId?: unknown;
  latitude?: unknown;
  longitude?: unknown;
}

export interface DestinationChangeInput {
  subjectId?: unknown;
  poiId?: unknown;
}

export interface GuidePositionInput {
  latitude?: unknown;
  longitude?: unknown;
}

export interface TripStartInput {
  poiId?: unknown;
  guideId?: unknown;
  startingLocation?: unknown;
  modeOfTravel?: unknown;
}

export interface SubjectSummary extends TrackedSubject {
  poiName: string;
}

export interface SubjectView {
  subject: TrackedSubject;
  geofence: {
    poiId: number;
    name: string;
    centerLatitude: number;
    centerLongitude: number;
    radiusMeters: number;
    distanceMeters: number | null;
  };
}

const MODES_OF_TRAVEL: readonly ModeOfTravel[] = ['car', 'train', 'bus', 'flight'];

function parseModeOfTravel(value: unknown): ModeOfTravel | undefined {
  const mode = GeospatialValidator.optionalString(value, 'modeOfTravel');
  if (mode === undefined) return undefined;

  const match = MODES_OF_TRAVEL.find(candidate => candidate === mode);
  if (!match) {
    throw new InvalidArgumentError('modeOfTravel must be one of car, train, bus, flight', { modeOfTravel: mode });
  }
  return match;
}

export class LocationIngestService extends EventEmitter {
  private pendingDeliveries: Set<Promise<void>> = new Set();
  private fanOut = new KeyedMutex();

  constructor(
    private ledger: LocationLedger,
    private registry: ConnectionRegistry,
    private geoIndex: GeoIndex,
    private guidePositions: GuidePositionStore,
    private webhookService?: IncidentWebhookService
  ) {
    super();
  }

  /**
   * Ingest a tourist position report
   * Returns the new status and fence membership for the subject
   */
  async updateLocation(caller: AuthenticatedIdentity | null, input: LocationReportInput): Promise<PositionResult> {
    const identity = this.requireIdentity(caller);
    const subjectId = GeospatialValidator.requireString(input.subjectId, 'subjectId');
    const latitude = GeospatialValidator.requireNumber(input.latitude, 'latitude');
    const longitude = GeospatialValidator.requireNumber(input.longitude, 'longitude');

    const update = await this.publishInOrder(subjectId, () =>
      this.ledger.reportPosition(subjectId, latitude, longitude, identity)
    );

    return { status: update.status, insideFence: update.insideFence };
  }

  /**
   * Move the caller's subject to another point of interest
   */
  async reassignDestination(caller: AuthenticatedIdentity | null, input: DestinationChangeInput): Promise<PositionResult> {
    const identity = this.requireIdentity(caller);
    const subjectId = GeospatialValidator.requireString(input.subjectId, 'subjectId');
    const poiId = GeospatialValidator.requirePoiId(input.poiId);

    const update = await this.publishInOrder(subjectId, () =>
      this.ledger.changeAssignedPOI(subjectId, poiId, identity)
    );

    return { status: update.status, insideFence: update.insideFence };
  }

  async updateGuidePosition(caller: AuthenticatedIdentity | null, input: GuidePositionInput): Promise<GuidePosition> {
    const identity = this.requireIdentity(caller);
    if (identity.role !== USER_ROLES.GUIDE) {
      throw new ForbiddenError('Tourist guide access required');
    }

    const { latitude, longitude } = GeospatialValidator.validateCoordinate(
      GeospatialValidator.requireNumber(input.latitude, 'latitude'),
      GeospatialValidator.requireNumber(input.longitude, 'longitude')
    );

    const position: GuidePosition = {
      guideId: identity.userId,
      latitude,
      longitude,
      updatedAt: new Date().toISOString(),
    };
    await this.guidePositions.save(position);

    await this.registry.notifyGuidePosition(identity.userId, {
      type: EVENT_TYPES.GUIDE_LOCATION_UPDATE,
      guideId: identity.userId,
      lat: latitude,
      lon: longitude,
      timestamp: position.updatedAt,
    });

    return position;
  }

  /**
   * Create a tourist profile anchored at the chosen point of interest
   */
  async registerTourist(caller: AuthenticatedIdentity | null, input: { poiId?: unknown }): Promise<TrackedSubject> {
    const identity = this.requireTourist(caller);
    const poiId = this.requireKnownPoi(input.poiId);
    const subject = await this.ledger.createSubject({
      kind: 'tourist',
      ownerUserId: identity.userId,
      poiId,
    });
    this.registry.bindTouristSubject(identity.userId, subject.id, null);
    return subject;
  }

  async startTrip(caller: AuthenticatedIdentity | null, input: TripStartInput): Promise<TrackedSubject> {
    const identity = this.requireTourist(caller);
    const poiId = this.requireKnownPoi(input.poiId);
    const guideId = GeospatialValidator.optionalString(input.guideId, 'guideId') ?? null;
    const startingLocation = GeospatialValidator.optionalString(input.startingLocation, 'startingLocation');
    const modeOfTravel = parseModeOfTravel(input.modeOfTravel);

    const subject = await this.ledger.createSubject({
      kind: 'trip',
      ownerUserId: identity.userId,
      poiId,
      guideId,
      startingLocation,
      modeOfTravel,
    });

    this.registry.bindTouristSubject(identity.userId, subject.id, subject.guideId);
    if (subject.guideId !== null) {
      this.registry.grantGuideAccess(subject.guideId, subject.id);
    }
    await this.broadcastLifecycle('trip_started', subject);

    console.log(`Trip ${subject.id} started for user ${subject.ownerUserId}`);
    return subject;
  }

  async closeTrip(caller: AuthenticatedIdentity | null, subjectId: string): Promise<TrackedSubject> {
    const identity = this.requireIdentity(caller);
    const closed = await this.ledger.deactivateSubject(subjectId, identity);

    this.registry.revokeSubject(closed.id);
    await this.broadcastLifecycle('trip_ended', closed);

    console.log(`Trip ${closed.id} closed by ${identity.role} ${identity.userId}`);
    return closed;
  }

  /**
   * Admins see every active subject, guides their assignees, tourists their own
   */
  async listVisibleSubjects(caller: AuthenticatedIdentity | null): Promise<SubjectSummary[]> {
    const identity = this.requireIdentity(caller);
    const subjects = await this.subjectsVisibleTo(identity);

    return subjects.map(subject => ({ ...subject, poiName: this.geoIndex.byId(subject.poiId).name }));
  }

  async getSubjectView(caller: AuthenticatedIdentity | null, subjectId: string): Promise<SubjectView> {
    const identity = this.requireIdentity(caller);
    const subject = await this.requireVisibleSubject(identity, subjectId);
    const poi = this.geoIndex.byId(subject.poiId);

    const distanceMeters = subject.latitude !== null && subject.longitude !== null
      ? GeofenceEvaluator.distanceMeters(subject.latitude, subject.longitude, poi.latitude, poi.longitude)
      : null;

    return {
      subject,
      geofence: {
        poiId: poi.id,
        name: poi.name,
        centerLatitude: poi.latitude,
        centerLongitude: poi.longitude,
        radiusMeters: poi.radiusMeters,
        distanceMeters,
      },
    };
  }

  async listIncidents(caller: AuthenticatedIdentity | null, subjectId: string): Promise<Incident[]> {
    const identity = this.requireIdentity(caller);
    await this.requireVisibleSubject(identity, subjectId);
    return this.ledger.listIncidents(subjectId);
  }

  /**
   * Admins see every guide; tourists only the guide of their active trip
   */
  async listGuidePositions(caller: AuthenticatedIdentity | null): Promise<GuidePosition[]> {
    const identity = this.requireIdentity(caller);
    const positions = await this.guidePositions.list();

    switch (identity.role) {
      case 'admin':
        return positions;
      case 'tourist': {
        const own = await this.ledger.findActiveByOwner(identity.userId);
        const guideId = own?.guideId ?? null;
        return guideId === null ? [] : positions.filter(position => position.guideId === guideId);
      }
      case 'guide':
        throw new ForbiddenError('Guides cannot view other guide positions');
    }
  }

  /**
   * Scope for a new subscriber connection
   */
  async buildViewer(identity: AuthenticatedIdentity): Promise<Viewer> {
    switch (identity.role) {
      case 'admin':
        return { role: 'admin', userId: identity.userId };
      case 'guide': {
        const assigned = await this.ledger.findActiveByGuide(identity.userId);
        return {
          role: 'guide',
          userId: identity.userId,
          assignedSubjectIds: new Set(assigned.map(subject => subject.id)),
        };
      }
      case 'tourist': {
        const own = await this.ledger.findActiveByOwner(identity.userId);
        return {
          role: 'tourist',
          userId: identity.userId,
          subjectId: own?.id ?? null,
          assignedGuideId: own?.guideId ?? null,
        };
      }
    }
  }

  getPointsOfInterest(): readonly PointOfInterest[] {
    return this.geoIndex.list();
  }

  getGeoIndex(): GeoIndex {
    return this.geoIndex;
  }

  /**
   * Wait for in-flight webhook deliveries
   */
  async shutdown(): Promise<void> {
    console.log('Shutting down Location Ingest Service...');
    await Promise.all(Array.from(this.pendingDeliveries));
    this.emit('shutdown');
  }

  private async subjectsVisibleTo(identity: AuthenticatedIdentity): Promise<TrackedSubject[]> {
    switch (identity.role) {
      case 'admin':
        return this.ledger.listActive();
      case 'guide':
        return this.ledger.findActiveByGuide(identity.userId);
      case 'tourist': {
        const own = await this.ledger.findActiveByOwner(identity.userId);
        return own ? [own] : [];
      }
    }
  }

  private requireIdentity(caller: AuthenticatedIdentity | null): AuthenticatedIdentity {
    if (!caller) {
      throw new UnauthenticatedError();
    }
    return caller;
  }

  private requireTourist(caller: AuthenticatedIdentity | null): AuthenticatedIdentity {
    const identity = this.requireIdentity(caller);
    if (identity.role !== USER_ROLES.TOURIST) {
      throw new ForbiddenError('Tourist access required');
    }
    return identity;
  }

  private requireKnownPoi(value: unknown): number {
    const poiId = GeospatialValidator.requirePoiId(value);
    if (!this.geoIndex.has(poiId)) {
      throw new InvalidArgumentError('Invalid location ID', { poiId });
    }
    return poiId;
  }

  private async requireVisibleSubject(identity: AuthenticatedIdentity, subjectId: string): Promise<TrackedSubject> {
    const subject = await this.ledger.getSubject(subjectId);
    if (!subject) {
      throw new NotFoundError('Tourist not found', { subjectId });
    }

    switch (identity.role) {
      case 'admin':
        return subject;
      case 'guide':
        if (subject.guideId === identity.userId) return subject;
        throw new ForbiddenError('You can only view tourists assigned to you');
      case 'tourist':
        if (subject.ownerUserId === identity.userId) return subject;
        throw new ForbiddenError('You can only view your own tourist data');
    }
  }

  /**
   * Updates of one subject reach subscribers in the order the ledger applied
   * them. Fan-out is bounded by the registry's send timeout.
   */
  private async publishInOrder(subjectId: string, apply: () => Promise<LedgerUpdate>): Promise<LedgerUpdate> {
    return this.fanOut.runExclusive(subjectId, async () => {
      const update = await apply();
      await this.publish(update);
      return update;
    });
  }

  /**
   * Fan out a ledger update; delivery problems are handled by the registry
   */
  private async publish(update: LedgerUpdate): Promise<void> {
    const { subject } = update;
    if (subject.latitude === null || subject.longitude === null) return;

    const event: LocationUpdateEvent = {
      type: EVENT_TYPES.LOCATION_UPDATE,
      subjectId: subject.id,
      lat: subject.latitude,
      lon: subject.longitude,
      status: update.status,
      insideFence: update.insideFence,
      timestamp: subject.updatedAt,
    };
    await this.registry.notifySubjectUpdate(subject.id, event);

    if (update.incident) {
      await this.publishIncident(update.incident, subject);
    }
  }

  private async publishIncident(incident: Incident, subject: TrackedSubject): Promise<void> {
    console.warn(`Incident ${incident.id}: subject ${subject.id} left the safe zone of POI ${incident.poiId}`);

    const event: IncidentCreatedEvent = {
      type: EVENT_TYPES.INCIDENT_CREATED,
      incidentId: incident.id,
      subjectId: incident.subjectId,
      severity: incident.severity,
      lat: incident.latitude,
      lon: incident.longitude,
      timestamp: incident.timestamp,
    };
    await this.registry.notifyRoleBroadcast('admin', event);
    this.emit('incidentCreated', incident);

    if (this.webhookService?.isEnabled()) {
      const delivery = this.webhookService
        .notifyIncident(incident, subject, this.geoIndex.byId(incident.poiId))
        .then(() => undefined)
        .catch(error => {
          console.error(`Incident webhook dispatch failed for ${incident.id}:`, error);
        })
        .finally(() => {
          this.pendingDeliveries.delete(delivery);
        });
      this.pendingDeliveries.add(delivery);
    }
  }

  private async broadcastLifecycle(action: TouristStatusChangeEvent['action'], subject: TrackedSubject): Promise<void> {
    const event: TouristStatusChangeEvent = {
      type: EVENT_TYPES.TOURIST_STATUS_CHANGE,
      action,
      subjectId: subject.id,
      ownerUserId: subject.ownerUserId,
      guideId: subject.guideId,
      poiId: subject.poiId,
      poiName: this.geoIndex.byId(subject.poiId).name,
      timestamp: subject.updatedAt,
    };

    await Promise.all([
      this.registry.notifyRoleBroadcast('admin', event),
      this.registry.notifyRoleBroadcast('guide', event),
    ]);
  }
}
