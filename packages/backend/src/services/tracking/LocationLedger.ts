/**
 * Location Ledger
 *
 * Owns the position and Safe/Critical status of every tracked subject and the
 * incident trail. All mutations of one subject run under that subject's lock;
 * different subjects never wait on each other.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { INCIDENT_SEVERITY, INCIDENT_STATUS, SUBJECT_STATUS, SubjectStatus } from '@safetrail/shared';
import {
  AuthenticatedIdentity,
  ConflictError,
  Coordinate,
  ForbiddenError,
  Incident,
  IncidentLog,
  InvalidArgumentError,
  LedgerUpdate,
  NewSubject,
  NotFoundError,
  SubjectRepository,
  TrackedSubject,
} from '../../types/tracking';
import { GeoIndex } from './GeoIndex';
import { GeofenceEvaluator } from './GeofenceEvaluator';
import { GeospatialValidator } from './utils/GeospatialValidator';
import { KeyedMutex } from './utils/KeyedMutex';

export interface LedgerOptions {
  guideReportsEnabled: boolean;
  clock?: () => Date;
}

export interface StatusTransition {
  from: SubjectStatus;
  to: SubjectStatus;
  raisesIncident: boolean;
}

/**
 * Safe ⇄ Critical. Only the Safe → Critical edge raises an incident;
 * recovery is silent and staying Critical raises nothing.
 */
export function transition(current: SubjectStatus, insideFence: boolean): StatusTransition {
  const next: SubjectStatus = insideFence ? SUBJECT_STATUS.SAFE : SUBJECT_STATUS.CRITICAL;
  return {
    from: current,
    to: next,
    raisesIncident: current !== SUBJECT_STATUS.CRITICAL && next === SUBJECT_STATUS.CRITICAL,
  };
}

export class LocationLedger extends EventEmitter {
  private mutex = new KeyedMutex();
  private clock: () => Date;

  constructor(
    private subjects: SubjectRepository,
    private incidents: IncidentLog,
    private geoIndex: GeoIndex,
    private options: LedgerOptions = { guideReportsEnabled: true }
  ) {
    super();
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Record a position report and run the status machine for the subject
   */
  async reportPosition(
    subjectId: string,
    latitude: number,
    longitude: number,
    caller: AuthenticatedIdentity
  ): Promise<LedgerUpdate> {
    return this.mutex.runExclusive(subjectId, async () => {
      const subject = await this.requireActiveSubject(subjectId);
      this.authorizeReport(subject, caller);
      GeospatialValidator.validateCoordinate(latitude, longitude);

      return this.applyPosition(subject, latitude, longitude, subject.poiId);
    });
  }

  /**
   * Move the subject to a different point of interest. The subject is placed
   * at the new center and its status recomputed there.
   */
  async changeAssignedPOI(subjectId: string, newPoiId: number, caller: AuthenticatedIdentity): Promise<LedgerUpdate> {
    if (!this.geoIndex.has(newPoiId)) {
      throw new InvalidArgumentError('Invalid location ID', { poiId: newPoiId });
    }

    return this.mutex.runExclusive(subjectId, async () => {
      const subject = await this.requireActiveSubject(subjectId);
      if (caller.role !== 'tourist' || caller.userId !== subject.ownerUserId) {
        throw new ForbiddenError('Access denied: You can only change your own destination');
      }

      const poi = this.geoIndex.byId(newPoiId);
      return this.applyPosition(subject, poi.latitude, poi.longitude, poi.id);
    });
  }

  /**
   * Baseline write: new subjects start Safe and never raise an incident on
   * creation, wherever their initial position is. A tourist holds at most one
   * active subject, so creation is serialized per owner.
   */
  async createSubject(input: NewSubject): Promise<TrackedSubject> {
    const subjectId = input.id ?? uuidv4();
    const position = input.position ?? null;
    if (position) {
      GeospatialValidator.validateCoordinate(position.latitude, position.longitude);
    }

    return this.mutex.runExclusive(ownerKey(input.ownerUserId), async () => {
      const existing = await this.findActiveByOwner(input.ownerUserId);
      if (existing) {
        throw new ConflictError('An active trip already exists for this tourist', { subjectId: existing.id });
      }
      return this.insertSubject(subjectId, input, position);
    });
  }

  private async insertSubject(
    subjectId: string,
    input: NewSubject,
    position: Coordinate | null
  ): Promise<TrackedSubject> {
    return this.mutex.runExclusive(subjectId, async () => {
      if (await this.subjects.findById(subjectId)) {
        throw new ConflictError(`Subject already exists: ${subjectId}`);
      }

      const poi = this.geoIndex.byId(input.poiId);
      const initial = position ?? (input.kind === 'tourist' ? { latitude: poi.latitude, longitude: poi.longitude } : null);
      const now = this.clock().toISOString();

      const subject: TrackedSubject = {
        id: subjectId,
        kind: input.kind,
        ownerUserId: input.ownerUserId,
        latitude: initial ? initial.latitude : null,
        longitude: initial ? initial.longitude : null,
        status: SUBJECT_STATUS.SAFE,
        poiId: poi.id,
        guideId: input.guideId ?? null,
        isActive: true,
        ...(input.startingLocation !== undefined ? { startingLocation: input.startingLocation } : {}),
        ...(input.modeOfTravel !== undefined ? { modeOfTravel: input.modeOfTravel } : {}),
        createdAt: now,
        updatedAt: now,
        closedAt: null,
      };

      await this.subjects.save(subject);
      this.emit('subjectCreated', subject);
      return subject;
    });
  }

  /**
   * Close a subject. Owners may close their own; admins may close any.
   */
  async deactivateSubject(subjectId: string, caller: AuthenticatedIdentity): Promise<TrackedSubject> {
    return this.mutex.runExclusive(subjectId, async () => {
      const subject = await this.requireActiveSubject(subjectId);
      const isOwner = caller.role === 'tourist' && caller.userId === subject.ownerUserId;
      if (!isOwner && caller.role !== 'admin') {
        throw new ForbiddenError('Access denied: You can only close your own trip');
      }

      const now = this.clock().toISOString();
      const closed: TrackedSubject = { ...subject, isActive: false, closedAt: now, updatedAt: now };
      await this.subjects.save(closed);
      this.emit('subjectDeactivated', closed);
      return closed;
    });
  }

  async getSubject(subjectId: string): Promise<TrackedSubject | null> {
    return this.subjects.findById(subjectId);
  }

  async findActiveByOwner(userId: string): Promise<TrackedSubject | null> {
    const owned = (await this.listActive()).filter(subject => subject.ownerUserId === userId);
    return owned.length > 0 ? owned[owned.length - 1] : null;
  }

  async findActiveByGuide(guideId: string): Promise<TrackedSubject[]> {
    return (await this.listActive()).filter(subject => subject.guideId === guideId);
  }

  async listActive(): Promise<TrackedSubject[]> {
    const all = await this.subjects.list();
    return all
      .filter(subject => subject.isActive)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async listIncidents(subjectId?: string): Promise<Incident[]> {
    return subjectId === undefined ? this.incidents.list() : this.incidents.listBySubject(subjectId);
  }

  private async requireActiveSubject(subjectId: string): Promise<TrackedSubject> {
    const subject = await this.subjects.findById(subjectId);
    if (!subject || !subject.isActive) {
      throw new NotFoundError('Tourist not found', { subjectId });
    }
    return subject;
  }

  /**
   * Default deny: only the owning tourist, or the assigned guide when guide
   * reports are enabled, may move a subject.
   */
  private authorizeReport(subject: TrackedSubject, caller: AuthenticatedIdentity): void {
    switch (caller.role) {
      case 'tourist':
        if (caller.userId === subject.ownerUserId) return;
        throw new ForbiddenError('Access denied: You can only update your own location');
      case 'guide':
        if (this.options.guideReportsEnabled && subject.guideId !== null && caller.userId === subject.guideId) return;
        throw new ForbiddenError('Access denied: Guides can only report positions of their assigned tourists');
      case 'admin':
        throw new ForbiddenError('Access denied: Only tourists can update tourist location positions');
    }
  }

  private async applyPosition(
    subject: TrackedSubject,
    latitude: number,
    longitude: number,
    poiId: number
  ): Promise<LedgerUpdate> {
    const poi = this.geoIndex.byId(poiId);
    const { insideFence } = GeofenceEvaluator.evaluate(latitude, longitude, poi);
    const step = transition(subject.status, insideFence);
    const now = this.clock().toISOString();

    let incident: Incident | null = null;
    if (step.raisesIncident) {
      incident = {
        id: uuidv4(),
        subjectId: subject.id,
        timestamp: now,
        severity: INCIDENT_SEVERITY.CRITICAL,
        incidentType: 'Geofence',
        status: INCIDENT_STATUS.OPEN,
        latitude,
        longitude,
        poiId: poi.id,
      };
    }

    const updated: TrackedSubject = {
      ...subject,
      latitude,
      longitude,
      poiId: poi.id,
      status: step.to,
      updatedAt: now,
    };
    await this.subjects.save(updated);
    if (incident) {
      await this.appendOrRestore(incident, subject);
    }

    if (incident) {
      this.emit('incidentCreated', incident, updated);
    }
    this.emit('subjectUpdated', updated, step);

    return { status: step.to, insideFence, subject: updated, incident };
  }

  /**
   * The incident and the Critical snapshot stand or fall together: when the
   * append fails the previous snapshot goes back, so the retried report still
   * sees Safe and raises the incident.
   */
  private async appendOrRestore(incident: Incident, previous: TrackedSubject): Promise<void> {
    try {
      await this.incidents.append(incident);
    } catch (error) {
      try {
        await this.subjects.save(previous);
      } catch (restoreError) {
        console.error(`Failed to restore subject ${previous.id} after incident write error:`, restoreError);
      }
      throw error;
    }
  }
}

function ownerKey(userId: string): string {
  return `owner:${userId}`;
}
