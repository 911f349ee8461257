/**
 * Parsing of records read back from external storage.
 *
 * Stored JSON is treated as untrusted: every field is checked before a value
 * is handed to the ledger.
 */

import { INCIDENT_SEVERITY, INCIDENT_STATUS, SUBJECT_STATUS } from '@safetrail/shared';
import {
  GuidePosition,
  Incident,
  ModeOfTravel,
  SubjectKind,
  TrackedSubject,
  TrackingError,
} from '../../../types/tracking';

type JsonRecord = Record<string, unknown>;

class CorruptRecordError extends TrackingError {
  constructor(kind: string, field: string) {
    super(`Stored ${kind} record has an invalid "${field}" field`, 'CORRUPT_RECORD', 500, { kind, field });
    this.name = 'CorruptRecordError';
  }
}

function parseRecord(raw: string, kind: string): JsonRecord {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new TrackingError(`Stored ${kind} record is not valid JSON`, 'CORRUPT_RECORD', 500, {
      kind,
      originalError: error instanceof Error ? error.message : String(error),
    });
  }
  if (!isJsonRecord(value)) {
    throw new CorruptRecordError(kind, '<root>');
  }
  return value;
}

function isJsonRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: JsonRecord, field: string, kind: string): string {
  const value = record[field];
  if (typeof value !== 'string') throw new CorruptRecordError(kind, field);
  return value;
}

function numberField(record: JsonRecord, field: string, kind: string): number {
  const value = record[field];
  if (typeof value !== 'number') throw new CorruptRecordError(kind, field);
  return value;
}

function nullableNumberField(record: JsonRecord, field: string, kind: string): number | null {
  const value = record[field];
  if (value === null || value === undefined) return null;
  if (typeof value !== 'number') throw new CorruptRecordError(kind, field);
  return value;
}

function nullableStringField(record: JsonRecord, field: string, kind: string): string | null {
  const value = record[field];
  if (value === null || value === undefined) return null;
  if (typeof value !== 'string') throw new CorruptRecordError(kind, field);
  return value;
}

export function parseSubject(raw: string): TrackedSubject {
  const kind = 'subject';
  const record = parseRecord(raw, kind);

  const subjectKind = record.kind;
  if (subjectKind !== 'tourist' && subjectKind !== 'trip') throw new CorruptRecordError(kind, 'kind');
  const status = record.status;
  if (status !== SUBJECT_STATUS.SAFE && status !== SUBJECT_STATUS.CRITICAL) {
    throw new CorruptRecordError(kind, 'status');
  }
  const isActive = record.isActive;
  if (typeof isActive !== 'boolean') throw new CorruptRecordError(kind, 'isActive');

  const modeOfTravel = nullableStringField(record, 'modeOfTravel', kind);
  const startingLocation = nullableStringField(record, 'startingLocation', kind);

  const kindValue: SubjectKind = subjectKind;
  return {
    id: stringField(record, 'id', kind),
    kind: kindValue,
    ownerUserId: stringField(record, 'ownerUserId', kind),
    latitude: nullableNumberField(record, 'latitude', kind),
    longitude: nullableNumberField(record, 'longitude', kind),
    status,
    poiId: numberField(record, 'poiId', kind),
    guideId: nullableStringField(record, 'guideId', kind),
    isActive,
    ...(startingLocation !== null ? { startingLocation } : {}),
    ...(modeOfTravel !== null ? { modeOfTravel: toModeOfTravel(modeOfTravel) } : {}),
    createdAt: stringField(record, 'createdAt', kind),
    updatedAt: stringField(record, 'updatedAt', kind),
    closedAt: nullableStringField(record, 'closedAt', kind),
  };
}

function toModeOfTravel(value: string): ModeOfTravel {
  switch (value) {
    case 'car':
    case 'train':
    case 'bus':
    case 'flight':
      return value;
    default:
      throw new CorruptRecordError('subject', 'modeOfTravel');
  }
}

export function parseIncident(raw: string): Incident {
  const kind = 'incident';
  const record = parseRecord(raw, kind);

  const severity = record.severity;
  if (
    severity !== INCIDENT_SEVERITY.LOW &&
    severity !== INCIDENT_SEVERITY.MEDIUM &&
    severity !== INCIDENT_SEVERITY.HIGH &&
    severity !== INCIDENT_SEVERITY.CRITICAL
  ) {
    throw new CorruptRecordError(kind, 'severity');
  }
  const status = record.status;
  if (
    status !== INCIDENT_STATUS.OPEN &&
    status !== INCIDENT_STATUS.ACKNOWLEDGED &&
    status !== INCIDENT_STATUS.RESOLVED
  ) {
    throw new CorruptRecordError(kind, 'status');
  }
  const incidentType = record.incidentType;
  if (incidentType !== 'Geofence') throw new CorruptRecordError(kind, 'incidentType');

  return {
    id: stringField(record, 'id', kind),
    subjectId: stringField(record, 'subjectId', kind),
    timestamp: stringField(record, 'timestamp', kind),
    severity,
    incidentType,
    status,
    latitude: numberField(record, 'latitude', kind),
    longitude: numberField(record, 'longitude', kind),
    poiId: numberField(record, 'poiId', kind),
  };
}

export function parseGuidePosition(raw: string): GuidePosition {
  const kind = 'guide position';
  const record = parseRecord(raw, kind);

  return {
    guideId: stringField(record, 'guideId', kind),
    latitude: numberField(record, 'latitude', kind),
    longitude: numberField(record, 'longitude', kind),
    updatedAt: stringField(record, 'updatedAt', kind),
  };
}
