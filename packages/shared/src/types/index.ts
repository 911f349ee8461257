// Common types for the SafeTrail tracking system
import { EVENT_TYPES, INCIDENT_SEVERITY, INCIDENT_STATUS, SUBJECT_STATUS, USER_ROLES } from '../constants';

type ValueOf<T> = T[keyof T];

export type UserRole = ValueOf<typeof USER_ROLES>;
export type SubjectStatus = ValueOf<typeof SUBJECT_STATUS>;
export type IncidentStatus = ValueOf<typeof INCIDENT_STATUS>;
export type IncidentSeverity = ValueOf<typeof INCIDENT_SEVERITY>;

export interface LocationUpdateEvent {
  type: typeof EVENT_TYPES.LOCATION_UPDATE;
  subjectId: string;
  lat: number;
  lon: number;
  status: SubjectStatus;
  insideFence: boolean;
  timestamp: string;
}

export interface GuideLocationUpdateEvent {
  type: typeof EVENT_TYPES.GUIDE_LOCATION_UPDATE;
  guideId: string;
  lat: number;
  lon: number;
  timestamp: string;
}

export interface TouristStatusChangeEvent {
  type: typeof EVENT_TYPES.TOURIST_STATUS_CHANGE;
  action: 'trip_started' | 'trip_ended';
  subjectId: string;
  ownerUserId: string;
  guideId: string | null;
  poiId: number;
  poiName: string;
  timestamp: string;
}

export interface IncidentCreatedEvent {
  type: typeof EVENT_TYPES.INCIDENT_CREATED;
  incidentId: string;
  subjectId: string;
  severity: IncidentSeverity;
  lat: number;
  lon: number;
  timestamp: string;
}

export type OutboundEvent =
  | LocationUpdateEvent
  | GuideLocationUpdateEvent
  | TouristStatusChangeEvent
  | IncidentCreatedEvent;

export type ApiResponse<T = unknown> = {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
};
