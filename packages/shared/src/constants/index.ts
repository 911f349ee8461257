// Constants for the SafeTrail tracking system

export const APP_NAME = 'SafeTrail';
export const APP_VERSION = '1.0.0';

export const USER_ROLES = {
  TOURIST: 'tourist',
  ADMIN: 'admin',
  GUIDE: 'guide',
} as const;

export const SUBJECT_STATUS = {
  SAFE: 'Safe',
  CRITICAL: 'Critical',
} as const;

export const INCIDENT_STATUS = {
  OPEN: 'Open',
  ACKNOWLEDGED: 'Acknowledged',
  RESOLVED: 'Resolved',
} as const;

export const INCIDENT_SEVERITY = {
  LOW: 'Low',
  MEDIUM: 'Medium',
  HIGH: 'High',
  CRITICAL: 'Critical',
} as const;

export const EVENT_TYPES = {
  LOCATION_UPDATE: 'location_update',
  GUIDE_LOCATION_UPDATE: 'guide_location_update',
  TOURIST_STATUS_CHANGE: 'tourist_status_change',
  INCIDENT_CREATED: 'incident_created',
} as const;

// WebSocket close codes (RFC 6455)
export const CLOSE_CODES = {
  GOING_AWAY: 1001,
  POLICY_VIOLATION: 1008,
  INTERNAL_ERROR: 1011,
} as const;

export const EARTH_RADIUS_METERS = 6371000;
export const DEFAULT_SEND_TIMEOUT = 5000; // milliseconds
