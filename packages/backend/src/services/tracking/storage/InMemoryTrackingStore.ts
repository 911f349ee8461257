import {
  GuidePosition,
  GuidePositionStore,
  Incident,
  IncidentLog,
  SubjectRepository,
  TrackedSubject,
  TrackingStorage,
} from '../../../types/tracking';

export class InMemorySubjectRepository implements SubjectRepository {
  private subjects: Map<string, TrackedSubject> = new Map();

  async findById(subjectId: string): Promise<TrackedSubject | null> {
    return this.subjects.get(subjectId) ?? null;
  }

  async save(subject: TrackedSubject): Promise<void> {
    this.subjects.set(subject.id, Object.freeze({ ...subject }));
  }

  async list(): Promise<TrackedSubject[]> {
    return Array.from(this.subjects.values());
  }
}

export class InMemoryIncidentLog implements IncidentLog {
  private incidents: Incident[] = [];

  async append(incident: Incident): Promise<void> {
    this.incidents.push(Object.freeze({ ...incident }));
  }

  async listBySubject(subjectId: string): Promise<Incident[]> {
    return this.incidents.filter(incident => incident.subjectId === subjectId);
  }

  async list(): Promise<Incident[]> {
    return [...this.incidents];
  }
}

export class InMemoryGuidePositionStore implements GuidePositionStore {
  private positions: Map<string, GuidePosition> = new Map();

  async save(position: GuidePosition): Promise<void> {
    this.positions.set(position.guideId, Object.freeze({ ...position }));
  }

  async list(): Promise<GuidePosition[]> {
    return Array.from(this.positions.values());
  }
}

/**
 * Process-local storage; the default driver and the one tests run against.
 */
export function createInMemoryStorage(): TrackingStorage {
  return {
    subjects: new InMemorySubjectRepository(),
    incidents: new InMemoryIncidentLog(),
    guidePositions: new InMemoryGuidePositionStore(),
    close: async () => undefined,
  };
}
