import Redis from 'ioredis';
import { EventEmitter } from 'events';
import {
  GuidePosition,
  GuidePositionStore,
  Incident,
  IncidentLog,
  RedisStorageConfig,
  SubjectRepository,
  TrackedSubject,
  TrackingStorage,
} from '../../../types/tracking';
import { parseGuidePosition, parseIncident, parseSubject } from './serialization';

/**
 * The Redis commands the store relies on. Keys are relative to the client's
 * key prefix.
 */
export interface RedisCommandClient {
  hget(key: string, field: string): Promise<string | null>;
  hset(key: string, field: string, value: string): Promise<number>;
  hvals(key: string): Promise<string[]>;
  rpush(key: string, value: string): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  quit(): Promise<void>;
}

interface StoreStats {
  reads: number;
  writes: number;
  errors: number;
}

const KEYS = {
  subjects: 'subjects',
  incidents: 'incidents',
  subjectIncidents: (subjectId: string) => `incidents:${subjectId}`,
  guidePositions: 'guide-positions',
};

/**
 * Build an ioredis-backed command client. Connection events are forwarded to
 * `events` so the owning store can report them.
 */
export function createRedisCommandClient(config: RedisStorageConfig, events: EventEmitter): RedisCommandClient {
  const client = new Redis({
    host: config.host,
    port: config.port,
    db: config.db,
    keyPrefix: config.keyPrefix,
    enableReadyCheck: true,
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  });

  client.on('connect', () => events.emit('connected'));
  client.on('error', (error: Error) => events.emit('error', error));
  client.on('close', () => events.emit('disconnected'));

  return {
    hget: (key, field) => client.hget(key, field),
    hset: (key, field, value) => client.hset(key, field, value),
    hvals: key => client.hvals(key),
    rpush: (key, value) => client.rpush(key, value),
    lrange: (key, start, stop) => client.lrange(key, start, stop),
    quit: async () => {
      await client.quit();
    },
  };
}

export class RedisTrackingStore extends EventEmitter implements TrackingStorage {
  readonly subjects: SubjectRepository;
  readonly incidents: IncidentLog;
  readonly guidePositions: GuidePositionStore;

  private stats: StoreStats = { reads: 0, writes: 0, errors: 0 };

  constructor(private client: RedisCommandClient) {
    super();

    this.subjects = {
      findById: async subjectId => {
        const raw = await this.read(() => this.client.hget(KEYS.subjects, subjectId));
        return raw === null ? null : parseSubject(raw);
      },
      save: async (subject: TrackedSubject) => {
        await this.write(() => this.client.hset(KEYS.subjects, subject.id, JSON.stringify(subject)));
      },
      list: async () => {
        const values = await this.read(() => this.client.hvals(KEYS.subjects));
        return values.map(parseSubject);
      },
    };

    this.incidents = {
      append: async (incident: Incident) => {
        const value = JSON.stringify(incident);
        await this.write(() => this.client.rpush(KEYS.subjectIncidents(incident.subjectId), value));
        await this.write(() => this.client.rpush(KEYS.incidents, value));
      },
      listBySubject: async subjectId => {
        const values = await this.read(() => this.client.lrange(KEYS.subjectIncidents(subjectId), 0, -1));
        return values.map(parseIncident);
      },
      list: async () => {
        const values = await this.read(() => this.client.lrange(KEYS.incidents, 0, -1));
        return values.map(parseIncident);
      },
    };

    this.guidePositions = {
      save: async (position: GuidePosition) => {
        await this.write(() => this.client.hset(KEYS.guidePositions, position.guideId, JSON.stringify(position)));
      },
      list: async () => {
        const values = await this.read(() => this.client.hvals(KEYS.guidePositions));
        return values.map(parseGuidePosition);
      },
    };
  }

  static connect(config: RedisStorageConfig): RedisTrackingStore {
    const events = new EventEmitter();
    const store = new RedisTrackingStore(createRedisCommandClient(config, events));

    events.on('connected', () => {
      console.log(`Redis tracking store connected to ${config.host}:${config.port}/${config.db}`);
      store.emit('connected');
    });
    events.on('error', (error: Error) => {
      console.error('Redis tracking store error:', error);
      store.emit('storeError', error);
    });
    events.on('disconnected', () => {
      console.warn('Redis tracking store disconnected');
      store.emit('disconnected');
    });

    return store;
  }

  getStats(): StoreStats {
    return { ...this.stats };
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private async read<T>(operation: () => Promise<T>): Promise<T> {
    try {
      const result = await operation();
      this.stats.reads++;
      return result;
    } catch (error) {
      this.stats.errors++;
      throw error;
    }
  }

  private async write(operation: () => Promise<number>): Promise<void> {
    try {
      await operation();
      this.stats.writes++;
    } catch (error) {
      this.stats.errors++;
      throw error;
    }
  }
}
