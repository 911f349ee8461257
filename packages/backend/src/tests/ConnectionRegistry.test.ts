import { EVENT_TYPES, LocationUpdateEvent } from '@safetrail/shared';
import { ConnectionRegistry } from '../services/tracking/ConnectionRegistry';
import { SubscriberTransport, Viewer } from '../types/tracking';

type Behaviour = 'ok' | 'fail' | 'hang';

class FakeTransport implements SubscriberTransport {
  sent: string[] = [];
  closed: Array<{ code: number; reason: string }> = [];

  constructor(private behaviour: Behaviour = 'ok') {}

  async send(data: string): Promise<void> {
    if (this.behaviour === 'fail') {
      throw new Error('socket closed');
    }
    if (this.behaviour === 'hang') {
      return new Promise<void>(() => undefined);
    }
    this.sent.push(data);
  }

  close(code: number, reason: string): void {
    this.closed.push({ code, reason });
  }
}

const admin = (userId: string): Viewer => ({ role: 'admin', userId });
const guide = (userId: string, subjects: string[] = []): Viewer => ({
  role: 'guide',
  userId,
  assignedSubjectIds: new Set(subjects),
});
const tourist = (userId: string, subjectId: string | null, assignedGuideId: string | null = null): Viewer => ({
  role: 'tourist',
  userId,
  subjectId,
  assignedGuideId,
});

const update: LocationUpdateEvent = {
  type: EVENT_TYPES.LOCATION_UPDATE,
  subjectId: 'subject-1',
  lat: 27.2,
  lon: 78.0421,
  status: 'Critical',
  insideFence: false,
  timestamp: '2024-01-01T00:00:00.000Z',
};

describe('ConnectionRegistry', () => {
  let registry: ConnectionRegistry;

  beforeEach(() => {
    registry = new ConnectionRegistry({ sendTimeout: 20 });
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('registration', () => {
    test('registering the same transport twice returns the same handle', () => {
      const transport = new FakeTransport();
      const first = registry.register(transport, admin('admin-1'));
      const second = registry.register(transport, admin('admin-1'));

      expect(second).toBe(first);
      expect(registry.size()).toBe(1);
    });

    test('unregistering an unknown or removed handle is a no-op', () => {
      const handle = registry.register(new FakeTransport(), admin('admin-1'));

      expect(() => registry.unregister('no-such-handle')).not.toThrow();
      registry.unregister(handle);
      registry.unregister(handle);

      expect(registry.has(handle)).toBe(false);
      expect(registry.size()).toBe(0);
    });
  });

  describe('notifySubjectUpdate', () => {
    test('reaches admins, the owner and the assigned guide only', async () => {
      const connections = {
        admin: new FakeTransport(),
        owner: new FakeTransport(),
        otherTourist: new FakeTransport(),
        assignedGuide: new FakeTransport(),
        otherGuide: new FakeTransport(),
      };
      registry.register(connections.admin, admin('admin-1'));
      registry.register(connections.owner, tourist('tourist-1', 'subject-1'));
      registry.register(connections.otherTourist, tourist('tourist-2', 'subject-2'));
      registry.register(connections.assignedGuide, guide('guide-1', ['subject-1']));
      registry.register(connections.otherGuide, guide('guide-2', ['subject-2']));

      const report = await registry.notifySubjectUpdate('subject-1', update);

      expect(report).toEqual({ delivered: 3, dropped: 0 });
      expect(connections.admin.sent).toEqual([JSON.stringify(update)]);
      expect(connections.owner.sent).toHaveLength(1);
      expect(connections.assignedGuide.sent).toHaveLength(1);
      expect(connections.otherTourist.sent).toHaveLength(0);
      expect(connections.otherGuide.sent).toHaveLength(0);
    });

    test('a failing admin is dropped without affecting the others', async () => {
      const first = new FakeTransport();
      const broken = new FakeTransport('fail');
      const third = new FakeTransport();
      registry.register(first, admin('admin-1'));
      const brokenHandle = registry.register(broken, admin('admin-2'));
      registry.register(third, admin('admin-3'));

      const report = await registry.notifySubjectUpdate('subject-1', update);

      expect(report).toEqual({ delivered: 2, dropped: 1 });
      expect(first.sent).toHaveLength(1);
      expect(third.sent).toHaveLength(1);
      expect(registry.has(brokenHandle)).toBe(false);
      expect(registry.size()).toBe(2);
      expect(broken.closed).toEqual([{ code: 1011, reason: 'Delivery failed' }]);
    });

    test('a subscriber that does not accept the send in time is dropped', async () => {
      const slow = new FakeTransport('hang');
      const handle = registry.register(slow, admin('admin-1'));
      const dropped: string[] = [];
      registry.on('connectionDropped', (event: { handle: string }) => dropped.push(event.handle));

      const report = await registry.notifySubjectUpdate('subject-1', update);

      expect(report).toEqual({ delivered: 0, dropped: 1 });
      expect(registry.has(handle)).toBe(false);
      expect(dropped).toEqual([handle]);
    });

    test('no subscribers is an empty round', async () => {
      await expect(registry.notifySubjectUpdate('subject-1', update)).resolves.toEqual({ delivered: 0, dropped: 0 });
    });
  });

  describe('notifyGuidePosition', () => {
    test('reaches admins and the tourists of that guide; guides never see each other', async () => {
      const adminConnection = new FakeTransport();
      const assignedTourist = new FakeTransport();
      const idleTourist = new FakeTransport();
      const otherTourist = new FakeTransport();
      const sameGuide = new FakeTransport();
      const otherGuide = new FakeTransport();

      registry.register(adminConnection, admin('admin-1'));
      registry.register(assignedTourist, tourist('tourist-1', 'subject-1', 'guide-1'));
      registry.register(idleTourist, tourist('tourist-2', null, 'guide-1'));
      registry.register(otherTourist, tourist('tourist-3', 'subject-3', 'guide-2'));
      registry.register(sameGuide, guide('guide-1', ['subject-1']));
      registry.register(otherGuide, guide('guide-2', ['subject-3']));

      const report = await registry.notifyGuidePosition('guide-1', {
        type: EVENT_TYPES.GUIDE_LOCATION_UPDATE,
        guideId: 'guide-1',
        lat: 27.1751,
        lon: 78.0421,
        timestamp: '2024-01-01T00:00:00.000Z',
      });

      expect(report.delivered).toBe(2);
      expect(adminConnection.sent).toHaveLength(1);
      expect(assignedTourist.sent).toHaveLength(1);
      expect(idleTourist.sent).toHaveLength(0);
      expect(otherTourist.sent).toHaveLength(0);
      expect(sameGuide.sent).toHaveLength(0);
      expect(otherGuide.sent).toHaveLength(0);
    });
  });

  describe('notifyRoleBroadcast', () => {
    test('reaches every connection of the role and nobody else', async () => {
      const guideA = new FakeTransport();
      const guideB = new FakeTransport();
      const adminConnection = new FakeTransport();
      registry.register(guideA, guide('guide-1'));
      registry.register(guideB, guide('guide-2'));
      registry.register(adminConnection, admin('admin-1'));

      const report = await registry.notifyRoleBroadcast('guide', update);

      expect(report).toEqual({ delivered: 2, dropped: 0 });
      expect(adminConnection.sent).toHaveLength(0);
    });
  });

  describe('scope updates', () => {
    test('binding, granting and revoking a subject', async () => {
      const touristHandle = registry.register(new FakeTransport(), tourist('tourist-1', null));
      const guideHandle = registry.register(new FakeTransport(), guide('guide-1'));

      registry.bindTouristSubject('tourist-1', 'subject-9', 'guide-1');
      registry.grantGuideAccess('guide-1', 'subject-9');

      expect(registry.getViewer(touristHandle)).toEqual(tourist('tourist-1', 'subject-9', 'guide-1'));
      expect(registry.getViewer(guideHandle)).toEqual(guide('guide-1', ['subject-9']));

      registry.revokeSubject('subject-9');

      expect(registry.getViewer(touristHandle)).toEqual(tourist('tourist-1', null, null));
      expect(registry.getViewer(guideHandle)).toEqual(guide('guide-1'));
    });

    test('unknown handles have no viewer', () => {
      expect(registry.getViewer('missing')).toBeNull();
    });
  });

  describe('stats and shutdown', () => {
    test('counts connections per role and deliveries', async () => {
      registry.register(new FakeTransport(), admin('admin-1'));
      registry.register(new FakeTransport('fail'), admin('admin-2'));
      registry.register(new FakeTransport(), tourist('tourist-1', 'subject-1'));

      await registry.notifySubjectUpdate('subject-1', update);

      expect(registry.getStats()).toEqual({
        total: 2,
        byRole: { admin: 1, guide: 0, tourist: 1 },
        delivered: 2,
        dropped: 1,
      });
    });

    test('closeAll closes every transport with the given code', () => {
      const a = new FakeTransport();
      const b = new FakeTransport();
      registry.register(a, admin('admin-1'));
      registry.register(b, guide('guide-1'));

      registry.closeAll(1001, 'Server shutting down');

      expect(a.closed).toEqual([{ code: 1001, reason: 'Server shutting down' }]);
      expect(b.closed).toEqual([{ code: 1001, reason: 'Server shutting down' }]);
      expect(registry.size()).toBe(0);
    });
  });
});
