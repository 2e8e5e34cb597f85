import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DateTime } from 'luxon';
import { initDb, openDatabase } from '../../src/database';
import { EventStore } from '../../src/services/eventStore';
import { StorageError } from '../../src/utils/errors';
import {
  at,
  closeTestDatabase,
  countRows,
  FakeClock,
  getTestDatabase,
  initTestDatabase,
  TEST_ZONE,
} from '../helpers';

describe('EventStore', () => {
  let clock: FakeClock;
  let store: EventStore;

  beforeEach(() => {
    const db = initTestDatabase();
    // Wednesday
    clock = new FakeClock(at('2024-03-13 10:00'));
    store = new EventStore(db, { timezone: TEST_ZONE }, clock);
  });

  afterEach(() => {
    closeTestDatabase();
  });

  describe('Forwards log', () => {
    it('should return increasing ids and count events since an instant', () => {
      const first = store.recordForward('@alice', 'photo');
      const second = store.recordForward('@bob', 'text');

      expect(second).toBeGreaterThan(first);
      expect(store.countSince(at('2024-03-13 04:00'))).toBe(2);
      expect(store.countSince(at('2024-03-13 10:01'))).toBe(0);
    });

    it('should persist wall-clock text in the configured zone', () => {
      store.recordForward('@alice', 'text', DateTime.fromISO('2024-03-13T07:00:00Z'));

      const row = getTestDatabase()
        .prepare<[], { local_time: string; message_kind: string }>(
          'SELECT local_time, message_kind FROM forwards',
        )
        .get();
      expect(row).toEqual({ local_time: '2024-03-13 10:00:00', message_kind: 'text' });
    });

    it('should rank a single recorded event', () => {
      store.recordForward('@alice', 'photo');

      expect(store.usersRanked(at('2024-03-01 00:00'), at('2024-04-01 00:00'))).toEqual([
        { username: '@alice', count: 1 },
      ]);
    });

    it('should rank by count and break ties by first appearance', () => {
      store.recordForward('@carol', 'text', at('2024-03-10 12:00'));
      store.recordForward('@bob', 'text', at('2024-03-11 12:00'));
      store.recordForward('@alice', 'text', at('2024-03-11 13:00'));
      store.recordForward('@alice', 'text', at('2024-03-12 12:00'));

      expect(store.usersRanked(at('2024-03-01 00:00'), at('2024-04-01 00:00'))).toEqual([
        { username: '@alice', count: 2 },
        { username: '@carol', count: 1 },
        { username: '@bob', count: 1 },
      ]);
      expect(store.usersRanked(at('2024-03-01 00:00'), at('2024-04-01 00:00'), 1)).toEqual([
        { username: '@alice', count: 2 },
      ]);
    });

    it('should report the latest event overall and per user', () => {
      expect(store.latestEventTime()).toBeNull();

      store.recordForward('@alice', 'text', at('2024-03-13 08:00'));
      store.recordForward('@bob', 'text', at('2024-03-13 09:00'));

      expect(store.latestEventTime()?.toMillis()).toBe(at('2024-03-13 09:00').toMillis());
      expect(store.latestEventTime('@alice')?.toMillis()).toBe(at('2024-03-13 08:00').toMillis());
      expect(store.latestEventTime('@nobody')).toBeNull();
    });

    it('should delete events since an instant and be idempotent', () => {
      store.recordForward('@alice', 'text', at('2024-03-12 20:00'));
      store.recordForward('@alice', 'text', at('2024-03-13 05:00'));
      store.recordForward('@bob', 'text', at('2024-03-13 09:30'));

      expect(store.deleteSince(at('2024-03-13 04:00'))).toBe(2);
      expect(store.deleteSince(at('2024-03-13 04:00'))).toBe(0);
      expect(countRows('forwards')).toBe(1);
    });

    it('should list top users of the current month only', () => {
      store.recordForward('@old', 'text', at('2024-02-28 12:00'));
      store.recordForward('@alice', 'text', at('2024-03-02 12:00'));

      expect(store.topUsersThisMonth(5)).toEqual([{ username: '@alice', count: 1 }]);
    });

    it('should list distinct users sorted by name', () => {
      store.recordForward('@bob', 'text', at('2024-03-02 12:00'));
      store.recordForward('@alice', 'text', at('2024-03-03 12:00'));
      store.recordForward('@bob', 'text', at('2024-03-04 12:00'));

      expect(store.distinctUsers(at('2024-03-01 00:00'), at('2024-04-01 00:00'))).toEqual([
        '@alice',
        '@bob',
      ]);
    });
  });

  describe('Histograms', () => {
    it('should always return 24 hour buckets', () => {
      store.recordForward('@alice', 'text', at('2024-03-13 10:00'));
      store.recordForward('@bob', 'text', at('2024-03-12 10:30'));
      store.recordForward('@bob', 'text', at('2024-03-11 23:15'));

      const hours = store.hourHistogram(at('2024-03-01 00:00'), at('2024-04-01 00:00'));

      expect(hours).toHaveLength(24);
      expect(hours[0]).toEqual({ hour: 0, count: 0 });
      expect(hours[10]).toEqual({ hour: 10, count: 2 });
      expect(hours[23]).toEqual({ hour: 23, count: 1 });
    });

    it('should return 24 zero buckets for an empty store', () => {
      const hours = store.hourHistogram(at('2024-03-01 00:00'), at('2024-04-01 00:00'));
      expect(hours.every((bucket) => bucket.count === 0)).toBe(true);
      expect(hours.map((bucket) => bucket.hour)).toEqual(Array.from({ length: 24 }, (_, h) => h));
    });

    it('should number weekdays from Monday', () => {
      // Wednesday and Sunday
      store.recordForward('@alice', 'text', at('2024-03-13 12:00'));
      store.recordForward('@alice', 'text', at('2024-03-17 12:00'));

      const weekdays = store.weekdayHistogram(at('2024-03-01 00:00'), at('2024-04-01 00:00'));

      expect(weekdays.map((bucket) => bucket.count)).toEqual([0, 0, 1, 0, 0, 0, 1]);
    });

    it('should bucket by local wall-clock day across the UTC boundary', () => {
      // 01:30 in Moscow is still the previous day in UTC
      store.recordForward('@alice', 'text', at('2024-03-18 01:30'));

      const weekdays = store.weekdayHistogram(at('2024-03-01 00:00'), at('2024-04-01 00:00'));
      expect(weekdays[0]).toEqual({ weekday: 0, count: 1 });
    });

    it('should return one bucket per day of a leap February', () => {
      store.recordForward('@alice', 'video', at('2024-02-29 12:00'));

      const days = store.dayOfMonthHistogram(2, 2024);

      expect(days).toHaveLength(29);
      expect(days[0]).toEqual({ day: 1, count: 0 });
      expect(days[28]).toEqual({ day: 29, count: 1 });
    });

    it('should return twelve month buckets', () => {
      store.recordForward('@alice', 'text', at('2024-01-05 12:00'));
      store.recordForward('@alice', 'text', at('2024-03-05 12:00'));
      store.recordForward('@alice', 'text', at('2023-03-05 12:00'));

      const months = store.monthHistogram(2024);

      expect(months).toHaveLength(12);
      expect(months.map((bucket) => bucket.count)).toEqual([1, 0, 1, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
    });

    it('should list only years that have events, oldest first', () => {
      store.recordForward('@alice', 'text', at('2024-03-05 12:00'));
      store.recordForward('@alice', 'text', at('2022-07-05 12:00'));
      store.recordForward('@bob', 'text', at('2024-01-05 12:00'));

      expect(store.yearHistogram()).toEqual([
        { year: 2022, count: 1 },
        { year: 2024, count: 2 },
      ]);
    });
  });

  describe('Ban registry', () => {
    const newBan = {
      subjectUserId: 42,
      subjectName: '@mallory',
      issuerId: 111111111,
      issuerName: '@admin',
      durationHours: 2,
      reason: 'spam',
    };

    it('should create a ban that is active until it expires', () => {
      const id = store.createBan(newBan);

      const ban = store.activeBan(42);
      expect(ban?.id).toBe(id);
      expect(ban?.banUntil.toMillis()).toBe(at('2024-03-13 12:00').toMillis());
      expect(ban?.reason).toBe('spam');
      expect(ban?.issuerDisplayName).toBe('@admin');

      clock.advance({ hours: 1, minutes: 59 });
      expect(store.activeBan(42)).not.toBeNull();

      clock.advance({ minutes: 1 });
      expect(store.activeBan(42)).toBeNull();
    });

    it('should store a missing reason as null', () => {
      const id = store.createBan({ ...newBan, reason: undefined });
      expect(store.findBan(id)?.reason).toBeNull();
    });

    it('should revoke a live ban once', () => {
      store.createBan(newBan);

      expect(store.revokeBan(42)).toBe(1);
      expect(store.activeBan(42)).toBeNull();
      expect(store.revokeBan(42)).toBe(0);
    });

    it('should not revoke an expired ban', () => {
      store.createBan(newBan);
      clock.advance({ hours: 3 });

      expect(store.revokeBan(42)).toBe(0);
    });

    it('should supersede an earlier live ban of the same subject', () => {
      const first = store.createBan({ ...newBan, durationHours: 24 });
      const second = store.createBan({ ...newBan, durationHours: 1 });

      expect(store.activeBan(42)?.id).toBe(second);
      expect(store.findBan(first)?.active).toBe(false);
      expect(countRows('bans')).toBe(2);
    });

    it('should keep bans of other subjects apart', () => {
      store.createBan(newBan);
      expect(store.activeBan(43)).toBeNull();
    });
  });

  describe('Failures', () => {
    it('should raise StorageError when the database is unavailable', () => {
      const db = openDatabase(':memory:');
      initDb(db);
      const broken = new EventStore(db, { timezone: TEST_ZONE }, clock);
      db.close();

      expect(() => broken.countSince(at('2024-03-13 04:00'))).toThrow(StorageError);
      expect(() => broken.recordForward('@alice', 'text')).toThrow(
        'Storage operation failed: record_forward',
      );
    });
  });
});
