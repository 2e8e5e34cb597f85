import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import quotes from '../../assets/quotes.json';
import { createPublishHandler } from '../../src/commands/publish';
import { DELIVERY_FAILURE } from '../../src/utils/commandErrors';
import {
  at,
  closeTestDatabase,
  countRows,
  createMockContext,
  createTestServices,
  FakeClock,
  initTestDatabase,
  replies,
  type TestServices,
} from '../helpers';

describe('Publish commands', () => {
  let clock: FakeClock;
  let services: TestServices;

  beforeEach(() => {
    const db = initTestDatabase();
    clock = new FakeClock(at('2024-03-13 10:00'));
    services = createTestServices(db, clock);
  });

  afterEach(() => {
    closeTestDatabase();
  });

  describe('/tea', () => {
    it('should publish custom text and report the remaining quota', async () => {
      const handler = createPublishHandler(services.deps, 'custom');
      const { ctx, reply } = createMockContext({ username: 'alice', text: '/tea good morning' });

      await handler(ctx);

      expect(replies(reply)).toEqual(['✅ Sent! 4 posts left today.']);
      expect(services.publisher.posts).toHaveLength(1);
      const [post] = services.publisher.posts;
      expect(post.payload).toEqual({ kind: 'text' });
      expect(post.caption).toMatch(/ Tea\. "good morning"\nby @alice$/);
      expect(countRows('forwards')).toBe(1);
    });

    it('should forward the largest photo size with the caption', async () => {
      const handler = createPublishHandler(services.deps, 'custom');
      const { ctx } = createMockContext({ username: 'alice', text: '/tea', media: 'photo' });

      await handler(ctx);

      const [post] = services.publisher.posts;
      expect(post.payload).toEqual({ kind: 'photo', fileId: 'photo-large' });
      expect(post.caption).toContain(' Tea 📷 ');
      expect(post.caption.endsWith('\nby @alice')).toBe(true);
    });

    it('should forward a video', async () => {
      const handler = createPublishHandler(services.deps, 'custom');
      const { ctx } = createMockContext({ username: 'alice', text: '/tea look', media: 'video' });

      await handler(ctx);

      const [post] = services.publisher.posts;
      expect(post.payload).toEqual({ kind: 'video', fileId: 'video-1' });
      expect(post.caption).toMatch(/ Tea 🎬\. "look"\nby @alice$/);
    });

    it('should credit authors without a handle by name', async () => {
      const handler = createPublishHandler(services.deps, 'custom');
      const { ctx } = createMockContext({ username: null, firstName: '', text: '/tea' });

      await handler(ctx);

      expect(services.publisher.posts[0].caption.endsWith('\nby Anonymous')).toBe(true);
      expect(services.store.usersRanked(at('2024-03-13 04:00'), at('2024-03-14 04:00'))).toEqual([
        { username: 'Anonymous', count: 1 },
      ]);
    });

    it('should explain a cooldown denial without publishing', async () => {
      const handler = createPublishHandler(services.deps, 'custom');

      await handler(createMockContext({ username: 'alice', text: '/tea' }).ctx);
      const { ctx, reply } = createMockContext({ userId: 2, username: 'bob', text: '/tea' });
      await handler(ctx);

      expect(replies(reply)).toEqual(['⏳ Too soon! The next post is possible in 30m 00s.']);
      expect(services.publisher.posts).toHaveLength(1);
      expect(countRows('forwards')).toBe(1);
    });

    it('should explain a ban', async () => {
      services.deps.engine.banUser({
        subjectUserId: 42,
        subjectName: '@alice',
        issuerId: 111111111,
        issuerName: '@admin',
        durationHours: 3,
        reason: 'flood',
      });
      const handler = createPublishHandler(services.deps, 'custom');
      const { ctx, reply } = createMockContext({ userId: 42, username: 'alice', text: '/tea' });

      await handler(ctx);

      expect(replies(reply)).toEqual([
        '🚫 You are banned from publishing for another 3h 00m.\nReason: flood\nIssued by: @admin',
      ]);
      expect(services.publisher.posts).toHaveLength(0);
    });

    it('should report a failed channel post and record nothing', async () => {
      services.publisher.failWith = new Error('403: Forbidden');
      const handler = createPublishHandler(services.deps, 'custom');
      const { ctx, reply } = createMockContext({ username: 'alice', text: '/tea' });

      await handler(ctx);

      expect(replies(reply)).toEqual([DELIVERY_FAILURE]);
      expect(countRows('forwards')).toBe(0);
    });

    it('should not report a delivered post as failed when the confirmation fails', async () => {
      const handler = createPublishHandler(services.deps, 'custom');
      const { ctx, reply } = createMockContext({ username: 'alice', text: '/tea' });
      reply.mockRejectedValueOnce(new Error('400: Bad Request: message to reply not found'));

      await expect(handler(ctx)).rejects.toThrow('message to reply not found');

      expect(replies(reply)).toEqual(['✅ Sent! 4 posts left today.']);
      expect(services.publisher.posts).toHaveLength(1);
      expect(countRows('forwards')).toBe(1);
    });
  });

  describe('/quote', () => {
    it('should use a bundled quote as the custom text', async () => {
      const handler = createPublishHandler(services.deps, 'quote');
      const { ctx, reply } = createMockContext({ username: 'alice', text: '/quote ignored words' });

      await handler(ctx);

      const [post] = services.publisher.posts;
      expect(quotes.some((quote) => post.caption.includes(`. "${quote}"\nby @alice`))).toBe(true);
      expect(post.caption).not.toContain('ignored words');
      expect(replies(reply)).toEqual(['✅ Sent! 4 posts left today.']);
    });
  });
});
