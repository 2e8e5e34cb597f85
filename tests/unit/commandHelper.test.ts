import { describe, it, expect } from 'vitest';
import type { Message } from 'telegraf/types';
import {
  getCommandArgs,
  getCustomText,
  getPayload,
  getReplyTarget,
  parseCommand,
} from '../../src/utils/commandHelper';
import { createMockContext, type MockContextOptions } from '../helpers';

const messageOf = (options: MockContextOptions): Message => {
  const { message } = createMockContext(options).ctx;
  if (!message) {
    throw new Error('mock context has no message');
  }
  return message;
};

describe('Command helpers', () => {
  describe('parseCommand', () => {
    it('should split the command name, words and rest', () => {
      expect(parseCommand(messageOf({ text: '/ban  24   spamming links ' }))).toEqual({
        name: 'ban',
        botUsername: null,
        args: ['24', 'spamming', 'links'],
        rest: '24   spamming links',
      });
    });

    it('should split off the bot name and lowercase the command', () => {
      expect(parseCommand(messageOf({ text: '/Stats@channel_gate_bot month' }))).toEqual({
        name: 'stats',
        botUsername: 'channel_gate_bot',
        args: ['month'],
        rest: 'month',
      });
    });

    it('should read the caption of media messages', () => {
      expect(parseCommand(messageOf({ text: '/tea sunrise', media: 'video' }))?.rest).toBe('sunrise');
    });

    it('should return null for plain text and captionless media', () => {
      expect(parseCommand(messageOf({ text: 'good morning' }))).toBeNull();
      expect(parseCommand(messageOf({ media: 'video_note' }))).toBeNull();
    });
  });

  it('should expose arguments and custom text from the context', () => {
    const { ctx } = createMockContext({ text: '/tea  milk oolong ' });
    expect(getCommandArgs(ctx)).toEqual(['milk', 'oolong']);
    expect(getCustomText(ctx)).toBe('milk oolong');

    const bare = createMockContext({ text: '/tea' }).ctx;
    expect(getCommandArgs(bare)).toEqual([]);
    expect(getCustomText(bare)).toBeUndefined();
  });

  it('should identify the author of the replied-to message', () => {
    const { ctx } = createMockContext({
      text: '/ban 1',
      replyTo: { id: 42, username: null, firstName: 'Mal', lastName: 'Lory' },
    });
    expect(getReplyTarget(ctx)).toEqual({
      id: 42,
      username: undefined,
      firstName: 'Mal',
      lastName: 'Lory',
    });

    expect(getReplyTarget(createMockContext({ text: '/ban 1' }).ctx)).toBeNull();
  });

  describe('getPayload', () => {
    it('should detect each message kind', () => {
      expect(getPayload(messageOf({ text: '/tea' }))).toEqual({ kind: 'text' });
      expect(getPayload(messageOf({ media: 'photo' }))).toEqual({
        kind: 'photo',
        fileId: 'photo-large',
      });
      expect(getPayload(messageOf({ media: 'video' }))).toEqual({ kind: 'video', fileId: 'video-1' });
      expect(getPayload(messageOf({ media: 'video_note' }))).toEqual({
        kind: 'video_note',
        fileId: 'note-1',
      });
    });
  });
});
