import { describe, expect, it } from 'vitest';

import { allowUserIds, normalizeTelegramId } from './policy.js';

describe('sender authorization', () => {
  const authorize = allowUserIds([456]);

  it('allows the configured user', () => {
    expect(authorize({ chat: { id: 456, type: 'private' }, fromId: 456 })).toEqual({
      allow: true,
      userId: 456,
    });
  });

  it('accepts string ids from the transport', () => {
    expect(authorize({ chat: { id: 1, type: 'private' }, fromId: '456' }).allow).toBe(true);
  });

  it('denies other users', () => {
    expect(authorize({ chat: { id: 123, type: 'private' }, fromId: 123 })).toEqual({
      allow: false,
      reason: 'not_authorized',
      userId: 123,
    });
  });

  it('denies messages without a sender', () => {
    expect(authorize({ chat: { id: -100, type: 'channel' } })).toEqual({
      allow: false,
      reason: 'unknown_sender',
      userId: null,
    });
  });

  it('supports several users', () => {
    const both = allowUserIds([1, 2]);
    expect(both({ chat: { id: 2, type: 'private' }, fromId: 2 }).allow).toBe(true);
    expect(both({ chat: { id: 3, type: 'private' }, fromId: 3 }).allow).toBe(false);
  });
});

describe('normalizeTelegramId', () => {
  it('parses integers and rejects everything else', () => {
    expect(normalizeTelegramId(42)).toBe(42);
    expect(normalizeTelegramId(' -17 ')).toBe(-17);
    expect(normalizeTelegramId('12abc')).toBeNull();
    expect(normalizeTelegramId(Number.NaN)).toBeNull();
    expect(normalizeTelegramId(undefined)).toBeNull();
  });
});
