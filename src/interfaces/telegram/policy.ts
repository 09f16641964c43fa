type TelegramChat = {
  id: number;
  type: string;
};

export type SenderIdentity = {
  chat: TelegramChat;
  fromId?: number | string;
};

export type SenderDenyReason = 'unknown_sender' | 'not_authorized';

export type SenderDecision = {
  allow: boolean;
  reason?: SenderDenyReason;
  userId: number | null;
};

/**
 * Decides whether a sender may use the bot. Injected into the session so the owner check
 * can grow into a capability set without touching the session code.
 */
export type AuthorizationPredicate = (sender: SenderIdentity) => SenderDecision;

export const normalizeTelegramId = (value?: number | string): number | null => {
  if (value === undefined || value === null) {
    return null;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (!/^-?\d+$/.test(value.trim())) {
    return null;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
};

export function allowUserIds(userIds: Iterable<number>): AuthorizationPredicate {
  const allowed = new Set(userIds);

  return (sender) => {
    const userId = normalizeTelegramId(sender.fromId);
    if (userId === null) {
      return { allow: false, reason: 'unknown_sender', userId };
    }
    if (!allowed.has(userId)) {
      return { allow: false, reason: 'not_authorized', userId };
    }
    return { allow: true, userId };
  };
}
