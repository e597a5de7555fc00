/**
 * Conversation Memory Types
 */

import { z } from 'zod';

export const TurnRoleSchema = z.enum(['user', 'assistant', 'system']);

/**
 * One role-tagged message. `t` is epoch seconds with a fractional part.
 */
export const TurnSchema = z.object({
  t: z.number(),
  role: TurnRoleSchema,
  content: z.string(),
});

/** Session file contents */
export const TranscriptSchema = z.array(TurnSchema);

export type TurnRole = z.infer<typeof TurnRoleSchema>;
export type Turn = z.infer<typeof TurnSchema>;

/**
 * Where a conversation happens on the chat surface.
 */
export type SessionOrigin =
  | { kind: 'dm'; userId: string }
  | { kind: 'channel'; guildId: string; channelId: string };

/**
 * Derive the session key for a conversation.
 *
 * @example
 * ```typescript
 * sessionKeyFor({ kind: 'dm', userId: '42' });                        // 'dm:42'
 * sessionKeyFor({ kind: 'channel', guildId: '7', channelId: '9' });   // 'channel:7|9'
 * ```
 */
export function sessionKeyFor(origin: SessionOrigin): string {
  switch (origin.kind) {
    case 'dm':
      return `dm:${origin.userId}`;
    case 'channel':
      return `channel:${origin.guildId}|${origin.channelId}`;
  }
}

/**
 * Options for SessionMemory.
 */
export interface SessionMemoryOptions {
  /** Exchanges kept per session; the transcript holds twice as many turns (default: 10) */
  maxTurns?: number;
  /** Characters returned by buildHistoryText (default: 2000) */
  maxHistoryChars?: number;
  /** Attempts when a session file cannot be read or parsed (default: 3) */
  readAttempts?: number;
  /** Pause between read attempts in ms (default: 50) */
  readRetryDelayMs?: number;
  /** Clock returning epoch milliseconds (default: Date.now) */
  now?: () => number;
}
