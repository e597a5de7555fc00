import { Option } from 'commander';
import { sessionKeyFor } from '../memory/types.js';
import { createNavigator, type Navigator } from '../navigator.js';
import type { CommandContext } from './types.js';

/** Session used when a command is run without --session */
export const DEFAULT_SESSION = sessionKeyFor({ kind: 'dm', userId: 'local' });

export interface SessionOptions {
  session: string;
}

/**
 * The `-s, --session <id>` option shared by conversational commands.
 */
export function sessionOption(): Option {
  return new Option('-s, --session <id>', 'Conversation to use').default(DEFAULT_SESSION);
}

/**
 * Builds the navigator a command works against. Tests pass their own.
 */
export type NavigatorFactory = (ctx: CommandContext) => Navigator;

export const openNavigator: NavigatorFactory = (ctx) => createNavigator({ logger: ctx });
