/**
 * Memory Module
 *
 * Per-session conversation transcripts.
 */

export { SessionMemory } from './session-store.js';
export { sessionKeyFor, TurnSchema, TranscriptSchema } from './types.js';
export type { Turn, TurnRole, SessionOrigin, SessionMemoryOptions } from './types.js';
