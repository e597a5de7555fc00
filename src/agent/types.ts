/**
 * Answer Pipeline Types
 *
 * Shapes passed between context assembly, backfill, agent invocation and
 * response normalization.
 */

import type { SearchResult, SourcePolicy } from '../search/types.js';
import type { AgentInput } from '../platform/types.js';

// ============================================================================
// CONTEXT
// ============================================================================

/**
 * Retrieved material ready to hand to the agent.
 */
export interface BuiltContext {
  /** Passages joined with separators, never longer than the cap */
  context: string;

  /** Public sources, de-duplicated in first-seen order */
  sources: string[];

  /** Interpreted entries, in result order */
  results: SearchResult[];
}

/**
 * Options for buildContext().
 */
export interface ContextOptions {
  /** Hard character cap on the joined context */
  cap: number;

  /** Decides which sources may be cited */
  policy: SourcePolicy;
}

// ============================================================================
// RECENT DOCUMENTS
// ============================================================================

/**
 * A file the user ingested in this process.
 */
export interface RecentAsset {
  /** Absolute path of the stored copy */
  path: string;

  /** Base name of the stored copy */
  filename: string;

  /** URL or upload name the file came from */
  sourceHint: string;
}

/**
 * Text of the most recently ingested document, ready for the context.
 */
export interface RecentDocument extends RecentAsset {
  text: string;
}

// ============================================================================
// AGENT INVOCATION
// ============================================================================

/**
 * What the pipeline asks of the agent.
 */
export interface InvokeRequest {
  query: string;
  context?: string;
  sessionId?: string;
}

/**
 * One way of shaping the agent's input.
 *
 * The agent's accepted signature is discovered at call time by trying
 * conventions in order.
 */
export interface CallingConvention {
  /** Label used in logs and AgentInvocationError.attempted */
  name: string;

  /** Build the agent input for a request */
  buildInput: (request: InvokeRequest) => AgentInput;

  /** Whether a response counts as an answer */
  accepts: (response: unknown) => boolean;
}

/**
 * Options for AgentInvoker.
 */
export interface AgentInvokerOptions {
  /** Attempts per convention on transient errors (default: 3) */
  maxRetries?: number;

  /** Linear backoff step in ms (default: 500) */
  backoffMs?: number;

  /** Conventions to try, in order (default: CALLING_CONVENTIONS) */
  conventions?: readonly CallingConvention[];

  /** Classifies transient errors */
  isTransientError?: (message: string) => boolean;

  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}
