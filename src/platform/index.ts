/**
 * Platform Module
 *
 * Clients for the managed index and agent.
 */

export {
  PlatformHttp,
  HttpIndexClient,
  HttpAgentClient,
  CALL_SHAPE_STATUSES,
} from './http-client.js';
export type { PlatformHttpOptions } from './http-client.js';
export { PlatformHandles, createHttpHandles } from './handles.js';
export type { PlatformFactories } from './handles.js';
export { pushText, INGESTION_CONVENTIONS } from './ingestion.js';
export type { AgentClient, AgentInput, IndexClient, IndexDocument } from './types.js';
