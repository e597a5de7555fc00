/**
 * Policy Navigator - Library Entry Point
 *
 * The CLI (`pnav`) covers everyday use. Chat front-ends embed the
 * navigator directly:
 *
 * ```typescript
 * import { createNavigator, sessionKeyFor } from 'policy-navigator';
 *
 * const navigator = createNavigator();
 * const session = sessionKeyFor({ kind: 'dm', userId: '42' });
 *
 * await navigator.ingestUrl('https://www.federalregister.gov/d/2022-05471', session);
 * const reply = await navigator.answer('Summarize the document I just added', session);
 * await navigator.memory.clear(session);
 * ```
 *
 * @packageDocumentation
 */

export { createNavigator, type Navigator, type NavigatorOptions } from './navigator.js';

export type { GlobalOptions, CommandContext } from './cli/types.js';

export {
  loadConfig,
  resolveRuntimeConfig,
  getStoragePaths,
  DEFAULT_CONFIG,
  type Config,
  type StoragePaths,
} from './config/index.js';

export {
  AnswerPipeline,
  AgentInvoker,
  CALLING_CONVENTIONS,
  formatOutput,
  splitSources,
  appendSources,
  buildContext,
  type BuiltContext,
  type CallingConvention,
} from './agent/index.js';

export { IngestService, RecencyCache } from './ingest/index.js';
export { SessionMemory, sessionKeyFor, type Turn, type SessionOrigin } from './memory/index.js';
export {
  PlatformHandles,
  createHttpHandles,
  pushText,
  type IndexClient,
  type AgentClient,
  type AgentInput,
} from './platform/index.js';
export { resultsFromSearch, createSourcePolicy, type SourcePolicy } from './search/index.js';

export {
  CLIError,
  ConfigError,
  PlatformError,
  CallShapeError,
  AgentInvocationError,
  IngestionError,
} from './errors/index.js';
export { consoleLogger, silentLogger, type Logger } from './utils/index.js';
