/**
 * Agent Module
 *
 * Everything between a user's question and the answer text: context
 * assembly, backfill, the serialized agent invoker, response
 * normalization and the pipeline that strings them together.
 *
 * @example
 * ```typescript
 * import { AgentInvoker, AnswerPipeline } from './agent/index.js';
 *
 * const invoker = new AgentInvoker(() => handles.agent(), { maxRetries: 3 });
 * const pipeline = new AnswerPipeline({ handles, invoker, memory, recency, policy, config, documentFolders });
 * console.log(await pipeline.answer('Is EO 14067 still in effect?', 'dm:42'));
 * ```
 */

export type {
  BuiltContext,
  ContextOptions,
  RecentAsset,
  RecentDocument,
  InvokeRequest,
  CallingConvention,
  AgentInvokerOptions,
} from './types.js';

export {
  PASSAGE_SEPARATOR,
  TEXT_FIELDS,
  SOURCE_FIELDS,
  truncate,
  dedupe,
  entryText,
  entrySource,
  joinPassages,
  buildContext,
  emptyContext,
} from './context-builder.js';

export { INSTRUCTION_HEADER, composeInlineBlock, composeAgentQuery, type InlineBlockParts } from './prompts.js';

export {
  backfillContext,
  preferLonger,
  historyHintQuery,
  type BackfillOptions,
  type BackfillDeps,
} from './backfill.js';

export { findRecentDocument, type RecentDocumentDeps } from './recent-document.js';

export { AgentInvoker, CALLING_CONVENTIONS } from './invoker.js';

export {
  formatOutput,
  hasValidOutput,
  toPlain,
  parseEmbeddedJson,
  literalToJson,
  renderThemes,
  renderExecutiveOrder,
  isExecutiveOrderRecord,
  flattenFields,
  OUTPUT_FIELDS,
} from './response-normalizer.js';

export { splitSources, appendSources, publicSources, SOURCES_HEADING, type SplitAnswer } from './citations.js';

export {
  AnswerPipeline,
  diagnosticAnswer,
  recentFirstContext,
  recentAppendedContext,
  NO_ANSWER_MESSAGE,
  DIAGNOSTIC_PREVIEW_CHARS,
  type AnswerPipelineDeps,
} from './pipeline.js';
