/**
 * Index Ingestion
 *
 * Index clients differ in how they accept new documents. `pushText()`
 * probes the conventional method names in order and uses the first one
 * that accepts the document.
 */

import { IngestionError, describeError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { IndexDocument } from './types.js';

type Invoke = (...args: unknown[]) => Promise<unknown>;

interface IngestionConvention {
  method: string;
  payload: (doc: IndexDocument) => unknown;
}

const single = (doc: IndexDocument): unknown => doc;
const batch = (doc: IndexDocument): unknown => [doc];

/** Probed in order */
export const INGESTION_CONVENTIONS: readonly IngestionConvention[] = [
  { method: 'addDocument', payload: single },
  { method: 'add_document', payload: single },
  { method: 'upsert', payload: single },
  { method: 'add', payload: single },
  { method: 'addDocuments', payload: batch },
  { method: 'add_documents', payload: batch },
  { method: 'upsertMany', payload: batch },
];

/**
 * Bound method of `target` named `name`, or undefined.
 */
function methodOf(target: object, name: string): Invoke | undefined {
  const candidate: unknown = Reflect.get(target, name);
  if (typeof candidate !== 'function') {
    return undefined;
  }
  return async (...args: unknown[]) => {
    const result: unknown = await Reflect.apply(candidate, target, args);
    return result;
  };
}

/**
 * Push one text document into an index.
 *
 * A method that throws a TypeError is retried once with positional
 * `(text, metadata)` arguments before the next method is tried.
 *
 * @returns Whatever the accepting method returned
 * @throws IngestionError when no method accepts the document
 */
export async function pushText(
  index: object,
  text: string,
  metadata: Record<string, unknown>,
  logger: Logger = silentLogger
): Promise<unknown> {
  const doc: IndexDocument = { text, metadata };
  let lastError: unknown;

  for (const convention of INGESTION_CONVENTIONS) {
    const invoke = methodOf(index, convention.method);
    if (!invoke) {
      continue;
    }

    try {
      return await invoke(convention.payload(doc));
    } catch (error) {
      lastError = error;
      if (error instanceof TypeError) {
        try {
          return await invoke(text, metadata);
        } catch (positionalError) {
          lastError = positionalError;
        }
      }
      logger.debug?.(`${convention.method} rejected document: ${describeError(lastError)}`);
    }
  }

  if (lastError === undefined) {
    throw new IngestionError('Index client has no known ingestion method for plain text');
  }
  throw new IngestionError(
    `Index ingestion failed: ${describeError(lastError)}`,
    lastError instanceof Error ? lastError : undefined
  );
}
