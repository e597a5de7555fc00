/**
 * In-process stand-ins for the platform clients.
 */

import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { Config } from '../config/schema.js';
import type { AgentClient, AgentInput, IndexClient, IndexDocument } from '../platform/types.js';

/**
 * Keyword index: returns stored documents sharing a word of four or more
 * letters with the query.
 */
export class KeywordIndex implements IndexClient {
  readonly documents: IndexDocument[] = [];

  async addDocument(doc: IndexDocument): Promise<void> {
    this.documents.push(doc);
  }

  async search(query: string, topK: number): Promise<unknown> {
    const words = new Set(query.toLowerCase().split(/\W+/).filter((w) => w.length > 3));
    const hits = this.documents.filter((doc) =>
      doc.text.toLowerCase().split(/\W+/).some((w) => words.has(w))
    );
    return { details: hits.slice(0, topK).map((doc) => ({ data: doc.text, metadata: doc.metadata })) };
  }
}

/**
 * Agent that records its inputs and answers through `reply`.
 */
export class ScriptedAgent implements AgentClient {
  readonly inputs: AgentInput[] = [];

  constructor(private readonly reply: (input: AgentInput) => unknown) {}

  async run(input: AgentInput): Promise<unknown> {
    this.inputs.push(input);
    return this.reply(input);
  }
}

/**
 * Default configuration with storage under `dataDir`.
 */
export function testConfig(dataDir: string): Config {
  const config = structuredClone(DEFAULT_CONFIG);
  config.storage.data_dir = dataDir;
  return config;
}
