/**
 * Platform Collaborator Types
 *
 * The managed platform hosts the document index and the deployed agent.
 * Both are consumed through these narrow interfaces so the pipeline can
 * run against the HTTP client or an in-process fake.
 */

/**
 * Argument accepted by an agent run: a bare query string or a payload
 * mapping. Which one a given agent accepts is discovered at call time.
 */
export type AgentInput = string | Record<string, unknown>;

/**
 * Document similarity search.
 *
 * The response shape varies by index type; see `resultsFromSearch()`.
 * Ingestion methods are optional and probed by `pushText()`.
 */
export interface IndexClient {
  search(query: string, topK: number): Promise<unknown>;
}

/**
 * Deployed conversational agent.
 */
export interface AgentClient {
  run(input: AgentInput): Promise<unknown>;
}

/**
 * Document pushed into the index.
 */
export interface IndexDocument {
  text: string;
  metadata: Record<string, unknown>;
}
