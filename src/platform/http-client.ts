/**
 * Managed Platform HTTP Client
 *
 * fetch-based IndexClient and AgentClient for the hosted agent platform.
 *
 * Requests authenticate with an `x-api-key` header and are bounded by a
 * timeout. Agent runs may answer asynchronously with
 * `{ completed: false, data: "<poll url>" }`; the client then polls that
 * URL until `completed` is true or `maxPolls` is reached.
 */

import { CallShapeError, PlatformError, describeError } from '../errors/index.js';
import { isRecord } from '../utils/guards.js';
import { sleep as defaultSleep } from '../utils/mutex.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { AgentClient, AgentInput, IndexClient, IndexDocument } from './types.js';

/** Statuses meaning the platform rejected the shape of the request */
export const CALL_SHAPE_STATUSES: ReadonlySet<number> = new Set([400, 404, 405, 415, 422]);

/** Poll responses carrying one of these statuses have failed */
const FAILED_STATUSES = new Set(['FAILED', 'ERROR']);

export interface PlatformHttpOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  pollIntervalMs: number;
  maxPolls: number;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
  /** Injected for tests; defaults to a timer */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Transport shared by the index and agent clients.
 */
export class PlatformHttp {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(private readonly options: PlatformHttpOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchFn = options.fetch ?? fetch;
    this.sleepFn = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? silentLogger;
  }

  /** Absolute URL for an API path */
  url(apiPath: string): string {
    return `${this.baseUrl}${apiPath.startsWith('/') ? '' : '/'}${apiPath}`;
  }

  /**
   * Send one request and decode the response body.
   *
   * JSON bodies are parsed; anything else is returned as text.
   *
   * @throws CallShapeError for 400/404/405/415/422
   * @throws PlatformError for other failures, timeouts included
   */
  async request(method: 'GET' | 'POST', url: string, body?: unknown): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          'x-api-key': this.options.apiKey,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      // The body is read under the same deadline as the headers
      text = await response.text();
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.options.timeoutMs}ms`
        : describeError(error);
      throw new PlatformError(
        `${method} ${url} failed: ${reason}`,
        undefined,
        error instanceof Error ? error : undefined
      );
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      const detail = text.trim().slice(0, 300);
      const message = `${method} ${url} returned ${response.status}${detail ? `: ${detail}` : ''}`;
      if (CALL_SHAPE_STATUSES.has(response.status)) {
        throw new CallShapeError(message, response.status);
      }
      throw new PlatformError(message, response.status);
    }

    if (!text) {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      return text;
    }
  }

  /**
   * Follow an asynchronous run to completion.
   *
   * Synchronous responses are returned unchanged.
   */
  async resolveRun(initial: unknown): Promise<unknown> {
    if (!isRecord(initial) || initial['completed'] !== false) {
      return initial;
    }
    const pollUrl = initial['data'];
    if (typeof pollUrl !== 'string') {
      return initial;
    }

    for (let poll = 1; poll <= this.options.maxPolls; poll++) {
      await this.sleepFn(this.options.pollIntervalMs);
      const result = await this.poll(pollUrl);

      if (isRecord(result)) {
        const rawStatus = result['status'];
        const status = typeof rawStatus === 'string' ? rawStatus.toUpperCase() : '';
        if (FAILED_STATUSES.has(status)) {
          const reason = result['error'] ?? result['supplierError'] ?? status;
          throw new PlatformError(`Run failed: ${describeError(reason)}`);
        }
        if (result['completed'] === true) {
          this.logger.debug?.(`Run completed after ${poll} poll(s)`);
          return result;
        }
      }
    }

    throw new PlatformError(`Run did not complete after ${this.options.maxPolls} polls`);
  }

  /**
   * GET a poll URL. The run was already accepted, so a 4xx here is a
   * platform failure, never a call-shape mismatch.
   */
  private async poll(pollUrl: string): Promise<unknown> {
    try {
      return await this.request('GET', pollUrl);
    } catch (error) {
      if (error instanceof CallShapeError) {
        throw new PlatformError(`Polling run failed: ${error.message}`, error.status, error);
      }
      throw error;
    }
  }
}

/**
 * Index hosted on the platform.
 */
export class HttpIndexClient implements IndexClient {
  constructor(
    private readonly http: PlatformHttp,
    readonly indexId: string
  ) {}

  async search(query: string, topK: number): Promise<unknown> {
    const url = this.http.url(`/sdk/indexes/${encodeURIComponent(this.indexId)}/search`);
    return this.http.request('POST', url, { query, top_k: topK });
  }

  /** Batch ingestion; found by `pushText()` under its conventional name */
  async addDocuments(documents: IndexDocument[]): Promise<unknown> {
    const url = this.http.url(`/sdk/indexes/${encodeURIComponent(this.indexId)}/documents`);
    return this.http.request('POST', url, { documents });
  }
}

/**
 * Agent deployed on the platform.
 *
 * The input is sent as the JSON body unchanged, so a bare string and a
 * payload mapping reach the platform as different call shapes.
 */
export class HttpAgentClient implements AgentClient {
  constructor(
    private readonly http: PlatformHttp,
    readonly agentId: string
  ) {}

  async run(input: AgentInput): Promise<unknown> {
    const url = this.http.url(`/sdk/agents/${encodeURIComponent(this.agentId)}/run`);
    const initial = await this.http.request('POST', url, input);
    return this.http.resolveRun(initial);
  }
}
