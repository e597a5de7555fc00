/**
 * Platform Handles
 *
 * Process-wide index and agent clients, each constructed once on first
 * use. Threaded through the pipeline instead of living in module state.
 */

import { OnceCell } from '../utils/mutex.js';
import { APIKeyError, ConfigError } from '../errors/index.js';
import type { PlatformConfig } from '../config/schema.js';
import type { Logger } from '../utils/logger.js';
import { HttpAgentClient, HttpIndexClient, PlatformHttp } from './http-client.js';
import type { AgentClient, IndexClient } from './types.js';

export interface PlatformFactories {
  index: () => Promise<IndexClient> | IndexClient;
  agent: () => Promise<AgentClient> | AgentClient;
}

/**
 * Lazily initialized index and agent clients.
 *
 * @example
 * ```typescript
 * const handles = new PlatformHandles({
 *   index: () => new FakeIndex(),
 *   agent: () => new FakeAgent(),
 * });
 * const index = await handles.index();
 * ```
 */
export class PlatformHandles {
  private readonly indexCell: OnceCell<IndexClient>;
  private readonly agentCell: OnceCell<AgentClient>;

  constructor(factories: PlatformFactories) {
    this.indexCell = new OnceCell(factories.index);
    this.agentCell = new OnceCell(factories.agent);
  }

  index(): Promise<IndexClient> {
    return this.indexCell.get();
  }

  agent(): Promise<AgentClient> {
    return this.agentCell.get();
  }
}

/**
 * Handles backed by the platform HTTP API.
 *
 * Missing credentials or identifiers surface on first use, so commands
 * that never touch the index or agent still run.
 */
export function createHttpHandles(
  config: PlatformConfig,
  apiKey: string | undefined,
  logger?: Logger,
  fetchFn?: typeof fetch
): PlatformHandles {
  const transport = new OnceCell<PlatformHttp>(() => {
    if (!apiKey) {
      throw new APIKeyError('PLATFORM_API_KEY');
    }
    return new PlatformHttp({
      baseUrl: config.base_url,
      apiKey,
      timeoutMs: config.timeout_ms,
      pollIntervalMs: config.poll_interval_ms,
      maxPolls: config.max_polls,
      fetch: fetchFn,
      logger,
    });
  });

  return new PlatformHandles({
    index: async () => {
      const indexId = config.index_id;
      if (!indexId) {
        throw new ConfigError('No index configured', 'Set INDEX_ID or platform.index_id');
      }
      logger?.info?.(`Loading index: ${indexId}`);
      return new HttpIndexClient(await transport.get(), indexId);
    },
    agent: async () => {
      const agentId = config.agent_id;
      if (!agentId) {
        throw new ConfigError('No agent configured', 'Set AGENT_ID or platform.agent_id');
      }
      logger?.info?.(`Loading agent: ${agentId}`);
      return new HttpAgentClient(await transport.get(), agentId);
    },
  });
}
