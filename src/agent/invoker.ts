/**
 * Agent Invoker
 *
 * Owns the single lock every agent call goes through and discovers, per
 * call, which input shape the deployed agent accepts.
 */

import { AgentInvocationError, CallShapeError, describeError } from '../errors/index.js';
import type { AgentClient } from '../platform/types.js';
import { Mutex, sleep as defaultSleep } from '../utils/mutex.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { hasValidOutput } from './response-normalizer.js';
import type { AgentInvokerOptions, CallingConvention, InvokeRequest } from './types.js';

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BACKOFF_MS = 500;

/**
 * Input shapes tried in order until one yields an answer.
 */
export const CALLING_CONVENTIONS: readonly CallingConvention[] = [
  {
    name: 'query+context+session',
    buildInput: ({ query, context, sessionId }) =>
      sessionId === undefined
        ? { query, context: context ?? '' }
        : { query, context: context ?? '', sessionId },
    accepts: hasValidOutput,
  },
  {
    name: 'bare string',
    buildInput: ({ query }) => query,
    accepts: hasValidOutput,
  },
  {
    name: 'query',
    buildInput: ({ query }) => ({ query }),
    accepts: hasValidOutput,
  },
  {
    name: 'query+context',
    buildInput: ({ query, context }) => ({ query, context: context ?? '' }),
    accepts: hasValidOutput,
  },
];

/**
 * Errors meaning "the agent does not take this input shape".
 *
 * In-process clients report a wrong shape as a TypeError.
 */
function isShapeMismatch(error: unknown): boolean {
  return error instanceof CallShapeError || error instanceof TypeError;
}

/**
 * Serialized, convention-probing access to the agent.
 *
 * @example
 * ```typescript
 * const invoker = new AgentInvoker(() => handles.agent(), { maxRetries: 3 });
 * const response = await invoker.invoke({ query, context, sessionId });
 * ```
 */
export class AgentInvoker {
  private readonly lock = new Mutex();
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly conventions: readonly CallingConvention[];
  private readonly isTransientError: (message: string) => boolean;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly getAgent: () => Promise<AgentClient>,
    options: AgentInvokerOptions = {},
    private readonly logger: Logger = silentLogger
  ) {
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
    this.conventions = options.conventions ?? CALLING_CONVENTIONS;
    this.isTransientError = options.isTransientError ?? (() => false);
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Ask the agent, trying each calling convention in turn.
   *
   * Returns the first response that carries an answer, or the last
   * empty response when none did.
   *
   * @throws AgentInvocationError when every convention was rejected, or
   *   on a non-transient failure
   */
  async invoke(request: InvokeRequest): Promise<unknown> {
    return this.lock.runExclusive(async () => {
      const agent = await this.getAgent();
      const attempted: string[] = [];
      let answered = false;
      let lastResponse: unknown;
      let lastMismatch: unknown;

      for (const convention of this.conventions) {
        attempted.push(convention.name);

        let response: unknown;
        try {
          response = await this.runWithRetry(agent, convention, request);
        } catch (error) {
          if (isShapeMismatch(error)) {
            this.logger.debug?.(`Agent rejected ${convention.name}: ${describeError(error)}`);
            lastMismatch = error;
            continue;
          }
          throw new AgentInvocationError(
            `Agent call failed: ${describeError(error)}`,
            attempted,
            error instanceof Error ? error : undefined
          );
        }

        if (convention.accepts(response)) {
          return response;
        }
        this.logger.debug?.(`Agent returned no output for ${convention.name}`);
        answered = true;
        lastResponse = response;
      }

      if (answered) {
        return lastResponse;
      }
      const reason = lastMismatch === undefined ? '' : `: ${describeError(lastMismatch)}`;
      throw new AgentInvocationError(
        `Agent rejected every calling convention${reason}`,
        attempted,
        lastMismatch instanceof Error ? lastMismatch : undefined
      );
    });
  }

  /** Whether a call is in flight or queued */
  isBusy(): boolean {
    return this.lock.isLocked();
  }

  private async runWithRetry(
    agent: AgentClient,
    convention: CallingConvention,
    request: InvokeRequest
  ): Promise<unknown> {
    const input = convention.buildInput(request);

    for (let attempt = 1; ; attempt++) {
      try {
        return await agent.run(input);
      } catch (error) {
        if (isShapeMismatch(error)) {
          throw error;
        }
        const message = describeError(error);
        if (attempt >= this.maxRetries || !this.isTransientError(message)) {
          throw error;
        }
        this.logger.warn(
          `Agent busy (${message}); retry ${attempt}/${this.maxRetries - 1} in ${this.backoffMs * attempt}ms`
        );
        await this.sleep(this.backoffMs * attempt);
      }
    }
  }
}
