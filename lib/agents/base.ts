/**
 * Base Agent class - Foundation for every pipeline stage
 */

import { Logger, retry, errorMessage } from '../utils';
import { AgentMessage } from '../types';
import { StorageTool } from '../tools/storage';

export interface AgentConfig {
  name: string;
  /** Total attempts for `process`, including the first */
  retries?: number;
}

export abstract class BaseAgent<TInput, TOutput> {
  protected config: Required<AgentConfig>;
  protected storage: StorageTool;

  // API call tracking
  protected apiCallCount = 0;

  // Global API call counter per run
  private static runApiCalls: Map<string, Map<string, number>> = new Map();

  constructor(config: AgentConfig, storage: StorageTool) {
    this.config = {
      retries: 1,
      ...config,
    };
    this.storage = storage;
  }

  get name(): string {
    return this.config.name;
  }

  /**
   * Runs `process` with retries, records timing and errors, and stores the
   * resulting message under runs/<runId>/agents/<name>.json. Errors are rethrown.
   */
  async execute(runId: string, input: TInput): Promise<AgentMessage<TInput, TOutput>> {
    const startTime = Date.now();

    // Reset API call counter for this agent execution
    this.apiCallCount = 0;

    const message: AgentMessage<TInput, TOutput> = {
      agent: this.config.name,
      run_id: runId,
      timestamp: new Date().toISOString(),
      input,
      errors: [],
    };

    try {
      Logger.info(`${this.config.name} starting`, { runId });

      const output = await retry(() => this.process(input, runId), {
        maxRetries: this.config.retries,
        delayMs: 1000,
        backoff: true,
        onError: (error, attempt) => {
          Logger.warn(`${this.config.name} attempt ${attempt} failed`, {
            error: error.message,
          });
        },
      });

      message.output = output;
      message.duration_ms = Date.now() - startTime;
      message.api_calls = this.apiCallCount;

      BaseAgent.trackApiCalls(runId, this.config.name, this.apiCallCount);

      Logger.info(`${this.config.name} completed`, {
        runId,
        api_calls: this.apiCallCount,
        duration_ms: message.duration_ms,
      });

      await this.storeMessage(message);
      return message;
    } catch (error) {
      message.errors.push(errorMessage(error));
      message.duration_ms = Date.now() - startTime;
      message.api_calls = this.apiCallCount;

      Logger.error(`${this.config.name} failed`, {
        runId,
        error: errorMessage(error),
        duration_ms: message.duration_ms,
      });

      await this.storeMessage(message);
      throw error;
    }
  }

  protected abstract process(input: TInput, runId: string): Promise<TOutput>;

  private static trackApiCalls(runId: string, agentName: string, count: number): void {
    const calls = this.runApiCalls.get(runId) ?? new Map<string, number>();
    calls.set(agentName, count);
    this.runApiCalls.set(runId, calls);
  }

  static getApiCalls(runId: string): Record<string, number> {
    const result: Record<string, number> = {};
    this.runApiCalls.get(runId)?.forEach((count, agent) => {
      result[agent] = count;
    });
    return result;
  }

  static clearApiCalls(runId: string): void {
    this.runApiCalls.delete(runId);
  }

  /**
   * Snapshot writes other than the ledger never fail a stage
   */
  protected async writeSnapshot(path: string, data: Buffer | string, contentType = 'application/json'): Promise<string | null> {
    try {
      return await this.storage.put(path, data, contentType);
    } catch (error) {
      Logger.warn('Failed to write snapshot', {
        agent: this.config.name,
        path,
        error: errorMessage(error),
      });
      return null;
    }
  }

  private async storeMessage(message: AgentMessage<TInput, TOutput>): Promise<void> {
    const path = `runs/${message.run_id}/agents/${message.agent}.json`;
    await this.writeSnapshot(path, JSON.stringify(message, null, 2));
  }
}
