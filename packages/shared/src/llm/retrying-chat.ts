/**
 * Retry wrapper for chat completion.
 *
 * Exponential backoff: attempt n waits backoffBaseMs * 2^(n-1) before the
 * next attempt. Configuration errors are not retried.
 */

import { config as defaultConfig } from '../config';
import { logger } from '../logger';
import { ConfigurationError, errorMessage } from '../errors';
import type { ChatMessage } from '../templates/types';
import type { ChatCompleter, ChatCompletionOptions } from './types';

export interface RetryPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, backoffBaseMs: number): number {
  return backoffBaseMs * 2 ** (attempt - 1);
}

export class RetryingChatCompleter implements ChatCompleter {
  private readonly policy: RetryPolicy;

  constructor(
    private readonly inner: ChatCompleter,
    policy: Partial<RetryPolicy> = {},
    private readonly sleep: Sleep = defaultSleep
  ) {
    this.policy = {
      maxAttempts: Math.max(1, policy.maxAttempts ?? defaultConfig.maxAttempts),
      backoffBaseMs: policy.backoffBaseMs ?? defaultConfig.backoffBaseMs,
    };
  }

  get model(): string {
    return this.inner.model;
  }

  async complete(messages: ChatMessage[], options?: ChatCompletionOptions): Promise<string> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt++) {
      try {
        return await this.inner.complete(messages, options);
      } catch (error) {
        if (error instanceof ConfigurationError) {
          throw error;
        }
        lastError = error;
        if (attempt < this.policy.maxAttempts) {
          const delay = backoffDelay(attempt, this.policy.backoffBaseMs);
          logger.warn('Chat completion failed, retrying', {
            attempt,
            maxAttempts: this.policy.maxAttempts,
            delayMs: delay,
            error: errorMessage(error),
          });
          await this.sleep(delay);
        }
      }
    }

    throw lastError;
  }
}
