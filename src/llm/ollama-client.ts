/**
 * Ollama Client
 *
 * ARCHITECTURE: Direct ollama-js wrapper behind the LlmProvider interface
 * Pattern: Prompt in, text out, failures as Result values - never throws
 *
 * Each call is bounded by a timeout and retried once when the failure looks
 * transient (timeout, refused/reset connection, 5xx from the server).
 */

import { Ollama } from 'ollama';
import type { LlmError, Result } from '../types/index.js';
import { Ok, Err, errorMessage } from '../types/index.js';
import { createDebugLog } from '../logging.js';

const log = createDebugLog('ollama-client');

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';
export const DEFAULT_OLLAMA_MODEL = 'llama3.2';
export const DEFAULT_LLM_TIMEOUT_MS = 60_000;
const DEFAULT_RETRIES = 1;

// ============================================================================
// Types
// ============================================================================

/**
 * Text generation boundary used by the fallback extractor
 */
export interface LlmProvider {
  readonly name: string;
  generate(prompt: string): Promise<Result<string, LlmError>>;
}

/**
 * The slice of the ollama client this module calls
 */
export interface GenerateClient {
  generate(request: {
    model: string;
    prompt: string;
    stream: false;
    format?: string;
    options?: { temperature?: number };
  }): Promise<{ response: string; eval_count?: number; total_duration?: number }>;
}

export interface OllamaProviderConfig {
  readonly host: string;
  readonly model: string;
  readonly timeoutMs?: number;
  readonly retries?: number;
}

// ============================================================================
// Error Classification
// ============================================================================

class TimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Ollama request timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status_code' in error && typeof error.status_code === 'number') {
    return error.status_code;
  }
  return undefined;
}

export function classifyLlmError(error: unknown): LlmError {
  const message = errorMessage(error);
  if (error instanceof TimeoutError) return { type: 'timeout', message };

  const status = statusCodeOf(error);
  if (status !== undefined) return { type: 'server_error', message, status };

  if (/ECONNREFUSED|ECONNRESET|fetch failed|socket hang up|network/i.test(message)) {
    return { type: 'connection_failed', message };
  }
  return { type: 'unknown', message };
}

export function isTransient(error: LlmError): boolean {
  switch (error.type) {
    case 'timeout':
    case 'connection_failed':
      return true;
    case 'server_error':
      return error.status === undefined || error.status >= 500;
    default:
      return false;
  }
}

// ============================================================================
// Timeout
// ============================================================================

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

// ============================================================================
// Provider Factory
// ============================================================================

/**
 * Create the default provider
 *
 * ARCHITECTURE: Factory function for dependency injection; tests pass their
 * own GenerateClient
 */
export function createOllamaProvider(
  config: OllamaProviderConfig,
  client: GenerateClient = new Ollama({ host: config.host })
): LlmProvider {
  const timeoutMs = config.timeoutMs ?? DEFAULT_LLM_TIMEOUT_MS;
  const retries = config.retries ?? DEFAULT_RETRIES;
  log('Creating Ollama provider', { host: config.host, model: config.model, timeoutMs });

  async function attempt(prompt: string): Promise<Result<string, LlmError>> {
    try {
      const response = await withTimeout(
        client.generate({
          model: config.model,
          prompt,
          stream: false,
          format: 'json',
          options: { temperature: 0.1 },
        }),
        timeoutMs
      );

      log('Generation completed', {
        response_length: response.response.length,
        eval_count: response.eval_count,
        total_duration_ms: response.total_duration ? Math.round(response.total_duration / 1_000_000) : undefined,
      });

      if (response.response.trim().length === 0) {
        return Err({ type: 'empty_response', message: 'Empty response from Ollama' });
      }
      return Ok(response.response);
    } catch (error) {
      const classified = classifyLlmError(error);
      log('Generation failed', { type: classified.type, error: classified.message });
      return Err(classified);
    }
  }

  return {
    name: `ollama:${config.model}`,
    async generate(prompt: string): Promise<Result<string, LlmError>> {
      log('Starting generation', { model: config.model, prompt_length: prompt.length });
      let result = await attempt(prompt);
      for (let retry = 0; retry < retries && !result.ok && isTransient(result.error); retry++) {
        log('Retrying after transient failure', { type: result.error.type });
        result = await attempt(prompt);
      }
      return result;
    },
  };
}
