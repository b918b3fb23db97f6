/**
 * Global Path and Configuration Utilities
 *
 * ARCHITECTURE: Centralized path management
 * Pattern: All paths computed from well-known locations, no hardcoded paths elsewhere
 *
 * Global structure (~/.cityvotes/):
 *   config.json              - Global configuration
 *   extraction-memory.json   - Learning memory
 *   journal/                 - Memory deltas awaiting merge
 *     applied/               - Deltas already merged
 *     failed/                - Unreadable deltas
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { promises as fs } from 'node:fs';
import type { ConfigError, GlobalConfig, Result } from './types/index.js';
import { Ok, Err, errorMessage, isNotFoundError } from './types/index.js';
import { globalConfigSchema } from './schemas.js';
import { DEFAULT_LLM_TIMEOUT_MS, DEFAULT_OLLAMA_HOST, DEFAULT_OLLAMA_MODEL } from './llm/ollama-client.js';
import { DEFAULT_QUALITY_THRESHOLD } from './pipeline/quality.js';

// ============================================================================
// Global Paths
// ============================================================================

const GLOBAL_DIR_NAME = '.cityvotes';
const CONFIG_FILE = 'config.json';
const MEMORY_FILE = 'extraction-memory.json';
const JOURNAL_DIR = 'journal';

/**
 * Get the global directory (~/.cityvotes/)
 */
export function getGlobalDir(): string {
  return process.env['CITYVOTES_HOME'] ?? join(homedir(), GLOBAL_DIR_NAME);
}

export function getGlobalConfigPath(): string {
  return join(getGlobalDir(), CONFIG_FILE);
}

export function getMemoryPath(): string {
  return join(getGlobalDir(), MEMORY_FILE);
}

export function getJournalDir(): string {
  return join(getGlobalDir(), JOURNAL_DIR);
}

// ============================================================================
// Global Configuration
// ============================================================================

export const DEFAULT_GLOBAL_CONFIG: GlobalConfig = {
  ollama_host: DEFAULT_OLLAMA_HOST,
  ollama_model: DEFAULT_OLLAMA_MODEL,
  llm_timeout_ms: DEFAULT_LLM_TIMEOUT_MS,
  quality_threshold: DEFAULT_QUALITY_THRESHOLD,
  batch_concurrency: 4,
};

function withEnvOverrides(config: GlobalConfig): GlobalConfig {
  return {
    ...config,
    ollama_host: process.env['OLLAMA_HOST'] ?? config.ollama_host,
    ollama_model: process.env['OLLAMA_MODEL'] ?? config.ollama_model,
  };
}

/**
 * Read global configuration. A missing file yields the defaults.
 */
export async function readGlobalConfig(configPath: string = getGlobalConfigPath()): Promise<Result<GlobalConfig, ConfigError>> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (isNotFoundError(error)) {
      return Ok(withEnvOverrides(DEFAULT_GLOBAL_CONFIG));
    }
    return Err({
      type: 'read_error',
      message: `Failed to read global config: ${errorMessage(error)}`,
      path: configPath,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    return Err({
      type: 'parse_error',
      message: `Failed to parse global config: ${errorMessage(error)}`,
      path: configPath,
    });
  }

  const parsed = globalConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return Err({
      type: 'validation_error',
      message: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      path: configPath,
    });
  }

  const { ollama_host, ollama_model, llm_timeout_ms, quality_threshold, batch_concurrency } = parsed.data;
  return Ok(
    withEnvOverrides({
      ollama_host: ollama_host ?? DEFAULT_GLOBAL_CONFIG.ollama_host,
      ollama_model: ollama_model ?? DEFAULT_GLOBAL_CONFIG.ollama_model,
      llm_timeout_ms: llm_timeout_ms ?? DEFAULT_GLOBAL_CONFIG.llm_timeout_ms,
      quality_threshold: quality_threshold ?? DEFAULT_GLOBAL_CONFIG.quality_threshold,
      batch_concurrency: batch_concurrency ?? DEFAULT_GLOBAL_CONFIG.batch_concurrency,
    })
  );
}
