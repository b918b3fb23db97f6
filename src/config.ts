/**
 * City Profiles
 *
 * ARCHITECTURE: YAML profile merged over built-in defaults
 * Pattern: Validate with zod at the boundary, Result types for all failures
 *
 * A profile names the city's roster (with term dates), extra role titles,
 * exclusion rules and optional consent-calendar patterns. Anything it leaves
 * out falls back to DEFAULT_EXTRACTION_CONFIG.
 */

import { promises as fs } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import type { ConfigError, ExtractionConfig, Result } from './types/index.js';
import { Ok, Err, errorMessage } from './types/index.js';
import { cityProfileSchema } from './schemas.js';
import type { CityProfile } from './schemas.js';
import { DEFAULT_TITLE_TOKENS } from './normalize/member-names.js';
import { DEFAULT_EXCLUSION_RULES } from './pipeline/exclusion-filter.js';
import { DEFAULT_QUALITY_THRESHOLD } from './pipeline/quality.js';
import type { ConsentPatternStrategy } from './extraction/consent-calendar.js';
import { DEFAULT_CONSENT_STRATEGIES, RegexConsentStrategy } from './extraction/consent-calendar.js';

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = {
  city: 'default',
  roster: [],
  title_tokens: DEFAULT_TITLE_TOKENS,
  exclusions: DEFAULT_EXCLUSION_RULES,
  quality_threshold: DEFAULT_QUALITY_THRESHOLD,
  consent_patterns: [],
};

function invalidPatterns(profile: CityProfile): string[] {
  const sources = [
    ...(profile.exclusions?.other_body_number_patterns ?? []).map((pattern) => ({ pattern, flags: '' })),
    ...(profile.consent_patterns ?? []).map(({ pattern }) => ({ pattern, flags: 'gi' })),
  ];
  return sources.flatMap(({ pattern, flags }) => {
    try {
      new RegExp(pattern, flags);
      return [];
    } catch (error) {
      return [`${pattern}: ${errorMessage(error)}`];
    }
  });
}

/**
 * Merge a validated profile over the defaults
 */
export function configFromProfile(profile: CityProfile, base: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG): ExtractionConfig {
  return {
    city: profile.city,
    roster: profile.roster,
    title_tokens: profile.title_tokens
      ? [...new Set([...base.title_tokens, ...profile.title_tokens.map((t) => t.toUpperCase())])]
      : base.title_tokens,
    exclusions: {
      title_phrases: profile.exclusions?.title_phrases ?? base.exclusions.title_phrases,
      title_prefixes: profile.exclusions?.title_prefixes ?? base.exclusions.title_prefixes,
      other_body_number_patterns:
        profile.exclusions?.other_body_number_patterns ?? base.exclusions.other_body_number_patterns,
    },
    quality_threshold: profile.quality_threshold ?? base.quality_threshold,
    consent_patterns: profile.consent_patterns ?? base.consent_patterns,
  };
}

/**
 * Parse profile YAML text
 */
export function parseCityProfile(content: string, path: string): Result<ExtractionConfig, ConfigError> {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    return Err({ type: 'parse_error', message: `Failed to parse profile YAML: ${errorMessage(error)}`, path });
  }

  const parsed = cityProfileSchema.safeParse(raw);
  if (!parsed.success) {
    return Err({
      type: 'validation_error',
      message: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      path,
    });
  }

  const invalid = invalidPatterns(parsed.data);
  if (invalid.length > 0) {
    return Err({ type: 'validation_error', message: `Invalid regular expression: ${invalid.join('; ')}`, path });
  }

  return Ok(configFromProfile(parsed.data));
}

export async function loadCityProfile(path: string): Promise<Result<ExtractionConfig, ConfigError>> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf-8');
  } catch (error) {
    return Err({ type: 'read_error', message: `Failed to read profile: ${errorMessage(error)}`, path });
  }
  return parseCityProfile(content, path);
}

/**
 * Built-in consent strategies with the profile's own patterns placed before
 * or after them. The built-ins themselves are never modified.
 */
export function consentStrategies(config: ExtractionConfig): ConsentPatternStrategy[] {
  const custom = (placement: 'before' | 'after'): ConsentPatternStrategy[] =>
    config.consent_patterns
      .filter((entry) => entry.placement === placement)
      .map((entry) => new RegexConsentStrategy(entry.name, new RegExp(entry.pattern, 'gi')));
  return [...custom('before'), ...DEFAULT_CONSENT_STRATEGIES, ...custom('after')];
}
