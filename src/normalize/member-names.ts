/**
 * Member Name Normalizer
 *
 * ARCHITECTURE: Per-meeting object; never mutates learning memory
 * Pattern: Observations (warnings, correction candidates) are collected on the
 * instance and folded into the meeting's MemoryDelta by the engine
 *
 * Resolution order for a raw name such as "MAYOR PRO TEM HERNANDEZ":
 *   1. Strip role tokens at token level (longest sequence first)
 *   2. Exact roster match on the full remainder, then on the surname
 *   3. Learned correction from memory
 *   4. Single-edit OCR variant of a roster name (learned as a correction)
 *   5. Otherwise keep the title-cased surname and record a warning
 */

import { isValid, isWithinInterval, parseISO, startOfDay, endOfDay } from 'date-fns';
import type { RosterMember } from '../types/index.js';

export const DEFAULT_TITLE_TOKENS: readonly string[] = [
  'MAYOR PRO TEM',
  'VICE MAYOR',
  'AUTHORITY MEMBER',
  'COUNCIL MEMBER',
  'COUNCILMEMBER',
  'VICE CHAIR',
  'MAYOR',
  'CHAIR',
];

export type NameMatch = 'roster' | 'correction' | 'fuzzy' | 'unmatched';

export interface NormalizedName {
  readonly raw: string;
  readonly name: string;
  readonly match: NameMatch;
}

// ============================================================================
// Roster Helpers
// ============================================================================

function parseDay(value: string | undefined): Date | null {
  if (!value) return null;
  const parsed = parseISO(value);
  return isValid(parsed) ? parsed : null;
}

/**
 * Members serving on the given meeting date. Without a usable date every
 * roster entry is considered active.
 */
export function activeRoster(
  roster: readonly RosterMember[],
  meetingDate?: string
): RosterMember[] {
  const date = parseDay(meetingDate);
  if (!date) return [...roster];

  return roster.filter((member) => {
    const start = parseDay(member.term_start);
    const end = parseDay(member.term_end);
    return isWithinInterval(date, {
      start: start ? startOfDay(start) : new Date(-8.64e15),
      end: end ? endOfDay(end) : new Date(8.64e15),
    });
  });
}

/**
 * Case- and accent-insensitive comparison key
 */
export function nameKey(name: string): string {
  return name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^A-Za-z' -]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .toUpperCase();
}

function titleCase(word: string): string {
  return word
    .toLowerCase()
    .replace(/(^|[\s'-])([a-z])/g, (_match, sep: string, ch: string) => sep + ch.toUpperCase());
}

function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
    }
    previous = current;
  }
  return previous[b.length] ?? Math.max(a.length, b.length);
}

// ============================================================================
// Title Stripping
// ============================================================================

/**
 * Remove role tokens from a raw name. "Mayorga" survives because matching is
 * done on whole tokens, never substrings.
 */
export function stripTitleTokens(raw: string, titleTokens: readonly string[] = DEFAULT_TITLE_TOKENS): string[] {
  const tokens = raw
    .split(/\s+/)
    .map((token) => token.replace(/^[^A-Za-z\u00C0-\u024F]+|[^A-Za-z\u00C0-\u024F]+$/g, ''))
    .filter((token) => token.length > 0);

  const titles = titleTokens
    .map((title) => title.toUpperCase().split(/\s+/).filter((t) => t.length > 0))
    .filter((parts) => parts.length > 0)
    .sort((a, b) => b.length - a.length);

  const kept: string[] = [];
  let i = 0;
  while (i < tokens.length) {
    const title = titles.find((parts) =>
      parts.every((part, offset) => tokens[i + offset]?.toUpperCase() === part)
    );
    if (title) {
      i += title.length;
      continue;
    }
    const token = tokens[i];
    if (token !== undefined) kept.push(token);
    i++;
  }
  return kept;
}

// ============================================================================
// Normalizer
// ============================================================================

export interface MemberNameNormalizerOptions {
  readonly roster: readonly RosterMember[];
  readonly corrections?: Readonly<Record<string, string>>;
  readonly titleTokens?: readonly string[];
}

export class MemberNameNormalizer {
  private readonly byKey = new Map<string, string>();
  private readonly canonicalKeys: readonly { key: string; name: string }[];
  private readonly corrections: Readonly<Record<string, string>>;
  private readonly titleTokens: readonly string[];
  private readonly learned = new Map<string, string>();
  private readonly warned = new Set<string>();

  constructor(options: MemberNameNormalizerOptions) {
    this.corrections = options.corrections ?? {};
    this.titleTokens = options.titleTokens ?? DEFAULT_TITLE_TOKENS;

    const surnameCounts = new Map<string, number>();
    for (const member of options.roster) {
      const surname = nameKey(member.name).split(' ').pop() ?? '';
      surnameCounts.set(surname, (surnameCounts.get(surname) ?? 0) + 1);
    }

    for (const member of options.roster) {
      const surname = nameKey(member.name).split(' ').pop() ?? '';
      if (surname && surnameCounts.get(surname) === 1) this.byKey.set(surname, member.name);
      this.byKey.set(nameKey(member.name), member.name);
      for (const alias of member.aliases ?? []) {
        this.byKey.set(nameKey(alias), member.name);
      }
    }
    this.canonicalKeys = options.roster.map((member) => ({
      key: nameKey(member.name),
      name: member.name,
    }));
  }

  get hasRoster(): boolean {
    return this.canonicalKeys.length > 0;
  }

  get rosterSize(): number {
    return this.canonicalKeys.length;
  }

  normalize(raw: string): NormalizedName | null {
    const tokens = stripTitleTokens(raw, this.titleTokens);
    if (tokens.length === 0) return null;

    const full = tokens.join(' ');
    const surname = tokens[tokens.length - 1] ?? full;

    for (const candidate of [full, surname]) {
      const hit = this.byKey.get(nameKey(candidate));
      if (hit) return { raw, name: hit, match: 'roster' };
    }

    for (const candidate of [full, surname]) {
      const corrected = this.lookupCorrection(candidate);
      if (corrected) return { raw, name: corrected, match: 'correction' };
    }

    const fuzzy = this.fuzzyMatch(surname);
    if (fuzzy) {
      this.learned.set(titleCase(surname), fuzzy);
      return { raw, name: fuzzy, match: 'fuzzy' };
    }

    const name = titleCase(surname);
    if (this.hasRoster) {
      this.warned.add(name);
      // Identity entries are review candidates; lookupCorrection never applies them
      if (!this.learned.has(name)) this.learned.set(name, name);
    }
    return { raw, name, match: 'unmatched' };
  }

  /**
   * Correction candidates discovered during this meeting (observed -> canonical).
   * Unmatched names appear mapped to themselves.
   */
  learnedCorrections(): Record<string, string> {
    return Object.fromEntries(this.learned);
  }

  /**
   * Names that did not match the roster. Kept in output, reported as warnings.
   */
  unmatchedNames(): string[] {
    return [...this.warned].sort();
  }

  private lookupCorrection(candidate: string): string | null {
    const key = nameKey(candidate);
    for (const [observed, canonical] of Object.entries(this.corrections)) {
      if (nameKey(canonical) === nameKey(observed)) continue;
      if (nameKey(observed) === key) {
        return this.byKey.get(nameKey(canonical)) ?? canonical;
      }
    }
    return null;
  }

  private fuzzyMatch(surname: string): string | null {
    const key = nameKey(surname);
    if (key.length < 5) return null;

    const hits = this.canonicalKeys.filter(({ key: rosterKey }) => {
      const rosterSurname = rosterKey.split(' ').pop() ?? rosterKey;
      return editDistance(key, rosterSurname) <= 1;
    });
    return hits.length === 1 ? (hits[0]?.name ?? null) : null;
  }
}
