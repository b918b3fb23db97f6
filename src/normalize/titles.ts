/**
 * Title Resolver
 *
 * Fills generic placeholder titles ("Agenda Item 12") from the agenda's item
 * headings. Heading templates use `{n}` for the item number and are tried in
 * order: templates learned in earlier runs first, then the built-ins.
 */

import type { VoteRecord } from '../types/index.js';
import { squashWhitespace } from '../extraction/preprocess.js';

export const DEFAULT_TITLE_TEMPLATES: readonly string[] = [
  '^[ \\t]*{n}\\.[ \\t]+(.+)$',
  '^[ \\t]*Item[ \\t]+(?:No\\.?[ \\t]*)?{n}[ \\t]*[:.\\-\\u2013][ \\t]*(.+)$',
  '^[ \\t]*{n}[ \\t]*[)\\-\\u2013][ \\t]+(.+)$',
];

export const UNRESOLVED_TITLE_NOTE = 'Title not found in agenda text';

export function isGenericTitle(title: string, itemNumber: string): boolean {
  const trimmed = title.trim();
  return trimmed.length === 0 || trimmed.toLowerCase() === `agenda item ${itemNumber}`.toLowerCase();
}

function compile(template: string, itemNumber: string): RegExp | null {
  try {
    return new RegExp(template.split('{n}').join(itemNumber), 'im');
  } catch {
    // Learned templates come from a file on disk
    return null;
  }
}

export interface TitleResolution {
  readonly votes: VoteRecord[];
  /** Templates that matched and are not yet known to memory */
  readonly newTemplates: string[];
  readonly resolved: number;
  readonly unresolved: number;
}

export function resolveTitles(
  votes: readonly VoteRecord[],
  agendaText: string,
  learnedTemplates: readonly string[] = []
): TitleResolution {
  const templates = [...new Set([...learnedTemplates, ...DEFAULT_TITLE_TEMPLATES])];
  const known = new Set(learnedTemplates);
  const newTemplates = new Set<string>();
  let resolved = 0;
  let unresolved = 0;

  const titled = votes.map((vote) => {
    if (!isGenericTitle(vote.agenda_item_title, vote.agenda_item_number)) return vote;
    if (!/^\d+$/.test(vote.agenda_item_number)) return vote;

    for (const template of templates) {
      const match = compile(template, vote.agenda_item_number)?.exec(agendaText);
      const title = match?.[1] ? squashWhitespace(match[1]) : '';
      if (title.length === 0) continue;

      if (!known.has(template)) newTemplates.add(template);
      resolved++;
      return { ...vote, agenda_item_title: title };
    }

    unresolved++;
    return {
      ...vote,
      agenda_item_title: `Agenda Item ${vote.agenda_item_number}`,
      validation_notes: [...vote.validation_notes, UNRESOLVED_TITLE_NOTE],
    };
  });

  return { votes: titled, newTemplates: [...newTemplates], resolved, unresolved };
}
