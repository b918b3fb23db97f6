/**
 * Title Resolver Tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_TITLE_TEMPLATES, UNRESOLVED_TITLE_NOTE, isGenericTitle, resolveTitles } from '../normalize/titles.js';
import { AGENDA, voteRecord } from './fixtures.js';

describe('resolveTitles', () => {
  it('fills generic titles from numbered agenda headings', () => {
    const result = resolveTitles([voteRecord('8'), voteRecord('12')], AGENDA);

    expect(result.votes.map((v) => v.agenda_item_title)).toEqual([
      'Purchase of Fleet Vehicles',
      'Lease Agreement for Library Annex',
    ]);
    expect(result.newTemplates).toEqual([DEFAULT_TITLE_TEMPLATES[0]]);
    expect(result.resolved).toBe(2);
    expect(result.unresolved).toBe(0);
  });

  it('does not confuse item 1 with item 11', () => {
    const result = resolveTitles([voteRecord('1')], AGENDA);
    expect(result.votes[0]?.agenda_item_title).toBe('Agenda Item 1');
    expect(result.votes[0]?.validation_notes).toEqual([UNRESOLVED_TITLE_NOTE]);
    expect(result.unresolved).toBe(1);
  });

  it('reads "Item No. N:" headings', () => {
    const result = resolveTitles([voteRecord('5')], 'Item No. 5: Budget Amendment');
    expect(result.votes[0]?.agenda_item_title).toBe('Budget Amendment');
    expect(result.newTemplates).toEqual([DEFAULT_TITLE_TEMPLATES[1]]);
  });

  it('tolerates irregular spacing around "N)" headings', () => {
    const result = resolveTitles([voteRecord('12')], '  12 )   Library   Annex');
    expect(result.votes[0]?.agenda_item_title).toBe('Library Annex');
  });

  it('tries learned templates first and does not report them as new', () => {
    const learned = '^[ \\t]*#{n}[ \\t]+(.+)$';
    const result = resolveTitles([voteRecord('7')], '#7 Parks Master Plan', [learned]);
    expect(result.votes[0]?.agenda_item_title).toBe('Parks Master Plan');
    expect(result.newTemplates).toEqual([]);
  });

  it('skips an invalid learned template', () => {
    const result = resolveTitles([voteRecord('8')], AGENDA, ['(unclosed {n}']);
    expect(result.votes[0]?.agenda_item_title).toBe('Purchase of Fleet Vehicles');
  });

  it('leaves specific titles and non-numeric items alone', () => {
    const specific = voteRecord('8', { agenda_item_title: 'Fleet purchase' });
    const unknown = voteRecord('Unknown');
    const result = resolveTitles([specific, unknown], AGENDA);
    expect(result.votes[0]).toBe(specific);
    expect(result.votes[1]).toBe(unknown);
    expect(result.resolved).toBe(0);
    expect(result.unresolved).toBe(0);
  });
});

describe('isGenericTitle', () => {
  it('treats blank and placeholder titles as generic', () => {
    expect(isGenericTitle('', '4')).toBe(true);
    expect(isGenericTitle('AGENDA ITEM 4', '4')).toBe(true);
    expect(isGenericTitle('Agenda Item 4', '5')).toBe(false);
  });
});
