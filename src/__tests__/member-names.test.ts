/**
 * Member Name Normalizer Tests
 */

import { describe, it, expect } from 'vitest';
import { MemberNameNormalizer, activeRoster, nameKey, stripTitleTokens } from '../normalize/member-names.js';
import type { RosterMember } from '../types/index.js';
import { ROSTER } from './fixtures.js';

describe('stripTitleTokens', () => {
  it('removes multi-word titles', () => {
    expect(stripTitleTokens('MAYOR PRO TEM HERNANDEZ')).toEqual(['HERNANDEZ']);
    expect(stripTitleTokens('Council Member Lopez,')).toEqual(['Lopez']);
  });

  it('keeps names that merely start with a title', () => {
    expect(stripTitleTokens('Councilmember Mayorga')).toEqual(['Mayorga']);
  });
});

describe('MemberNameNormalizer', () => {
  it('maps titled upper-case names onto the roster', () => {
    const normalizer = new MemberNameNormalizer({ roster: ROSTER });
    expect(normalizer.normalize('MAYOR PRO TEM HERNANDEZ')).toEqual({
      raw: 'MAYOR PRO TEM HERNANDEZ',
      name: 'Hernandez',
      match: 'roster',
    });
    expect(normalizer.unmatchedNames()).toEqual([]);
  });

  it('ignores accents when matching', () => {
    const normalizer = new MemberNameNormalizer({ roster: ROSTER });
    expect(normalizer.normalize('Councilmember Peñaloza')?.name).toBe('Penaloza');
  });

  it('matches surnames of full roster names and aliases', () => {
    const roster: RosterMember[] = [{ name: 'Thai Viet Phan' }, { name: 'Amezcua', aliases: ['Valerie Amezcua'] }];
    const normalizer = new MemberNameNormalizer({ roster });
    expect(normalizer.normalize('Councilmember Phan')?.name).toBe('Thai Viet Phan');
    expect(normalizer.normalize('Mayor Valerie Amezcua')?.name).toBe('Amezcua');
  });

  it('learns single-character OCR variants', () => {
    const normalizer = new MemberNameNormalizer({ roster: ROSTER });
    expect(normalizer.normalize('Councilmember Penaioza')).toEqual({
      raw: 'Councilmember Penaioza',
      name: 'Penaloza',
      match: 'fuzzy',
    });
    expect(normalizer.learnedCorrections()).toEqual({ Penaioza: 'Penaloza' });
  });

  it('applies corrections from memory', () => {
    const normalizer = new MemberNameNormalizer({ roster: ROSTER, corrections: { HDZ: 'Hernandez' } });
    expect(normalizer.normalize('Councilmember Hdz')).toEqual({
      raw: 'Councilmember Hdz',
      name: 'Hernandez',
      match: 'correction',
    });
  });

  it('keeps unmatched names and records them for review', () => {
    const normalizer = new MemberNameNormalizer({ roster: ROSTER, corrections: { Smith: 'Smith' } });
    expect(normalizer.normalize('Councilmember Smith')).toEqual({
      raw: 'Councilmember Smith',
      name: 'Smith',
      match: 'unmatched',
    });
    expect(normalizer.unmatchedNames()).toEqual(['Smith']);
    expect(normalizer.learnedCorrections()).toEqual({ Smith: 'Smith' });
  });

  it('does not warn without a roster', () => {
    const normalizer = new MemberNameNormalizer({ roster: [] });
    expect(normalizer.normalize('COUNCILMEMBER SMITH')?.name).toBe('Smith');
    expect(normalizer.unmatchedNames()).toEqual([]);
    expect(normalizer.hasRoster).toBe(false);
  });

  it('returns null when only a title remains', () => {
    const normalizer = new MemberNameNormalizer({ roster: ROSTER });
    expect(normalizer.normalize('Mayor')).toBeNull();
  });
});

describe('activeRoster', () => {
  const roster: RosterMember[] = [
    { name: 'Lopez' },
    { name: 'Sarmiento', term_end: '2022-12-05' },
    { name: 'Vazquez', term_start: '2022-12-06' },
  ];

  it('selects members serving on the meeting date', () => {
    expect(activeRoster(roster, '2024-03-05').map((m) => m.name)).toEqual(['Lopez', 'Vazquez']);
    expect(activeRoster(roster, '2022-12-05').map((m) => m.name)).toEqual(['Lopez', 'Sarmiento']);
  });

  it('keeps everyone without a usable date', () => {
    expect(activeRoster(roster)).toHaveLength(3);
    expect(activeRoster(roster, 'not a date')).toHaveLength(3);
  });
});

describe('nameKey', () => {
  it('folds case and accents', () => {
    expect(nameKey('Peñaloza')).toBe('PENALOZA');
  });
});
