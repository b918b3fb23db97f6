/**
 * Text Preprocessor Tests
 */

import { describe, it, expect } from 'vitest';
import { cleanDocumentText, findRunningLines, squashWhitespace } from '../extraction/preprocess.js';
import { VoteExtractionEngine } from '../engine.js';
import { DEFAULT_EXTRACTION_CONFIG } from '../config.js';
import { ROSTER } from './fixtures.js';

const UNANIMOUS_VOTE = [
  'YES: 7 – Amezcua, Bacerra, Hernandez, Lopez, Penaloza, Phan, Vazquez',
  'NO: 0',
  'Status: 7-0-0-0 Pass',
];

const HEADINGS = ['14. Budget Amendment', '15. Street Lighting Upgrade', '16. Park Maintenance Contract', '17. Water Rates'];

/** Four pages, each one item closed by an identical unanimous vote */
const UNANIMOUS_PAGES = HEADINGS.map((heading) => ['CITY COUNCIL MINUTES', heading, ...UNANIMOUS_VOTE].join('\n')).join(
  '\f'
);

describe('cleanDocumentText', () => {
  it('returns empty input unchanged', () => {
    expect(cleanDocumentText('')).toBe('');
  });

  it('leaves text with nothing to clean as is', () => {
    expect(cleanDocumentText('The meeting was called to order.')).toBe('The meeting was called to order.');
  });

  it('normalizes line endings', () => {
    expect(cleanDocumentText('First line\r\nSecond line')).toBe('First line\nSecond line');
  });

  it('removes page markers', () => {
    const raw = 'Roll call taken\n--- PAGE 2 ---\nMotion recorded\nPage 3 of 10\nAdjourned';
    expect(cleanDocumentText(raw)).toBe('Roll call taken\nMotion recorded\nAdjourned');
  });

  it('removes running headers repeated on every page', () => {
    const raw = [
      'CITY OF SANTA ANA MINUTES\nItem one text',
      'CITY OF SANTA ANA MINUTES\nItem two text',
      'CITY OF SANTA ANA MINUTES\nItem three text',
    ].join('\f');
    expect(cleanDocumentText(raw)).toBe('Item one text\nItem two text\nItem three text');
  });

  it('keeps vote lines that repeat at the foot of every page', () => {
    expect(cleanDocumentText(UNANIMOUS_PAGES)).toBe(
      HEADINGS.flatMap((heading) => [heading, ...UNANIMOUS_VOTE]).join('\n')
    );
  });

  it('rejoins words hyphenated across line breaks', () => {
    expect(cleanDocumentText('The motion was ap-\nproved unanimously.')).toBe('The motion was approved unanimously.');
  });

  it('collapses runs of spaces and blank lines', () => {
    expect(cleanDocumentText('A   B\n\n\n\nC  ')).toBe('A B\n\nC');
  });
});

describe('findRunningLines', () => {
  it('finds nothing on a single page', () => {
    expect(findRunningLines([['Header', 'Body', 'Footer']]).size).toBe(0);
  });

  it('requires a line on at least half of the pages', () => {
    const pages = [
      ['Council Minutes', 'a'],
      ['Council Minutes', 'b'],
      ['Other', 'c'],
      ['Other 2', 'd'],
      ['Other 3', 'e'],
    ];
    expect(findRunningLines(pages).size).toBe(0);
    expect([...findRunningLines(pages.slice(0, 3))]).toEqual(['Council Minutes']);
  });

  it('only considers the outermost line of each page', () => {
    const pages = [
      ['Council Minutes', 'Regular Meeting', 'a'],
      ['Council Minutes', 'Regular Meeting', 'b'],
    ];
    expect([...findRunningLines(pages)]).toEqual(['Council Minutes']);
  });

  it('never treats roll-call lines as running lines', () => {
    const pages = [
      ['MOTION: approve', 'Item A', 'NO: 0'],
      ['MOTION: approve', 'Item B', 'NO: 0'],
      ['5. Item heading', 'Item C', 'Status: 7-0-0-0 Pass'],
      ['5. Item heading', 'Item D', 'Status: 7-0-0-0 Pass'],
    ];
    expect(findRunningLines(pages).size).toBe(0);
  });
});

describe('multi-page minutes', () => {
  it('extracts every unanimous vote after cleaning', async () => {
    const engine = new VoteExtractionEngine({ config: { ...DEFAULT_EXTRACTION_CONFIG, roster: ROSTER } });

    const extracted = await engine.extractMeeting({ agenda_text: HEADINGS.join('\n'), minutes_text: UNANIMOUS_PAGES });

    expect(extracted.ok).toBe(true);
    if (!extracted.ok) return;
    const { result } = extracted.value;
    expect(result.votes.map((v) => [v.agenda_item_number, v.agenda_item_title, v.outcome])).toEqual([
      ['14', 'Budget Amendment', 'Pass'],
      ['15', 'Street Lighting Upgrade', 'Pass'],
      ['16', 'Park Maintenance Contract', 'Pass'],
      ['17', 'Water Rates', 'Pass'],
    ]);
    for (const vote of result.votes) {
      expect(vote.tally).toEqual({ ayes: 7, noes: 0, abstain: 0, absent: 0, recusal: 0 });
      expect(Object.values(vote.member_votes)).toEqual(['Aye', 'Aye', 'Aye', 'Aye', 'Aye', 'Aye', 'Aye']);
    }
    expect(result.method_used).toBe('regex');
    expect(result.quality_score).toBe(1);
    expect(result.processing_notes).toEqual(['Regex phase: 4 votes, quality 1']);
  });
});

describe('squashWhitespace', () => {
  it('collapses all whitespace to single spaces', () => {
    expect(squashWhitespace('  moved\n to\tapprove  ')).toBe('moved to approve');
  });
});
