/**
 * Vote Extraction Engine Tests
 *
 * End-to-end runs over small hand-written meetings with a scripted language
 * model in place of Ollama.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { VoteExtractionEngine, runMeeting } from '../engine.js';
import { DEFAULT_EXTRACTION_CONFIG } from '../config.js';
import { DEFAULT_TITLE_TEMPLATES } from '../normalize/titles.js';
import { emptyMemory, loadExtractionMemory } from '../storage/memory-store.js';
import type { ExtractionConfig } from '../types/index.js';
import { AGENDA, MINUTES, ROSTER, jsonProvider, testDirName } from './fixtures.js';

const NOW = new Date('2024-03-06T08:00:00.000Z');
const CONFIG: ExtractionConfig = { ...DEFAULT_EXTRACTION_CONFIG, roster: ROSTER };

describe('VoteExtractionEngine', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('extracts consent and pulled votes without calling the model', async () => {
    const llm = jsonProvider({ votes: [] });
    const engine = new VoteExtractionEngine({ config: CONFIG, llm, now: () => NOW });

    const extracted = await engine.extractMeeting({ meeting_id: 'sa-2024-03-05', agenda_text: AGENDA, minutes_text: MINUTES });

    expect(extracted.ok).toBe(true);
    if (!extracted.ok) return;
    const { result, delta, report } = extracted.value;

    expect(result.votes.map((v) => [v.agenda_item_number, v.agenda_item_title])).toEqual([
      ['8', 'Purchase of Fleet Vehicles'],
      ['9', 'Agreement with Orange County Transit'],
      ['11', 'Second Reading of Ordinance on Parking'],
      ['12', 'Lease Agreement for Library Annex'],
      ['10', 'Contract with ABC Paving for Street Repairs'],
    ]);
    expect(result.method_used).toBe('regex');
    expect(result.llm_invoked).toBe(false);
    expect(result.quality_score).toBe(1);
    expect(result.confidence_score).toBe(1);
    expect(result.validation_passed).toBe(true);
    expect(result.processing_notes).toEqual(['Regex phase: 5 votes, quality 1']);
    expect(llm.prompts).toHaveLength(0);

    const pulled = result.votes[4];
    expect(pulled?.tally).toEqual({ ayes: 6, noes: 0, abstain: 1, absent: 0, recusal: 0 });
    expect(pulled?.member_votes['Lopez']).toBe('Abstain');
    expect(pulled?.mover).toBe('Hernandez');

    expect(delta).toEqual({
      pattern_hits: { moved_to_approve_item_range: 1 },
      pattern_misses: {},
      name_corrections: {},
      agenda_item_patterns: [DEFAULT_TITLE_TEMPLATES[0]],
      quality_scores: [1],
    });

    expect(report.extraction_metadata).toEqual({
      method_used: 'regex',
      confidence_score: 1,
      meeting_id: 'sa-2024-03-05',
      meeting_date: undefined,
      extracted_at: '2024-03-06T08:00:00.000Z',
      llm_invoked: false,
    });
    expect(report.validation_results.quality_score).toBe(1);
  });

  it('falls back to the model when patterns find nothing and filters other bodies', async () => {
    const llm = jsonProvider({
      votes: [
        { item_number: '2024-002', item_title: 'Housing Authority Budget', outcome: 'Pass', tally: { ayes: 7 } },
        { item_number: 5, outcome: 'Pass', tally: { ayes: 7 } },
      ],
    });
    const engine = new VoteExtractionEngine({ config: CONFIG, llm, now: () => NOW });

    const extracted = await engine.extractMeeting({
      agenda_text: '5. Budget Amendment',
      minutes_text: 'The council discussed the budget amendment and voted to approve it.',
    });

    expect(extracted.ok).toBe(true);
    if (!extracted.ok) return;
    const { result, delta } = extracted.value;

    expect(result.votes.map((v) => v.agenda_item_number)).toEqual(['5']);
    expect(result.votes[0]?.agenda_item_title).toBe('Budget Amendment');
    expect(result.method_used).toBe('ai');
    expect(result.llm_invoked).toBe(true);
    expect(result.quality_score).toBe(0.8);
    expect(result.confidence_score).toBe(0.68);
    expect(result.validation_passed).toBe(true);
    expect(result.processing_notes).toEqual([
      'No roll-call blocks found',
      'Regex phase: 0 votes, quality 0',
      'Excluded item 2024-002: item number "2024-002" matches other-body pattern ^\\d{4}-\\d+$',
      'Item 5: no member votes recorded',
    ]);
    expect(delta.pattern_hits).toEqual({});
    expect(delta.pattern_misses).toEqual({
      moved_to_approve_item_range: 1,
      calendar_items_then_motion: 1,
      approve_items_on_consent_calendar: 1,
    });
    expect(delta.quality_scores).toEqual([0.8]);
  });

  it('keeps regex votes over conflicting model votes', async () => {
    const llm = jsonProvider({
      votes: [
        { item_number: '9', outcome: 'Fail', tally: { ayes: 2, noes: 5 } },
        { item_number: '13', item_title: 'Street Lighting Upgrade', outcome: 'Pass', tally: { ayes: 7 } },
      ],
    });
    const engine = new VoteExtractionEngine({
      config: { ...CONFIG, quality_threshold: 0.8 },
      llm,
      now: () => NOW,
    });

    const extracted = await engine.extractMeeting({
      agenda_text: AGENDA,
      minutes_text: 'MOTION: Councilmember Lopez moved to approve Consent Calendar Items 8 through 10.',
    });

    expect(extracted.ok).toBe(true);
    if (!extracted.ok) return;
    const { result } = extracted.value;

    expect(result.votes.map((v) => [v.agenda_item_number, v.outcome])).toEqual([
      ['8', 'Pass'],
      ['9', 'Pass'],
      ['10', 'Pass'],
      ['13', 'Pass'],
    ]);
    expect(result.method_used).toBe('hybrid');
    expect(result.quality_score).toBe(0.725);
    expect(result.confidence_score).toBe(0.698);
    expect(result.validation_passed).toBe(false);
  });

  it('records the missing model when a fallback is needed', async () => {
    const engine = new VoteExtractionEngine({ config: CONFIG, now: () => NOW });
    const extracted = await engine.extractMeeting({ agenda_text: AGENDA, minutes_text: 'No business was conducted.' });

    expect(extracted.ok).toBe(true);
    if (!extracted.ok) return;
    expect(extracted.value.result.votes).toEqual([]);
    expect(extracted.value.result.method_used).toBe('regex');
    expect(extracted.value.result.llm_invoked).toBe(false);
    expect(extracted.value.result.validation_passed).toBe(false);
    expect(extracted.value.result.processing_notes).toContain('Fallback needed but no language model is configured');
    expect(extracted.value.result.processing_notes).toContain('No votes extracted');
  });

  it('applies name corrections from memory', async () => {
    const engine = new VoteExtractionEngine({
      config: CONFIG,
      memory: { ...emptyMemory(), member_name_corrections: { Hdz: 'Hernandez' } },
      now: () => NOW,
    });
    const extracted = await engine.extractMeeting({
      agenda_text: AGENDA,
      minutes_text:
        'MOTION: Councilmember Hdz moved to approve Consent Calendar Item Nos. 8 through 9, seconded by ' +
        'Councilmember Lopez. The motion carried, 7-0.',
    });

    expect(extracted.ok && extracted.value.result.votes[0]?.mover).toBe('Hernandez');
  });

  it('warns about members not serving on the meeting date', async () => {
    const engine = new VoteExtractionEngine({
      config: { ...CONFIG, roster: [...ROSTER, { name: 'Sarmiento', term_end: '2022-12-05' }] },
      now: () => NOW,
    });
    const extracted = await engine.extractMeeting({
      meeting_date: '2024-03-05',
      agenda_text: AGENDA,
      minutes_text:
        'MOTION: Councilmember Sarmiento moved to approve Consent Calendar Item Nos. 8 through 9, seconded by ' +
        'Councilmember Lopez. The motion carried, 7-0.',
    });

    expect(extracted.ok).toBe(true);
    if (!extracted.ok) return;
    expect(extracted.value.result.processing_notes.at(-1)).toBe('Names not on roster: Sarmiento');
    expect(extracted.value.delta.name_corrections).toEqual({ Sarmiento: 'Sarmiento' });
  });

  it('rejects empty documents', async () => {
    const engine = new VoteExtractionEngine({ config: CONFIG });

    expect(await engine.extractMeeting({ agenda_text: AGENDA, minutes_text: '  ' })).toEqual({
      ok: false,
      error: { type: 'input_error', message: 'Minutes text is empty' },
    });
    expect(await engine.extractMeeting({ agenda_text: '', minutes_text: MINUTES })).toEqual({
      ok: false,
      error: { type: 'input_error', message: 'Agenda text is empty' },
    });
  });

  it('produces the same regex phase for the same input', () => {
    const engine = new VoteExtractionEngine({ config: CONFIG });
    const input = { agenda_text: AGENDA, minutes_text: MINUTES };
    expect(engine.extractRegexPhase(input)).toEqual(engine.extractRegexPhase(input));
  });

  it('does not change its memory while extracting', async () => {
    const engine = new VoteExtractionEngine({ config: CONFIG, now: () => NOW });
    await engine.extractMeeting({ agenda_text: AGENDA, minutes_text: MINUTES });
    expect(engine.memory).toEqual(emptyMemory());
  });
});

describe('runMeeting', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), testDirName('vote-engine-test'));
    await fs.mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('saves the updated memory once the meeting is extracted', async () => {
    const memoryPath = join(testDir, 'extraction-memory.json');
    const engine = new VoteExtractionEngine({ config: CONFIG, now: () => NOW });

    const result = await runMeeting(engine, { agenda_text: AGENDA, minutes_text: MINUTES }, memoryPath);

    expect(result.ok).toBe(true);
    const saved = await loadExtractionMemory(memoryPath);
    expect(saved).toEqual(engine.memory);
    expect(saved.successful_patterns).toEqual({ moved_to_approve_item_range: 1 });
    expect(saved.quality_history).toEqual([1]);
    expect(saved.last_updated).toBe('2024-03-06T08:00:00.000Z');
  });

  it('does not touch memory when extraction fails', async () => {
    const memoryPath = join(testDir, 'extraction-memory.json');
    const engine = new VoteExtractionEngine({ config: CONFIG });

    const result = await runMeeting(engine, { agenda_text: AGENDA, minutes_text: '' }, memoryPath);

    expect(result.ok).toBe(false);
    await expect(fs.access(memoryPath)).rejects.toThrow();
  });
});
