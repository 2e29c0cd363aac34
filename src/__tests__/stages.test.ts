import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { existsSync } from 'fs';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig } from '../config.js';
import { StageFailureError } from '../errors.js';
import { invokeStage } from '../stage-runner.js';
import type { StageContext } from '../stage-runner.js';
import { createAnalysisProcessor, parseCsv, profileRows } from '../stages/analysis.js';
import { buildCitationList, createCiteProcessor } from '../stages/cite.js';
import { normalizeOutline } from '../stages/outline.js';
import { clampScore, createReviewProcessor } from '../stages/review.js';

describe('parseCsv', () => {
  it('handles quotes, doubled quotes, CRLF and blank lines', () => {
    expect(parseCsv('a,b\r\n1,"x, y"\n2,"say ""hi"""\n\n')).toEqual([
      ['a', 'b'],
      ['1', 'x, y'],
      ['2', 'say "hi"'],
    ]);
  });

  it('keeps a last row without a newline', () => {
    expect(parseCsv('a\n1')).toEqual([['a'], ['1']]);
  });
});

describe('profileRows', () => {
  it('profiles numeric and text columns', () => {
    const profile = profileRows([
      ['region', 'units', 'price', ''],
      ['north', '10', '2.5', ''],
      ['south', '20', '', ''],
      ['east', 'x', '4', ''],
    ]);

    expect(profile).toEqual({
      rowCount: 3,
      columns: [
        { name: 'region', numeric: false, count: 3 },
        { name: 'units', numeric: false, count: 3 },
        { name: 'price', numeric: true, count: 2, min: 2.5, max: 4, mean: 3.25 },
        { name: 'column_4', numeric: false, count: 0 },
      ],
    });
  });

  it('profiles long columns', () => {
    const rows = [['units'], ...Array.from({ length: 250_000 }, (_, i) => [String(i + 1)])];

    expect(profileRows(rows)).toEqual({
      rowCount: 250_000,
      columns: [{ name: 'units', numeric: true, count: 250_000, min: 1, max: 250_000, mean: 125_000.5 }],
    });
  });
});

describe('buildCitationList', () => {
  it('orders sources by first mention, then discovery order', () => {
    const list = buildCitationList('As https://b.example shows, and per sales.csv the trend holds.', {
      synthesis: {
        points: [
          { claim: 'c1', source: 'https://a.example' },
          { claim: 'c2', source: 'https://b.example' },
          { claim: 'c3', source: 'unattributed' },
        ],
      },
      literature: { summary: 's', sources: ['https://a.example', 'https://c.example'] },
      analysis: { summary: 'd', points: [{ claim: 'x', source: 'sales.csv' }] },
    });

    expect(list.references).toEqual(['https://b.example', 'sales.csv', 'https://a.example', 'https://c.example']);
    expect(list.markdown).toBe(
      '## References\n\n1. https://b.example\n2. sales.csv\n3. https://a.example\n4. https://c.example\n'
    );
  });

  it('says so when nothing can be cited', () => {
    expect(buildCitationList('No sources here.', {})).toEqual({
      references: [],
      markdown: '## References\n\nNo sources were cited.\n',
    });
  });
});

describe('clampScore', () => {
  it('keeps scores on the 1-10 scale with one decimal', () => {
    expect(clampScore(11)).toBe(10);
    expect(clampScore(0)).toBe(1);
    expect(clampScore(7.26)).toBe(7.3);
    expect(clampScore(Number.NaN)).toBe(1);
  });
});

describe('normalizeOutline', () => {
  it('drops duplicate and out-of-range point references', () => {
    expect(normalizeOutline({ title: ' Report ', sections: [{ heading: ' Intro ', point_indices: [0, 0, 5, -1, 1] }] }, 2)).toEqual({
      title: 'Report',
      sections: [{ heading: 'Intro', pointIndices: [0, 1] }],
    });
  });
});

describe('stage processors without a model', () => {
  let dir: string;
  const config = loadConfig({});

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'stages-test-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function contextFor(overrides: Partial<StageContext>): StageContext {
    return {
      sessionId: 's1',
      goal: 'Monthly unit sales',
      modality: 'data',
      inputs: {},
      attempt: 0,
      artifactDir: join(dir, 'stages', 'analysis'),
      signal: new AbortController().signal,
      ...overrides,
    };
  }

  it('profiles a CSV into sourced points', async () => {
    const file = join(dir, 'sales.csv');
    await writeFile(file, 'month,units\njan,10\nfeb,30\n');

    const outcome = await createAnalysisProcessor(config).invoke(contextFor({ dataFileRef: file }));

    expect(outcome).toEqual({
      ok: true,
      payload: {
        summary: '2 rows, 2 columns\n- month: text, 2 values\n- units: numeric, 2 values, min 10, max 30, mean 20',
        profile: {
          rowCount: 2,
          columns: [
            { name: 'month', numeric: false, count: 2 },
            { name: 'units', numeric: true, count: 2, min: 10, max: 30, mean: 20 },
          ],
        },
        points: [{ claim: 'units ranges from 10 to 30 (mean 20)', source: 'sales.csv' }],
      },
    });
    expect(existsSync(join(dir, 'stages', 'analysis', 'data-profile.json'))).toBe(true);
  });

  it('analyses a large CSV through the stage runner', async () => {
    const file = join(dir, 'large.csv');
    const values = Array.from({ length: 200_000 }, (_, i) => String(i));
    await writeFile(file, `units\n${values.join('\n')}\n`);

    const result = await invokeStage(
      createAnalysisProcessor(config),
      contextFor({ dataFileRef: file, artifactDir: join(dir, 'stages', 'large') }),
      { retries: 0, timeoutMs: 30_000, retryDelayMs: 0 }
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.payload.points).toEqual([{ claim: 'units ranges from 0 to 199999 (mean 99999.5)', source: 'large.csv' }]);
    }
  });

  it('cannot read non-CSV data without a model', async () => {
    const file = join(dir, 'notes.txt');
    await writeFile(file, 'free text');

    await expect(createAnalysisProcessor(config).invoke(contextFor({ dataFileRef: file })))
      .rejects.toThrow('analysis: notes.txt is not CSV and no model is configured');
  });

  it('fails review permanently without a model', async () => {
    const error = await createReviewProcessor(config)
      .invoke(contextFor({ draft: 'A draft.' }))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StageFailureError);
    expect(error instanceof StageFailureError && error.kind).toBe('permanent');
  });

  it('needs a draft to cite', async () => {
    await expect(createCiteProcessor().invoke(contextFor({}))).rejects.toThrow('cite: no selected draft');
  });
});
