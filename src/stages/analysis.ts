import { mkdir, readFile, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import { z } from 'zod';
import type { OrchestratorConfig } from '../config.js';
import { llmConfigFor } from '../config.js';
import { StageFailureError } from '../errors.js';
import type { StageProcessor } from '../stage-runner.js';
import type { ColumnProfile, DataProfile, SourcedPoint } from '../types/index.js';
import { askForJson, domainGuidance } from './shared.js';

/**
 * Split CSV text into rows. Handles quoted fields, doubled quotes and CRLF.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }
  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows.filter(r => r.some(cell => cell.trim() !== ''));
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function profileRows(rows: string[][]): DataProfile {
  const [header = [], ...body] = rows;
  const columns: ColumnProfile[] = header.map((rawName, index) => {
    const name = rawName.trim() || `column_${index + 1}`;
    const cells = body.map(r => (r[index] ?? '').trim()).filter(cell => cell !== '');
    const numbers = cells.map(Number).filter(n => Number.isFinite(n));
    const numeric = cells.length > 0 && numbers.length === cells.length;
    if (!numeric) {
      return { name, numeric, count: cells.length };
    }
    let min = Infinity;
    let max = -Infinity;
    let sum = 0;
    for (const n of numbers) {
      if (n < min) min = n;
      if (n > max) max = n;
      sum += n;
    }
    return { name, numeric, count: cells.length, min, max, mean: round(sum / numbers.length) };
  });
  return { rowCount: body.length, columns };
}

function describeProfile(profile: DataProfile): string {
  const lines = profile.columns.map(c =>
    c.numeric
      ? `- ${c.name}: numeric, ${c.count} values, min ${c.min}, max ${c.max}, mean ${c.mean}`
      : `- ${c.name}: text, ${c.count} values`
  );
  return `${profile.rowCount} rows, ${profile.columns.length} columns\n${lines.join('\n')}`;
}

const analysisReplySchema = z.object({
  summary: z.string().min(1),
  findings: z.array(z.string()).default([]),
});

/**
 * Profiles CSV files locally (other formats go to the model as raw text) and
 * asks the stage model to interpret the profile. Without a model the profile
 * itself is the report.
 */
export function createAnalysisProcessor(config: OrchestratorConfig): StageProcessor<'analysis'> {
  return {
    kind: 'analysis',
    reads: [],
    async invoke(context) {
      if (!context.dataFileRef) {
        throw new StageFailureError('analysis: no data file', 'permanent', 'analysis');
      }
      const source = basename(context.dataFileRef);

      let text: string;
      try {
        text = await readFile(context.dataFileRef, 'utf-8');
      } catch (error) {
        throw new StageFailureError(`analysis: cannot read ${source}`, 'permanent', 'analysis', error);
      }

      const profile = extname(source).toLowerCase() === '.csv' ? profileRows(parseCsv(text)) : undefined;
      if (profile) {
        await mkdir(context.artifactDir, { recursive: true });
        await writeFile(join(context.artifactDir, 'data-profile.json'), JSON.stringify(profile, null, 2));
      }

      const dataView = profile ? describeProfile(profile) : text.slice(0, 8000);
      const llm = llmConfigFor(config, 'analysis');
      if (!llm) {
        if (!profile) {
          throw new StageFailureError(`analysis: ${source} is not CSV and no model is configured`, 'permanent', 'analysis');
        }
        const points: SourcedPoint[] = profile.columns
          .filter(c => c.numeric)
          .map(c => ({ claim: `${c.name} ranges from ${c.min} to ${c.max} (mean ${c.mean})`, source }));
        return { ok: true, payload: { summary: dataView, profile, points } };
      }

      const reply = await askForJson(`You are a data analyst. Interpret this dataset for the research goal.

Goal: ${context.goal}
Data file: ${source}
${domainGuidance(context.domain)}${context.domain ? `Focus on: ${context.domain.analysisFocus.join(', ')}\n` : ''}
DATA:
${dataView}

Respond with JSON only:
{"summary": "short interpretation", "findings": ["one quantitative finding per entry", ...]}`,
        llm, analysisReplySchema, 'analysis', context);

      return {
        ok: true,
        payload: {
          summary: reply.summary,
          profile,
          points: reply.findings.map(claim => ({ claim, source })),
        },
      };
    },
  };
}
