import { readFileSync } from 'fs';
import { extname } from 'path';
import { z } from 'zod';
import type { DomainProfile, ResearchDomain } from './types/index.js';

const domainSchema = z.enum(['business', 'academic', 'technical', 'scientific', 'policy', 'general']);

const domainTableSchema = z.object({
  threshold: z.number().int().positive(),
  fileExtensions: z.array(z.string()),
  domains: z.array(z.object({
    domain: domainSchema,
    keywords: z.array(z.string()),
    fileHints: z.array(z.string()),
    writingStyle: z.string(),
    citationRequirements: z.string(),
    qualityCriteria: z.array(z.string()),
    analysisFocus: z.array(z.string()),
  })),
});

type DomainTable = z.infer<typeof domainTableSchema>;

let cachedTable: DomainTable | undefined;

function loadTable(): DomainTable {
  if (!cachedTable) {
    const raw = readFileSync(new URL('../data/domains.json', import.meta.url), 'utf-8');
    cachedTable = domainTableSchema.parse(JSON.parse(raw));
  }
  return cachedTable;
}

export function isResearchDomain(value: string): value is ResearchDomain {
  return domainSchema.safeParse(value).success;
}

export function getDomainProfile(domain: ResearchDomain): DomainProfile {
  const entry = loadTable().domains.find(d => d.domain === domain);
  if (!entry) {
    throw new Error(`No profile for domain: ${domain}`);
  }
  return {
    domain: entry.domain,
    writingStyle: entry.writingStyle,
    citationRequirements: entry.citationRequirements,
    qualityCriteria: [...entry.qualityCriteria],
    analysisFocus: [...entry.analysisFocus],
  };
}

/**
 * Keyword vote over the goal, plus a +2 nudge when the data file name hints
 * at a domain. Below the confidence threshold the result is `general`.
 */
export function detectDomain(goal: string, dataFileRef?: string): ResearchDomain {
  const table = loadTable();
  const goalLower = goal.toLowerCase();
  const scores = new Map<ResearchDomain, number>();

  for (const entry of table.domains) {
    if (entry.keywords.length === 0) continue;
    scores.set(entry.domain, entry.keywords.filter(kw => goalLower.includes(kw)).length);
  }

  if (dataFileRef && table.fileExtensions.includes(extname(dataFileRef).toLowerCase())) {
    const fileLower = dataFileRef.toLowerCase();
    const hinted = table.domains.find(entry => entry.fileHints.some(hint => fileLower.includes(hint)));
    if (hinted) {
      scores.set(hinted.domain, (scores.get(hinted.domain) ?? 0) + 2);
    }
  }

  let best: ResearchDomain = 'general';
  let bestScore = 0;
  for (const [domain, score] of scores) {
    if (score > bestScore) {
      best = domain;
      bestScore = score;
    }
  }

  if (bestScore >= table.threshold) {
    console.error(`[Domain] Detected ${best} (score ${bestScore})`);
    return best;
  }
  return 'general';
}
