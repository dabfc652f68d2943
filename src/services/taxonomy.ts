/**
 * Intent and disposition vocabulary shared by the classifier prompt and
 * the reply parser. Loaded from resources/taxonomy.json.
 */
import { readFileSync } from 'fs';
import { z } from 'zod';

const labelList = z.array(z.string().regex(/^[A-Z0-9_]+$/)).nonempty();

const taxonomySchema = z.object({
  intents: labelList,
  subIntentKeywords: z.record(z.record(z.array(z.string().min(1)))),
  subIntentDefaults: z.record(z.string()),
  fallbackSubIntent: z.string(),
  primaryDispositions: z.record(z.string()),
  secondaryDispositions: z.record(z.string()),
});

export type Taxonomy = z.infer<typeof taxonomySchema>;

export const FALLBACK_INTENT = 'OTHER';
export const UNKNOWN_SUB_INTENT = 'UNKNOWN';
export const FALLBACK_DISPOSITION = 'OTHER';

const TAXONOMY_URL = new URL('../../resources/taxonomy.json', import.meta.url);

let cached: Taxonomy | undefined;

export function parseTaxonomy(raw: unknown): Taxonomy {
  return taxonomySchema.parse(raw);
}

export function loadTaxonomy(): Taxonomy {
  if (!cached) {
    cached = parseTaxonomy(JSON.parse(readFileSync(TAXONOMY_URL, 'utf-8')));
  }
  return cached;
}

export function isKnownIntent(taxonomy: Taxonomy, intent: string): boolean {
  return taxonomy.intents.includes(intent);
}

/**
 * Pick a sub-intent for `intent` from keywords found in `text`.
 * Each keyword present scores one point; ties go to the first sub-intent
 * listed. With no hits, falls back to the intent's default.
 */
export function subIntentFromKeywords(taxonomy: Taxonomy, intent: string, text: string): string {
  const patterns = taxonomy.subIntentKeywords[intent];
  if (!patterns) {
    return taxonomy.fallbackSubIntent;
  }

  const haystack = text.toLowerCase();
  let best: string | undefined;
  let bestScore = 0;
  for (const [subIntent, keywords] of Object.entries(patterns)) {
    const score = keywords.filter((keyword) => haystack.includes(keyword)).length;
    if (score > bestScore) {
      best = subIntent;
      bestScore = score;
    }
  }

  return best ?? taxonomy.subIntentDefaults[intent] ?? taxonomy.fallbackSubIntent;
}

function describeLabels(labels: Record<string, string>): string {
  return Object.entries(labels)
    .map(([label, meaning]) => `- ${label}: ${meaning}`)
    .join('\n');
}

export function primaryDispositionGuide(taxonomy: Taxonomy): string {
  return describeLabels(taxonomy.primaryDispositions);
}

export function secondaryDispositionGuide(taxonomy: Taxonomy): string {
  return describeLabels(taxonomy.secondaryDispositions);
}
