/**
 * Turns free-form classifier replies into structured fields.
 *
 * JSON replies are preferred; anything between the first `{` and the last
 * `}` is tried. Replies that aren't JSON fall back to `label: value` lines.
 * Whatever cannot be read is reported as a warning rather than an error.
 */
import { z } from 'zod';
import type { Classification, ClassificationFields, Disposition } from '../types/index.js';
import {
  FALLBACK_DISPOSITION,
  FALLBACK_INTENT,
  isKnownIntent,
  subIntentFromKeywords,
  type Taxonomy,
} from './taxonomy.js';

const MAX_SUMMARY_LENGTH = 500;
const MAX_SENTENCE_LENGTH = 200;
const GENERIC_SUB_INTENTS = new Set(['GENERAL_INQUIRY', 'GENERAL']);

const textField = z
  .unknown()
  .transform((value) => (typeof value === 'string' && value.trim() ? value.trim() : undefined));

const replySchema = z.object({
  summary: textField,
  intent: textField,
  sub_intent: textField,
  primary_disposition: textField,
  secondary_disposition: textField,
});

type ReplyFields = z.infer<typeof replySchema>;

const REPLY_KEYS = [
  'summary',
  'intent',
  'sub_intent',
  'primary_disposition',
  'secondary_disposition',
] as const satisfies ReadonlyArray<keyof ReplyFields>;

const LINE_PATTERNS: Record<keyof ReplyFields, RegExp> = {
  summary: /^\W*summary\W*:\s*(.+)$/i,
  intent: /^\W*intent\W*:\s*(.+)$/i,
  sub_intent: /^\W*sub[_ ]?intent\W*:\s*(.+)$/i,
  primary_disposition: /^\W*primary[_ ]disposition\W*:\s*(.+)$/i,
  secondary_disposition: /^\W*secondary[_ ]disposition\W*:\s*(.+)$/i,
};

function toLabel(value: string): string {
  return value
    .trim()
    .replace(/^["']+|["',]+$/g, '')
    .trim()
    .toUpperCase()
    .replace(/[\s-]+/g, '_');
}

function stripValue(value: string): string {
  return value
    .trim()
    .replace(/^["']+|["',]+$/g, '')
    .trim();
}

/**
 * First sentence of `text`, capped at 200 characters.
 */
export function firstSentence(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  if (!flat) {
    return '';
  }
  const end = flat.search(/[.!?](\s|$)/);
  const sentence = end >= 0 ? flat.slice(0, end + 1) : flat;
  return sentence.slice(0, MAX_SENTENCE_LENGTH);
}

function extractJsonObject(raw: string): unknown {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start < 0 || end <= start) {
    return undefined;
  }
  try {
    return JSON.parse(raw.slice(start, end + 1));
  } catch {
    return undefined;
  }
}

function readLines(raw: string): ReplyFields {
  const fields: ReplyFields = {
    summary: undefined,
    intent: undefined,
    sub_intent: undefined,
    primary_disposition: undefined,
    secondary_disposition: undefined,
  };
  for (const line of raw.split('\n')) {
    for (const key of REPLY_KEYS) {
      const match = LINE_PATTERNS[key].exec(line.trim());
      const value = match?.[1] ? stripValue(match[1]) : '';
      if (value && fields[key] === undefined) {
        fields[key] = value;
        break;
      }
    }
  }
  return fields;
}

function resolveDisposition(
  value: string | undefined,
  valid: Record<string, string>,
  name: string,
  warnings: string[]
): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const label = toLabel(value);
  if (Object.hasOwn(valid, label)) {
    return label;
  }
  warnings.push(`unknown ${name} "${value}" replaced with ${FALLBACK_DISPOSITION}`);
  return FALLBACK_DISPOSITION;
}

function buildFields(reply: ReplyFields, taxonomy: Taxonomy, warnings: string[]): ClassificationFields {
  let intent = FALLBACK_INTENT;
  if (reply.intent === undefined) {
    warnings.push(`intent missing; using ${FALLBACK_INTENT}`);
  } else if (isKnownIntent(taxonomy, toLabel(reply.intent))) {
    intent = toLabel(reply.intent);
  } else {
    warnings.push(`unknown intent "${reply.intent}" replaced with ${FALLBACK_INTENT}`);
  }

  let summary = reply.summary;
  if (summary === undefined) {
    warnings.push('summary missing');
    summary = 'No summary provided';
  }
  summary = summary.slice(0, MAX_SUMMARY_LENGTH);

  let subIntent: string;
  if (reply.sub_intent === undefined) {
    subIntent = subIntentFromKeywords(taxonomy, intent, summary);
    warnings.push(`sub_intent missing; inferred ${subIntent}`);
  } else if (GENERIC_SUB_INTENTS.has(toLabel(reply.sub_intent))) {
    subIntent = subIntentFromKeywords(taxonomy, intent, summary);
  } else {
    subIntent = toLabel(reply.sub_intent);
  }

  return {
    summary,
    intent,
    subIntent,
    primaryDisposition: resolveDisposition(
      reply.primary_disposition,
      taxonomy.primaryDispositions,
      'primary_disposition',
      warnings
    ),
    secondaryDisposition: resolveDisposition(
      reply.secondary_disposition,
      taxonomy.secondaryDispositions,
      'secondary_disposition',
      warnings
    ),
  };
}

function classify(reply: ReplyFields, taxonomy: Taxonomy, warnings: string[]): Classification {
  const fields = buildFields(reply, taxonomy, warnings);
  if (warnings.length === 0) {
    return { kind: 'parsed', fields };
  }
  return { kind: 'partial', fields, warning: warnings.join('; ') };
}

export function parseClassification(raw: string, taxonomy: Taxonomy): Classification {
  const text = raw.trim();
  if (!text) {
    return { kind: 'unparsed', raw, warning: 'Classifier returned an empty reply' };
  }

  const json = replySchema.safeParse(extractJsonObject(text));
  if (json.success && (json.data.summary !== undefined || json.data.intent !== undefined)) {
    return classify(json.data, taxonomy, []);
  }

  const lines = readLines(text);
  if (lines.summary !== undefined || lines.intent !== undefined) {
    return classify(lines, taxonomy, ['reply was not JSON; read labelled lines']);
  }

  return { kind: 'unparsed', raw, warning: 'Classifier reply could not be parsed' };
}

/**
 * Read a `PRIMARY|SECONDARY` disposition reply. Unknown labels become OTHER;
 * a reply without a `|` yields undefined.
 */
export function parseDisposition(raw: string, taxonomy: Taxonomy): Disposition | undefined {
  const line = raw.split('\n').find((candidate) => candidate.includes('|'));
  if (!line) {
    return undefined;
  }
  const [primaryRaw = '', secondaryRaw = ''] = line.split('|');
  const primary = toLabel(primaryRaw);
  const secondary = toLabel(secondaryRaw);
  return {
    primary: Object.hasOwn(taxonomy.primaryDispositions, primary) ? primary : FALLBACK_DISPOSITION,
    secondary: Object.hasOwn(taxonomy.secondaryDispositions, secondary) ? secondary : FALLBACK_DISPOSITION,
  };
}
