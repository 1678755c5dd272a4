/**
 * Rule-based question classification for the router.
 * Aggregate markers (counts, totals, date ranges) prefer the structured
 * engine; descriptive markers prefer retrieval.
 */

import type { EngineName } from '../types/models.js';

export interface Classification {
  preferred: Extract<EngineName, 'structured' | 'retrieval'>;
  aggregateMarkers: string[];
  semanticMarkers: string[];
  temporalHints: string[];
  /** The question asks about the user's own data. */
  personal: boolean;
}

type Marker = readonly [label: string, pattern: RegExp];

const AGGREGATE: readonly Marker[] = [
  ['how many', /\bhow many\b/],
  ['how much', /\bhow much\b/],
  ['count', /\bcount\b/],
  ['total', /\btotal\b/],
  ['average', /\baverage\b/],
  ['sum', /\bsum\b/],
  ['number of', /\bnumber of\b/],
  ['most', /\bmost\b/],
  ['least', /\bleast\b/],
  ['per period', /\bper (day|week|month|year)\b/],
  ['between', /\bbetween\b.+\band\b/],
];

const MONTH = /\b(january|february|march|april|june|july|august|september|october|november|december)\b|\b(in|of|during) may\b|\bmay \d{1,4}\b/;

const TEMPORAL: readonly Marker[] = [
  ['yesterday', /\byesterday\b/],
  ['last week', /\blast week\b/],
  ['last month', /\blast month\b/],
  ['last year', /\blast year\b/],
  ['this year', /\bthis year\b/],
];

const SEMANTIC: readonly Marker[] = [
  ['when did', /\bwhen did\b/],
  ['where', /\bwhere\b/],
  ['who', /\bwho\b/],
  ['what did', /\bwhat did\b/],
  ['describe', /\bdescribe\b/],
  ['remember', /\bremember\b/],
  ['tell me about', /\btell me about\b/],
  ['last time', /\blast time\b/],
];

const PERSONAL = /\b(i|me|my|mine|myself|i've|i'm|i'd|we|us|our|ours)\b/;

export function classifyQuestion(question: string): Classification {
  const text = question.toLowerCase().replace(/[’]/g, "'");

  const temporalHints = matching(TEMPORAL, text);
  const month = MONTH.exec(text);
  if (month) temporalHints.push((month[1] ?? 'may').trim());
  for (const year of text.match(/\b(19|20)\d{2}\b/g) ?? []) {
    temporalHints.push(year);
  }

  const aggregateMarkers = [...matching(AGGREGATE, text), ...temporalHints];
  const semanticMarkers = matching(SEMANTIC, text);

  const preferred =
    aggregateMarkers.length > 0 && aggregateMarkers.length >= semanticMarkers.length
      ? 'structured'
      : 'retrieval';

  return {
    preferred,
    aggregateMarkers,
    semanticMarkers,
    temporalHints,
    personal: PERSONAL.test(text),
  };
}

function matching(markers: readonly Marker[], text: string): string[] {
  return markers.filter(([, pattern]) => pattern.test(text)).map(([label]) => label);
}
