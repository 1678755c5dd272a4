/**
 * Structured answers over the aggregate views.
 * Asks the generator for a single SELECT against one view, checks it against
 * the view/column whitelist, runs it read-only, and renders the rows as one
 * sentence. Every failure along the way is a QueryGenerationError.
 */

import type { IGenerationProvider, GenerationPrompt } from '../providers/IGenerationProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IStructuredViewRepository } from '../repositories/IStructuredViewRepository.js';
import type { EngineAnswer, StructuredView, ViewRow } from '../types/models.js';
import type { AnswerEngine, EngineCallOptions } from './AnswerEngine.js';
import { validateViewQuery } from '../structured/validateViewQuery.js';
import { AppError, QueryGenerationError, messageOf } from '../errors.js';

const DEFAULT_CONFIDENCE = 0.9;
const DEFAULT_MAX_ROWS = 20;

const FENCED = /```(?:sql|sqlite)?\s*([\s\S]*?)```/i;
const DECLINED = /^\s*NONE\.?\s*$/i;

export interface StructuredQueryOptions {
  /** Confidence reported for a successfully executed query. Default: 0.9. */
  confidence?: number;
  /** Rows listed in a tabular answer. Default: 20. */
  maxRows?: number;
  /** Clock used to tell the generator today's date. */
  now?: () => Date;
}

export class StructuredQueryService implements AnswerEngine {
  readonly name = 'structured' as const;

  private readonly confidence: number;
  private readonly maxRows: number;
  private readonly now: () => Date;

  constructor(
    private readonly viewRepo: IStructuredViewRepository,
    private readonly generationProvider: IGenerationProvider,
    private readonly logProvider: ILogProvider,
    options: StructuredQueryOptions = {}
  ) {
    this.confidence = options.confidence ?? DEFAULT_CONFIDENCE;
    this.maxRows = options.maxRows ?? DEFAULT_MAX_ROWS;
    this.now = options.now ?? (() => new Date());
  }

  listViews(): Promise<StructuredView[]> {
    return this.viewRepo.listViews();
  }

  async answer(question: string, options: EngineCallOptions = {}): Promise<EngineAnswer> {
    const views = await this.viewRepo.listViews();
    if (views.length === 0) {
      throw new QueryGenerationError('No structured views are available', 'generation');
    }

    const output = await this.generationProvider.generate(
      buildStructuredPrompt(question, views, this.now()),
      options.signal
    );

    const query = extractQuery(output);
    const validated = validateViewQuery(query, views);
    this.logProvider.debug('Structured query accepted', {
      view: validated.view,
      columns: validated.columns,
    });

    let rows: ViewRow[];
    try {
      rows = await this.viewRepo.execute(validated.query);
    } catch (err) {
      if (err instanceof AppError) throw err;
      throw new QueryGenerationError(`View query failed: ${messageOf(err)}`, 'execution', {
        view: validated.view,
      });
    }

    return {
      answer: verbalizeRows(validated.view, rows, this.maxRows),
      confidence: this.confidence,
      sources: [
        { kind: 'view', view: validated.view, rowCount: rows.length, query: validated.query },
      ],
      generatedQuery: validated.query,
    };
  }
}

export function buildStructuredPrompt(
  question: string,
  views: StructuredView[],
  today: Date
): GenerationPrompt {
  const catalog = views
    .map((v) => {
      const columns = v.columns.map((c) => `${c.name} ${c.type}`).join(', ');
      return `- ${v.name}(${columns})${v.description ? `: ${v.description}` : ''}`;
    })
    .join('\n');

  return {
    system:
      'You translate questions about the user\'s personal data into one SQLite SELECT statement. ' +
      'The query must read exactly one of the listed views and use only its listed columns. ' +
      'No joins, subqueries, comments or data changes. Dates are ISO-8601 text (YYYY-MM-DD). ' +
      'Name a count result "count". Reply with the query only, or NONE if no view can answer.',
    user: `Today is ${today.toISOString().slice(0, 10)}.\n\nViews:\n${catalog}\n\nQuestion: ${question}`,
  };
}

/** Pull the SQL out of generator output (bare or fenced). */
export function extractQuery(output: string): string {
  if (DECLINED.test(output)) {
    throw new QueryGenerationError('No view can answer this question', 'parse');
  }

  const fenced = FENCED.exec(output);
  const body = fenced ? fenced[1] : output;
  const start = body.search(/\bSELECT\b/i);
  if (start === -1) {
    throw new QueryGenerationError('Generator output contains no SELECT statement', 'parse', {
      output: output.slice(0, 200),
    });
  }
  return body.slice(start).trim();
}

/**
 * One deterministic sentence for a result set.
 * A single-cell result is a scalar; a count scalar is phrased as a number of records.
 */
export function verbalizeRows(view: string, rows: ViewRow[], maxRows: number): string {
  if (rows.length === 0) {
    return `No matching records were found in "${view}".`;
  }

  const first = rows[0];
  const keys = Object.keys(first);
  if (rows.length === 1 && keys.length === 1) {
    const label = keys[0];
    const value = first[label];
    if (value === null || value === undefined) {
      return `No matching records were found in "${view}".`;
    }
    if (isCountLabel(label) && typeof value === 'number') {
      return value === 1
        ? `There is 1 matching record in "${view}".`
        : `There are ${formatValue(value)} matching records in "${view}".`;
    }
    return `The ${humanize(label)} in "${view}" is ${formatValue(value)}.`;
  }

  const listed = rows
    .slice(0, maxRows)
    .map((row) =>
      Object.entries(row)
        .map(([key, value]) => `${key}=${formatValue(value)}`)
        .join(', ')
    )
    .join('; ');
  const more = rows.length > maxRows ? `; and ${rows.length - maxRows} more` : '';
  const noun = rows.length === 1 ? 'row' : 'rows';

  return `"${view}" returned ${rows.length} ${noun}: ${listed}${more}.`;
}

function isCountLabel(label: string): boolean {
  return /count|^n$|^number/i.test(label);
}

function humanize(label: string): string {
  const cleaned = label
    .replace(/^(\w+)\s*\(\s*\*?\s*(\w*)\s*\)$/, '$1 $2')
    .replace(/_/g, ' ')
    .trim()
    .toLowerCase();
  return cleaned.length > 0 ? cleaned : 'value';
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return 'none';
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : String(Math.round(value * 100) / 100);
  }
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'yes' : 'no';
  return JSON.stringify(value);
}
