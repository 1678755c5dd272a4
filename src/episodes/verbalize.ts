/**
 * Record → Episode normalization.
 * Pure and deterministic: the same record always yields the same id and text.
 */

import { createHash } from 'node:crypto';
import { MalformedRecordError } from '../errors.js';
import type { Episode, RawRecord } from '../types/models.js';
import { isSourceType, verbalizeFields } from './verbalizers.js';

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

export interface NormalizedTimestamp {
  /** Canonical ISO-8601 string with an explicit offset. */
  iso: string;
  /** Calendar date as written in the record (YYYY-MM-DD). */
  date: string;
}

/**
 * Normalize an ISO-8601 date or date-time.
 * Dates without a time are midnight UTC; times without an offset are UTC.
 * Returns null for anything that is not a real calendar instant.
 */
export function normalizeTimestamp(value: string): NormalizedTimestamp | null {
  const match = ISO_PATTERN.exec(value.trim());
  if (!match) return null;

  const [y, mo, d, h, mi, s, frac, offset]: Array<string | undefined> = match.slice(1);
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);

  const calendar = new Date(Date.UTC(year, month - 1, day));
  if (
    calendar.getUTCFullYear() !== year ||
    calendar.getUTCMonth() !== month - 1 ||
    calendar.getUTCDate() !== day
  ) {
    return null;
  }

  const date = `${y}-${mo}-${d}`;
  if (h === undefined || mi === undefined) {
    return { iso: `${date}T00:00:00Z`, date };
  }

  if (Number(h) > 23 || Number(mi) > 59 || Number(s ?? '0') > 59) return null;

  const zone = normalizeOffset(offset);
  if (zone === null) return null;

  return { iso: `${date}T${h}:${mi}:${s ?? '00'}${frac ?? ''}${zone}`, date };
}

function normalizeOffset(offset: string | undefined): string | null {
  if (offset === undefined || offset === 'Z') return 'Z';
  const digits = offset.replace(':', '');
  const hours = Number(digits.slice(1, 3));
  const minutes = Number(digits.slice(3, 5));
  if (hours > 14 || minutes > 59) return null;
  return `${digits.slice(0, 3)}:${digits.slice(3, 5)}`;
}

/**
 * Turn one source record into its canonical Episode.
 * Throws MalformedRecordError when the source type is unknown or a required
 * field (timestamp, primary descriptive field) is missing.
 */
export function verbalize(record: RawRecord): Episode {
  const sourceType = record.sourceType;
  if (typeof sourceType !== 'string' || !isSourceType(sourceType)) {
    throw new MalformedRecordError(`Unknown source type "${String(sourceType)}"`, {
      sourceType: String(sourceType),
    });
  }

  const timestamp =
    typeof record.timestamp === 'string' ? normalizeTimestamp(record.timestamp) : null;
  if (!timestamp) {
    throw new MalformedRecordError(`${sourceType} record has no valid timestamp`, {
      sourceType,
      field: 'timestamp',
    });
  }

  const fieldBag =
    record.fields !== null && typeof record.fields === 'object' ? record.fields : {};
  const { fields, text } = verbalizeFields(sourceType, timestamp.date, fieldBag);

  const digest = createHash('sha256')
    .update(canonicalJson({ sourceType, timestamp: timestamp.iso, fields }))
    .digest('hex');

  const id = `ep_${digest.slice(0, 24)}`;
  const provenance = typeof record.provenance === 'string' ? record.provenance.trim() : '';

  return {
    id,
    timestamp: timestamp.iso,
    text,
    sourceType,
    provenanceRef: provenance || `${sourceType}/${id}`,
  };
}

/** JSON with sorted keys and undefined members dropped. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((v) => canonicalJson(v)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return JSON.stringify(value);
}
