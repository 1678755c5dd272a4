/**
 * Per-source verbalizers.
 * Each source type parses its untyped field bag into a typed shape (applying
 * defaults for optional fields) and renders one deterministic sentence.
 */

import { MalformedRecordError } from '../errors.js';
import type { SourceType } from '../types/models.js';

export interface PlaceVisitFields {
  place: string;
  city?: string;
  country?: string;
  companions: string[];
}

export interface PurchaseFields {
  item: string;
  category?: string;
  store?: string;
  price?: number;
  currency: string;
}

export interface PhotoFields {
  caption: string;
  place?: string;
  people: string[];
}

export interface PostFields {
  text: string;
  platform: string;
}

export interface WorkoutFields {
  activity: string;
  durationMinutes?: number;
  distanceKm?: number;
}

export interface MusicFields {
  track: string;
  artist?: string;
}

export interface FieldsBySource {
  place_visit: PlaceVisitFields;
  purchase: PurchaseFields;
  photo: PhotoFields;
  post: PostFields;
  workout: WorkoutFields;
  music: MusicFields;
}

export interface Verbalizer<F> {
  /** Primary descriptive field; a record without it is malformed. */
  readonly primaryField: string;
  parse(fields: Record<string, unknown>): F;
  render(date: string, fields: F): string;
}

type VerbalizerMap = { [S in SourceType]: Verbalizer<FieldsBySource[S]> };

export const VERBALIZERS: VerbalizerMap = {
  place_visit: {
    primaryField: 'place',
    parse: (f) => ({
      place: requireString(f, 'place', 'place_visit'),
      city: optionalString(f, 'city'),
      country: optionalString(f, 'country'),
      companions: optionalStringList(f, 'companions'),
    }),
    render: (date, f) => {
      let text = `On ${date}, I visited ${f.place}`;
      if (f.city && f.city !== f.place) text += ` in ${f.city}`;
      if (f.country) text += `, ${f.country}`;
      if (f.companions.length > 0) text += ` with ${joinNames(f.companions)}`;
      return `${text}.`;
    },
  },

  purchase: {
    primaryField: 'item',
    parse: (f) => ({
      item: requireString(f, 'item', 'purchase'),
      category: optionalString(f, 'category'),
      store: optionalString(f, 'store'),
      price: optionalNumber(f, 'price'),
      currency: optionalString(f, 'currency') ?? 'USD',
    }),
    render: (date, f) => {
      let text = `On ${date}, I bought ${f.item}`;
      if (f.category) text += ` (${f.category})`;
      if (f.store) text += ` from ${f.store}`;
      if (f.price !== undefined) text += ` for ${f.price.toFixed(2)} ${f.currency}`;
      return `${text}.`;
    },
  },

  photo: {
    primaryField: 'caption',
    parse: (f) => ({
      caption: requireString(f, 'caption', 'photo'),
      place: optionalString(f, 'place'),
      people: optionalStringList(f, 'people'),
    }),
    render: (date, f) => {
      let text = `On ${date}, I took a photo: ${stripTrailingPunctuation(f.caption)}`;
      if (f.place) text += ` at ${f.place}`;
      if (f.people.length > 0) text += ` with ${joinNames(f.people)}`;
      return `${text}.`;
    },
  },

  post: {
    primaryField: 'text',
    parse: (f) => ({
      text: requireString(f, 'text', 'post'),
      platform: optionalString(f, 'platform') ?? 'Facebook',
    }),
    render: (date, f) => `On ${date}, I posted on ${f.platform}: "${f.text}".`,
  },

  workout: {
    primaryField: 'activity',
    parse: (f) => ({
      activity: requireString(f, 'activity', 'workout'),
      durationMinutes: optionalNumber(f, 'durationMinutes'),
      distanceKm: optionalNumber(f, 'distanceKm'),
    }),
    render: (date, f) => {
      let text = `On ${date}, I logged a ${f.activity} workout`;
      if (f.durationMinutes !== undefined) text += ` of ${f.durationMinutes} minutes`;
      if (f.distanceKm !== undefined) text += ` covering ${f.distanceKm} km`;
      return `${text}.`;
    },
  },

  music: {
    primaryField: 'track',
    parse: (f) => ({
      track: requireString(f, 'track', 'music'),
      artist: optionalString(f, 'artist'),
    }),
    render: (date, f) => {
      let text = `On ${date}, I listened to "${f.track}"`;
      if (f.artist) text += ` by ${f.artist}`;
      return `${text}.`;
    },
  },
};

export function isSourceType(value: string): value is SourceType {
  return Object.prototype.hasOwnProperty.call(VERBALIZERS, value);
}

/**
 * Parse and render in one step, keeping the source type and its field shape
 * correlated.
 */
export function verbalizeFields<S extends SourceType>(
  sourceType: S,
  date: string,
  raw: Record<string, unknown>
): { fields: FieldsBySource[S]; text: string } {
  const verbalizer = VERBALIZERS[sourceType];
  const fields = verbalizer.parse(raw);
  return { fields, text: verbalizer.render(date, fields) };
}

// ── Field readers ──

function requireString(
  fields: Record<string, unknown>,
  name: string,
  sourceType: SourceType
): string {
  const value = optionalString(fields, name);
  if (value === undefined) {
    throw new MalformedRecordError(`${sourceType} record is missing "${name}"`, {
      sourceType,
      field: name,
    });
  }
  return value;
}

function optionalString(
  fields: Record<string, unknown>,
  name: string
): string | undefined {
  const value = fields[name];
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function optionalNumber(
  fields: Record<string, unknown>,
  name: string
): number | undefined {
  const value = fields[name];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return undefined;
}

function optionalStringList(
  fields: Record<string, unknown>,
  name: string
): string[] {
  const value = fields[name];
  const items = Array.isArray(value) ? value : typeof value === 'string' ? [value] : [];
  return items
    .filter((v): v is string => typeof v === 'string')
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

function joinNames(names: string[]): string {
  if (names.length <= 1) return names.join('');
  return `${names.slice(0, -1).join(', ')} and ${names[names.length - 1]}`;
}

function stripTrailingPunctuation(text: string): string {
  return text.replace(/[.!?]+$/, '');
}
