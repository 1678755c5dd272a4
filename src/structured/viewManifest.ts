/**
 * Loads the schema contract of the aggregate views from a JSON manifest,
 * or from the rows of a view catalog table.
 */

import { readFileSync } from 'node:fs';
import { ConfigError, messageOf } from '../errors.js';
import type { StructuredView, ViewColumn } from '../types/models.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function loadViewManifest(path: string): StructuredView[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Cannot read view manifest ${path}: ${messageOf(err)}`);
  }
  return parseViewManifest(raw);
}

export function parseViewManifest(raw: unknown): StructuredView[] {
  if (!isObject(raw) || !Array.isArray(raw.views)) {
    throw new ConfigError('View manifest must be an object with a "views" array');
  }

  const seen = new Set<string>();
  return raw.views.map((entry, i) => {
    if (!isObject(entry) || typeof entry.name !== 'string' || !IDENTIFIER.test(entry.name)) {
      throw new ConfigError(`View ${i} needs a plain identifier as "name"`);
    }
    const key = entry.name.toLowerCase();
    if (seen.has(key)) throw new ConfigError(`View "${entry.name}" is declared twice`);
    seen.add(key);

    if (!Array.isArray(entry.columns) || entry.columns.length === 0) {
      throw new ConfigError(`View "${entry.name}" declares no columns`);
    }
    const columns: ViewColumn[] = entry.columns.map((col, j) => {
      if (
        !isObject(col) ||
        typeof col.name !== 'string' ||
        !IDENTIFIER.test(col.name) ||
        typeof col.type !== 'string'
      ) {
        throw new ConfigError(`Column ${j} of view "${entry.name}" is invalid`);
      }
      return { name: col.name, type: col.type };
    });

    return {
      name: entry.name,
      ...(typeof entry.description === 'string' ? { description: entry.description } : {}),
      columns,
    };
  });
}

/**
 * Rows of `view_name`, `description` and JSON `columns`, checked with the
 * same rules as a manifest.
 */
export function parseViewCatalog(rows: unknown): StructuredView[] {
  if (!Array.isArray(rows)) throw new ConfigError('View catalog must be a list of rows');
  return parseViewManifest({
    views: rows.map((row: unknown) =>
      isObject(row)
        ? { name: row.view_name, description: row.description, columns: row.columns }
        : row
    ),
  });
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
