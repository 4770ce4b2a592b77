/**
 * dataset-sync - Annotation Table
 *
 * Loads the optional side table that attaches fields to images by image id
 * (the file name without its extension). Accepted layouts:
 *
 *   annotations.json   {"img_001": {"question": "...", "answer": "..."}, ...}
 *   annotations.json   [{"image_id": "img_001", "question": "..."}, ...]
 *   annotations.jsonl  {"image_id": "img_001", "question": "..."}  (one per line)
 *   annotations.csv    image_id,question,...  (header row, one image per row)
 *
 * Every field value is flattened to a string.
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import { parse as parseCsv } from 'csv-parse/sync';
import { z } from 'zod';

import { ConfigError } from '../core/errors.js';
import { formatIssues } from '../core/config.js';

export type AnnotationFields = Record<string, string>;
export type AnnotationTable = Map<string, AnnotationFields>;
export type AnnotationFormat = 'json' | 'jsonl' | 'csv';

const FORMATS: Record<string, AnnotationFormat> = {
  '.json': 'json',
  '.jsonl': 'jsonl',
  '.csv': 'csv',
};

// Keys owned by the manifest; annotation fields never override them
export const RESERVED_FIELDS = ['file_name', 'image_id'];

const FieldsSchema = z.record(z.string(), z.unknown());
const KeyedSchema = z.record(z.string(), FieldsSchema);
const RowSchema = z.object({ image_id: z.union([z.string().min(1), z.number()]) }).passthrough();
const RowsSchema = z.array(RowSchema);

export function flattenValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return JSON.stringify(value);
}

function toFields(raw: Record<string, unknown>): AnnotationFields {
  const fields: AnnotationFields = {};
  for (const [key, value] of Object.entries(raw)) {
    if (RESERVED_FIELDS.includes(key)) continue;
    fields[key] = flattenValue(value);
  }
  return fields;
}

function fromRows(rows: z.infer<typeof RowsSchema>): AnnotationTable {
  const table: AnnotationTable = new Map();
  for (const row of rows) {
    table.set(String(row.image_id), toFields(row));
  }
  return table;
}

/**
 * Parse annotation content. `format` is inferred from the file extension by
 * `loadAnnotations`; callers parsing in-memory content pass it directly.
 */
function parseRows(rows: unknown, source: string): AnnotationTable {
  const parsed = RowsSchema.safeParse(rows);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error), source);
  }
  return fromRows(parsed.data);
}

export function parseAnnotations(content: string, format: AnnotationFormat, source = 'annotations'): AnnotationTable {
  if (format === 'csv') {
    let rows: unknown;
    try {
      rows = parseCsv(content, { columns: true, bom: true, skip_empty_lines: true });
    } catch (error) {
      throw new ConfigError(`Invalid CSV (${error instanceof Error ? error.message : String(error)})`, source);
    }
    return parseRows(rows, source);
  }

  if (format === 'jsonl') {
    const rows: unknown[] = [];
    const lines = content.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (!line) continue;
      try {
        rows.push(JSON.parse(line));
      } catch {
        throw new ConfigError(`Invalid JSON on line ${i + 1}`, source);
      }
    }
    return parseRows(rows, source);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON (${error instanceof Error ? error.message : String(error)})`, source);
  }

  if (Array.isArray(raw)) {
    return parseRows(raw, source);
  }

  const parsed = KeyedSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error), source);
  }
  const table: AnnotationTable = new Map();
  for (const [imageId, fields] of Object.entries(parsed.data)) {
    table.set(imageId, toFields(fields));
  }
  return table;
}

/**
 * Load the annotation table. Returns null if the file doesn't exist.
 */
export async function loadAnnotations(filePath: string): Promise<AnnotationTable | null> {
  if (!existsSync(filePath)) {
    return null;
  }

  const ext = path.extname(filePath).toLowerCase();
  const format: AnnotationFormat | undefined = FORMATS[ext];
  if (!format) {
    throw new ConfigError(`Unsupported annotation format "${ext}" (expected .json, .jsonl or .csv)`, filePath);
  }

  const content = await readFile(filePath, 'utf-8');
  return parseAnnotations(content, format, filePath);
}

export function imageIdOf(fileName: string): string {
  return path.basename(fileName, path.extname(fileName));
}
