import { describe, it, expect, afterEach } from 'vitest';
import { rm, writeFile } from 'fs/promises';
import path from 'path';
import { parseAnnotations, loadAnnotations, flattenValue, imageIdOf } from './annotations.js';
import { ConfigError } from '../core/errors.js';
import { makeTempDir } from '../testing/fakes.js';

describe('parseAnnotations', () => {
  it('reads a table keyed by image id', () => {
    const table = parseAnnotations(
      JSON.stringify({ img_001: { question: 'How many?', answer: 2 } }),
      'json'
    );

    expect(table.get('img_001')).toEqual({ question: 'How many?', answer: '2' });
  });

  it('reads an array of rows carrying image_id', () => {
    const table = parseAnnotations(
      JSON.stringify([
        { image_id: 'a', label: 'cat' },
        { image_id: 7, label: 'dog' },
      ]),
      'json'
    );

    expect(table.get('a')).toEqual({ label: 'cat' });
    expect(table.get('7')).toEqual({ label: 'dog' });
  });

  it('reads JSON lines and ignores blank lines', () => {
    const table = parseAnnotations('{"image_id":"a","q":"x"}\n\n{"image_id":"b","q":"y"}\n', 'jsonl');

    expect([...table.keys()]).toEqual(['a', 'b']);
    expect(table.get('b')).toEqual({ q: 'y' });
  });

  it('drops fields reserved for the manifest', () => {
    const table = parseAnnotations(
      JSON.stringify({ a: { file_name: 'other.jpg', image_id: 'z', caption: 'hi' } }),
      'json'
    );

    expect(table.get('a')).toEqual({ caption: 'hi' });
  });

  it('reports the line of invalid JSON lines', () => {
    expect(() => parseAnnotations('{"image_id":"a"}\n{oops', 'jsonl', 'ann.jsonl')).toThrow(
      new ConfigError('Invalid JSON on line 2', 'ann.jsonl')
    );
  });

  it('rejects rows without an image id', () => {
    expect(() => parseAnnotations(JSON.stringify([{ label: 'cat' }]), 'json')).toThrow(ConfigError);
  });

  it('rejects a keyed table whose entries are not objects', () => {
    expect(() => parseAnnotations(JSON.stringify({ a: 'cat' }), 'json')).toThrow(ConfigError);
  });
});

describe('parseAnnotations with CSV', () => {
  it('keys rows by the image_id column', () => {
    const table = parseAnnotations(
      'image_id,question,answer\nimg_001,How many?,2\n\nimg_002,"Red, or blue?",red\n',
      'csv'
    );

    expect([...table.keys()]).toEqual(['img_001', 'img_002']);
    expect(table.get('img_001')).toEqual({ question: 'How many?', answer: '2' });
    expect(table.get('img_002')).toEqual({ question: 'Red, or blue?', answer: 'red' });
  });

  it('keeps ids with leading zeros as written', () => {
    const table = parseAnnotations('image_id,label\n007,cat\n', 'csv');
    expect(table.get('007')).toEqual({ label: 'cat' });
  });

  it('rejects a table without an image_id column', () => {
    expect(() => parseAnnotations('name,label\na,cat\n', 'csv')).toThrow(ConfigError);
  });

  it('rejects malformed CSV', () => {
    expect(() => parseAnnotations('image_id,label\n"a,cat\n', 'csv')).toThrow(/^annotations: Invalid CSV/);
  });
});

describe('flattenValue', () => {
  it('turns every value into a string', () => {
    expect(flattenValue('text')).toBe('text');
    expect(flattenValue(3.5)).toBe('3.5');
    expect(flattenValue(false)).toBe('false');
    expect(flattenValue(null)).toBe('');
    expect(flattenValue(['a', 1])).toBe('["a",1]');
    expect(flattenValue({ x: 1 })).toBe('{"x":1}');
  });
});

describe('loadAnnotations', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('returns null when the file does not exist', async () => {
    dir = await makeTempDir();
    expect(await loadAnnotations(path.join(dir, 'annotations.json'))).toBeNull();
  });

  it('picks the format from the extension', async () => {
    dir = await makeTempDir();
    const file = path.join(dir, 'labels.jsonl');
    await writeFile(file, '{"image_id":"a","label":"cat"}\n');

    const table = await loadAnnotations(file);
    expect(table?.get('a')).toEqual({ label: 'cat' });
  });

  it('reads a CSV table', async () => {
    dir = await makeTempDir();
    const file = path.join(dir, 'labels.csv');
    await writeFile(file, 'image_id,label\na,cat\n');

    const table = await loadAnnotations(file);
    expect(table?.get('a')).toEqual({ label: 'cat' });
  });

  it('rejects unsupported formats', async () => {
    dir = await makeTempDir();
    const file = path.join(dir, 'labels.tsv');
    await writeFile(file, 'image_id\tlabel\na\tcat\n');

    await expect(loadAnnotations(file)).rejects.toThrow(
      new ConfigError('Unsupported annotation format ".tsv" (expected .json, .jsonl or .csv)', file)
    );
  });
});

describe('imageIdOf', () => {
  it('strips the last extension only', () => {
    expect(imageIdOf('sub/photo.v2.jpg')).toBe('photo.v2');
    expect(imageIdOf('img_001.PNG')).toBe('img_001');
  });
});
