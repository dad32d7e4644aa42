import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  OpenBlueprintSet,
  loadOpenBlueprints,
  parseBlueprintFileName,
} from '../src/blueprints/open-blueprints.js';
import { SchemaValidator } from '../src/validation/service.js';
import { PRODUCT_SCHEMA, openBlueprint } from './helpers.js';

describe('parseBlueprintFileName', () => {
  it('reads the domain and version from the file name', () => {
    expect(parseBlueprintFileName('job-posting.json')).toEqual({
      domain: 'job-posting',
      schemaVersion: 'v1',
    });
    expect(parseBlueprintFileName('e-commerce@v2.json')).toEqual({
      domain: 'e-commerce',
      schemaVersion: 'v2',
    });
  });

  it('ignores other files', () => {
    expect(parseBlueprintFileName('README.md')).toBeNull();
    expect(parseBlueprintFileName('@v2.json')).toBeNull();
    expect(parseBlueprintFileName('article@.json')).toBeNull();
  });
});

describe('OpenBlueprintSet', () => {
  it('keeps an explicit blueprint over the alias of another', () => {
    const explicit = openBlueprint('ecommerce', { type: 'array' });
    const set = new OpenBlueprintSet([openBlueprint('e-commerce', PRODUCT_SCHEMA), explicit]);

    expect(set.get('ecommerce', 'v1')).toBe(explicit);
    expect(set.get('e-commerce', 'v1')?.schema).toBe(PRODUCT_SCHEMA);
    expect(set.size).toBe(2);
  });

  it('keys blueprints by domain and version', () => {
    const set = new OpenBlueprintSet([openBlueprint('article', PRODUCT_SCHEMA, 'v3')]);

    expect(set.has('article', 'v3')).toBe(true);
    expect(set.has('article', 'v1')).toBe(false);
  });
});

describe('loadOpenBlueprints', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'blueprints-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads every valid blueprint file and skips the rest', async () => {
    await fs.writeFile(path.join(dir, 'article.json'), JSON.stringify({ type: 'object' }));
    await fs.writeFile(path.join(dir, 'article@v2.json'), JSON.stringify({ type: 'array' }));
    await fs.writeFile(path.join(dir, 'broken.json'), '{ not json');
    await fs.writeFile(path.join(dir, 'list.json'), '[]');
    await fs.writeFile(path.join(dir, 'composed.json'), JSON.stringify({ oneOf: [] }));
    await fs.writeFile(path.join(dir, 'notes.txt'), 'ignored');

    const set = await loadOpenBlueprints(dir, new SchemaValidator());

    expect(set.domains()).toEqual(['article']);
    expect(set.get('article', 'v2')).toMatchObject({
      rootType: 'array',
      visibility: 'open',
      source: path.join(dir, 'article@v2.json'),
    });
    expect(set.size).toBe(2);
  });

  it('returns an empty set for a missing directory', async () => {
    const set = await loadOpenBlueprints(path.join(dir, 'missing'), new SchemaValidator());
    expect(set.size).toBe(0);
  });

  it('loads the bundled blueprints', async () => {
    const bundled = fileURLToPath(new URL('../blueprints', import.meta.url));
    const set = await loadOpenBlueprints(bundled, new SchemaValidator());

    expect(set.domains()).toEqual(['article', 'e-commerce', 'ecommerce', 'job-posting']);
    expect(set.get('e-commerce', 'v2')?.rootType).toBe('array');
  });
});
