import { describe, expect, it } from 'vitest';
import { buildFieldDefinition } from '../src/fields/field-definition-builder.js';
import { parseFieldMapping } from '../src/validation/schemas.js';
import { MappingError } from '../src/errors/index.js';

describe('buildFieldDefinition', () => {
  it('derives key, label and kind', () => {
    expect(buildFieldDefinition('release_date', '2024-05-01', 'event')).toEqual({
      key: 'field_event_release_date',
      label: 'Release Date',
      name: 'release_date',
      kind: 'timestamp',
    });
  });

  it('describes repeater rows from the first element', () => {
    const definition = buildFieldDefinition(
      'speakers',
      [{ full_name: 'Ada', site: 'https://example.test' }, { full_name: 'Grace' }],
      'event'
    );

    expect(definition.kind).toBe('repeater');
    expect(definition.subFields).toEqual([
      { key: 'field_event_speakers_full_name', label: 'Full Name', name: 'full_name', kind: 'text' },
      { key: 'field_event_speakers_site', label: 'Site', name: 'site', kind: 'url' },
    ]);
  });

  it('adds media settings to images and galleries', () => {
    expect(buildFieldDefinition('cover', 'https://cdn.example.test/c.jpg', 'post')).toEqual({
      key: 'field_post_cover',
      label: 'Cover',
      name: 'cover',
      kind: 'image',
      returnFormat: 'array',
      mimeTypes: ['jpg', 'jpeg', 'png', 'gif', 'webp'],
    });
    expect(buildFieldDefinition('shots', ['a.png'], 'post').kind).toBe('gallery');
  });
});

describe('parseFieldMapping', () => {
  it('accepts every entry form', () => {
    const mapping = parseFieldMapping({
      title: 'headline',
      price: { path: 'pricing.amount', filter: 'float' },
      cover: { path: 'cover', kind: 'image' },
      rows: { repeater: true, path: 'rows', subFields: { n: 'n' }, depth: 1 },
    });

    expect(Object.keys(mapping)).toEqual(['title', 'price', 'cover', 'rows']);
    expect(mapping['rows']).toEqual({ repeater: true, path: 'rows', subFields: { n: 'n' }, depth: 1 });
  });

  it('rejects malformed entries', () => {
    expect(() => parseFieldMapping({ title: 3 })).toThrow(MappingError);
    expect(() => parseFieldMapping({ rows: { repeater: true, path: 'rows' } })).toThrow(/Invalid field mapping/);
    expect(() => parseFieldMapping(['title'])).toThrow(MappingError);
  });
});
