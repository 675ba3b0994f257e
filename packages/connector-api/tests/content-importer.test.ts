import { describe, expect, it, vi } from 'vitest';
import type { ContentFieldDefinition, ContentStore, DataRecord, RowId, Value } from '@schemabridge/core';
import { ConnectorError, Logger } from '@schemabridge/core';
import type { FieldMapping } from '@schemabridge/mapping';
import { ContentImporter } from '../src/importer/content-importer.js';

class InMemoryContentStore implements ContentStore {
  readonly entries = new Map<RowId, { targetType: string; record: DataRecord }>();
  readonly definitions: ContentFieldDefinition[] = [];
  failWhen: ((record: DataRecord) => boolean) | null = null;
  private nextId = 100;

  async findExisting(targetType: string, uniqueField: string, uniqueValue: Value): Promise<RowId | null> {
    for (const [id, entry] of this.entries) {
      if (entry.targetType === targetType && entry.record[uniqueField] === uniqueValue) return id;
    }
    return null;
  }

  async upsert(targetType: string, id: RowId | null, record: DataRecord): Promise<RowId> {
    if (this.failWhen?.(record)) {
      throw new ConnectorError({ code: 'WRITE_FAILED', message: 'Entry rejected' });
    }
    const key = id ?? this.nextId++;
    this.entries.set(key, { targetType, record });
    return key;
  }

  async ensureFieldDefinition(definition: ContentFieldDefinition): Promise<void> {
    if (!this.definitions.some((existing) => existing.key === definition.key)) {
      this.definitions.push(definition);
    }
  }
}

const mapping: FieldMapping = {
  title: 'name',
  content: 'bio',
  external_id: 'id',
  photo: { path: 'avatar', kind: 'image' },
  talks: {
    repeater: true,
    path: 'sessions',
    subFields: { topic: 'title', starts: { path: 'start', filter: 'date' } },
    depth: 1,
  },
};

const speaker: DataRecord = {
  id: 'sp-1',
  name: 'Ada',
  bio: 'Pioneer',
  avatar: 'https://cdn.example.test/ada.png',
  sessions: [
    { title: 'Engines', start: '2024-06-01T09:00:00Z' },
    { title: 'Notes', start: 'later' },
  ],
};

function setup() {
  const store = new InMemoryContentStore();
  const logger = new Logger({ level: 'error' });
  const importer = new ContentImporter({ store, logger });
  return { store, logger, importer };
}

describe('ContentImporter', () => {
  it('creates an entry with reserved fields first', async () => {
    const { store, importer } = setup();

    const result = await importer.save(speaker, 'speaker', mapping, { uniqueField: 'external_id' });

    expect(result.status).toBe('created');
    if (result.status === 'failed') return;
    expect(result.id).toBe(100);
    expect(result.failures.map((failure) => failure.field)).toEqual(['talks.1.starts']);

    const stored = store.entries.get(100);
    expect(stored?.targetType).toBe('speaker');
    expect(stored?.record).toEqual({
      title: 'Ada',
      content: 'Pioneer',
      external_id: 'sp-1',
      photo: 'https://cdn.example.test/ada.png',
      talks: [
        { topic: 'Engines', starts: '2024-06-01 09:00:00' },
        { topic: 'Notes', starts: null },
      ],
    });
    expect(Object.keys(stored?.record ?? {})).toEqual(['title', 'content', 'external_id', 'photo', 'talks']);
  });

  it('declares custom fields from the transformed values', async () => {
    const { store, importer } = setup();

    await importer.save(speaker, 'speaker', mapping);

    expect(store.definitions.map((definition) => definition.key)).toEqual([
      'field_speaker_external_id',
      'field_speaker_photo',
      'field_speaker_talks',
    ]);
    expect(store.definitions[1]).toEqual({
      key: 'field_speaker_photo',
      label: 'Photo',
      name: 'photo',
      kind: 'image',
      returnFormat: 'array',
      mimeTypes: ['jpg', 'jpeg', 'png', 'gif', 'webp'],
    });
    expect(store.definitions[2]?.subFields).toEqual([
      { key: 'field_speaker_talks_topic', label: 'Topic', name: 'topic', kind: 'text' },
      { key: 'field_speaker_talks_starts', label: 'Starts', name: 'starts', kind: 'timestamp' },
    ]);
  });

  it('skips field declarations when disabled', async () => {
    const { store, importer } = setup();

    await importer.save(speaker, 'speaker', mapping, { createFields: false });

    expect(store.definitions).toEqual([]);
    expect(store.entries.size).toBe(1);
  });

  it('updates the entry matched by the unique field', async () => {
    const { store, importer } = setup();

    await importer.save(speaker, 'speaker', mapping, { uniqueField: 'external_id' });
    const second = await importer.save({ ...speaker, name: 'Ada L.' }, 'speaker', mapping, {
      uniqueField: 'external_id',
    });

    expect(second).toMatchObject({ status: 'updated', id: 100 });
    expect(store.entries.size).toBe(1);
    expect(store.entries.get(100)?.record['title']).toBe('Ada L.');
    expect(store.definitions).toHaveLength(3);
  });

  it('creates a new entry when the unique value is empty', async () => {
    const { store, importer } = setup();

    await importer.save({ ...speaker, id: '' }, 'speaker', mapping, { uniqueField: 'external_id' });
    const second = await importer.save({ ...speaker, id: '' }, 'speaker', mapping, { uniqueField: 'external_id' });

    expect(second).toMatchObject({ status: 'created', id: 101 });
    expect(store.entries.size).toBe(2);
  });

  it('defaults missing reserved fields to empty text', async () => {
    const { store, importer } = setup();

    await importer.save({ id: 'x' }, 'speaker', { external_id: 'id' }, { createFields: false });

    expect(store.entries.get(100)?.record).toEqual({ title: '', content: '', external_id: 'x' });
  });

  it('reports store failures as failed results', async () => {
    const { store, logger, importer } = setup();
    const warn = vi.spyOn(logger, 'warn');
    store.failWhen = () => true;

    const result = await importer.save(speaker, 'speaker', mapping, { createFields: false });

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.error.code).toBe('WRITE_FAILED');
    expect(result.error.message).toBe('Entry rejected');
    expect(warn).toHaveBeenCalledWith('Failed to save entry', {
      targetType: 'speaker',
      error: 'Entry rejected',
      code: 'WRITE_FAILED',
    });
  });

  it('wraps unexpected store errors', async () => {
    const { store, importer } = setup();
    store.upsert = async () => {
      throw new TypeError('store offline');
    };

    const result = await importer.save(speaker, 'speaker', mapping, { createFields: false });

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.error).toBeInstanceOf(ConnectorError);
    expect(result.error.code).toBe('WRITE_FAILED');
  });

  it('imports every record and continues past failures', async () => {
    const { store, importer } = setup();
    store.failWhen = (record) => record['title'] === 'Broken';

    const summary = await importer.importAll(
      [speaker, { ...speaker, id: 'sp-2', name: 'Broken' }, { ...speaker, id: 'sp-3', name: 'Grace' }, speaker],
      'speaker',
      mapping,
      { uniqueField: 'external_id', createFields: false }
    );

    expect(summary.created).toBe(2);
    expect(summary.updated).toBe(1);
    expect(summary.failed).toBe(1);
    expect(summary.results.map((result) => result.status)).toEqual(['created', 'failed', 'created', 'updated']);
  });
});
