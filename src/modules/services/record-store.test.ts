import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { RecordStoreClient } from './record-store.js';
import type { RecordStoreConfig } from '../config/index.js';
import type { GeneratedPrompt } from './types.js';

function jsonResponse(body: unknown, status: number = 200, statusText: string = 'OK'): Response {
  return new Response(JSON.stringify(body), { status, statusText });
}

const sentRecordsSchema = z.object({
  records: z.array(z.object({ fields: z.record(z.unknown()) })),
});

const storeConfig: RecordStoreConfig = {
  url: 'http://store.test/v0/base',
  apiKey: 'test-secret',
  scoresTable: 'structures',
  promptsTable: 'prompts',
  historyTable: 'history',
  settingsTable: 'batch_settings',
};

const retry = { maxAttempts: 2, baseDelayMs: 0 };

describe('RecordStoreClient', () => {
  const fetchMock = vi.fn<typeof fetch>();
  let store: RecordStoreClient;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    store = new RecordStoreClient(storeConfig, 1000, retry);
  });

  describe('when not configured', () => {
    it('skips every write and has no settings', async () => {
      const disabled = new RecordStoreClient(null, 1000, retry);

      expect(disabled.isEnabled()).toBe(false);
      expect(await disabled.writeScores({ s1: 0.5 })).toEqual({ updated: 0, failed: 0, total: 1, skipped: true });
      expect(await disabled.writePrompts([{ promptText: 'x' }])).toEqual({
        written: 0,
        failed: 0,
        historyWritten: 0,
        skipped: true,
      });
      expect(await disabled.fetchBatchSettings()).toBeNull();
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('writeScores', () => {
    it('patches one record per structure with the bearer token', async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ id: 'any', fields: {} }));

      const result = await store.writeScores({ s1: 0.9, 's 2': 0.4 });

      expect(result).toEqual({ updated: 2, failed: 0, total: 2, skipped: false });
      expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
        'http://store.test/v0/base/structures/s1',
        'http://store.test/v0/base/structures/s%202',
      ]);
      const init = fetchMock.mock.calls[0]?.[1];
      expect(init?.method).toBe('PATCH');
      expect(init?.body).toBe('{"fields":{"optimizer_score":0.9}}');
      expect(init?.headers).toEqual({ Authorization: 'Bearer test-secret', 'Content-Type': 'application/json' });
    });

    it('counts individual failures', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ id: 's1', fields: {} }))
        .mockResolvedValueOnce(jsonResponse({ error: 'NOT_FOUND' }, 404, 'Not Found'));

      const result = await store.writeScores({ s1: 0.9, s2: 0.4 });

      expect(result).toEqual({ updated: 1, failed: 1, total: 2, skipped: false });
    });

    it('fails when every write fails', async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ error: 'INVALID' }, 422, 'Unprocessable Entity'));

      await expect(store.writeScores({ s1: 0.9, s2: 0.4 })).rejects.toThrow('RecordStore: All 2 score writes failed');
    });

    it('succeeds trivially with nothing to write', async () => {
      expect(await store.writeScores({})).toEqual({ updated: 0, failed: 0, total: 0, skipped: false });
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('writePrompts', () => {
    it('creates prompt records in chunks and mirrors them into history', async () => {
      let nextId = 0;
      fetchMock.mockImplementation(async (_url, init) => {
        const sent = sentRecordsSchema.parse(JSON.parse(String(init?.body)));
        return jsonResponse({ records: sent.records.map((record) => ({ id: `rec${nextId++}`, fields: record.fields })) });
      });
      const prompts: GeneratedPrompt[] = Array.from({ length: 12 }, (_, i) => ({
        promptText: `prompt ${i}`,
        renderer: 'ImageFX',
        designerId: i === 0 ? 'des1' : undefined,
      }));

      const result = await store.writePrompts(prompts);

      expect(result).toEqual({ written: 12, failed: 0, historyWritten: 12, skipped: false });
      expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
        'http://store.test/v0/base/prompts',
        'http://store.test/v0/base/prompts',
        'http://store.test/v0/base/history',
        'http://store.test/v0/base/history',
      ]);

      const firstPrompts = sentRecordsSchema.parse(JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body)));
      expect(firstPrompts.records).toHaveLength(10);
      expect(firstPrompts.records[0]?.fields).toEqual({
        'New Prompt': 'prompt 0',
        Renderer: 'ImageFX',
        Designer: ['des1'],
      });

      const firstHistory = sentRecordsSchema.parse(JSON.parse(String(fetchMock.mock.calls[2]?.[1]?.body)));
      expect(firstHistory.records[0]?.fields).toEqual({
        'Prompt ID': 'rec0',
        Prompt: 'prompt 0',
        Renderer: 'ImageFX',
        Designer: ['des1'],
      });
    });

    it('counts a failed chunk and keeps going', async () => {
      let call = 0;
      fetchMock.mockImplementation(async (_url, init) => {
        call++;
        if (call === 1) {
          return jsonResponse({ error: 'INVALID' }, 422, 'Unprocessable Entity');
        }
        const sent = sentRecordsSchema.parse(JSON.parse(String(init?.body)));
        return jsonResponse({ records: sent.records.map((record, i) => ({ id: `r${call}-${i}`, fields: record.fields })) });
      });
      const prompts: GeneratedPrompt[] = Array.from({ length: 13 }, (_, i) => ({ promptText: `p${i}` }));

      const result = await store.writePrompts(prompts);

      expect(result).toEqual({ written: 3, failed: 10, historyWritten: 3, skipped: false });
    });
  });

  describe('fetchBatchSettings', () => {
    it('reads the first settings record', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ records: [{ id: 'rec1', fields: { numPrompts: 12, renderer: 'Midjourney', Notes: 'weekday' } }] })
      );

      const settings = await store.fetchBatchSettings();

      expect(settings).toEqual({ numPrompts: 12, renderer: 'Midjourney' });
      expect(fetchMock.mock.calls[0]?.[0]).toBe('http://store.test/v0/base/batch_settings?maxRecords=1');
    });

    it('returns null when the table is empty', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ records: [] }));

      expect(await store.fetchBatchSettings()).toBeNull();
    });

    it('rejects a malformed settings record', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ records: [{ id: 'rec1', fields: { numPrompts: 'many' } }] }));

      await expect(store.fetchBatchSettings()).rejects.toThrow('RecordStore: Malformed batch settings record rec1');
    });
  });
});
