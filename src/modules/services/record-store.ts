/**
 * Record Store Client
 *
 * Persistence backend for structure scores, generated prompts and batch
 * settings. Speaks a table/record REST API: records are created with
 * `POST /<table>` (up to 10 per call) and updated with `PATCH /<table>/<id>`.
 *
 * When no store is configured every write is skipped and reported as such.
 */

import { z } from 'zod';
import type { RecordStoreConfig, RetryConfig } from '../config/index.js';
import { CollaboratorError, errorMessage } from './errors.js';
import { ServiceClient } from './http.js';
import type {
  BatchSettings,
  GeneratedPrompt,
  PromptWriteResult,
  RecordStore,
  ScoreSet,
  ScoreWriteResult,
} from './types.js';

/** Maximum records per create call */
const WRITE_CHUNK_SIZE = 10;

const recordSchema = z.object({
  id: z.string(),
  fields: z.record(z.unknown()).default({}),
});

const recordListSchema = z.object({
  records: z.array(recordSchema).default([]),
});

const settingsFieldsSchema = z.object({
  numPrompts: z.number().int().positive().optional(),
  renderer: z.string().min(1).optional(),
});

type StoredRecord = z.infer<typeof recordSchema>;

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Fields for a new prompt record. Linked records are arrays of ids.
 */
function promptFields(prompt: GeneratedPrompt): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    'New Prompt': prompt.promptText,
    Renderer: prompt.renderer ?? '',
  };
  if (prompt.designerId) fields['Designer'] = [prompt.designerId];
  if (prompt.garmentId) fields['Garment'] = [prompt.garmentId];
  if (prompt.promptStructureId) fields['Prompt Structure'] = [prompt.promptStructureId];
  return fields;
}

/**
 * History entry mirroring a created prompt record
 */
function historyFields(created: StoredRecord): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    'Prompt ID': created.id,
    Prompt: created.fields['New Prompt'] ?? '',
    Renderer: created.fields['Renderer'] ?? '',
  };
  for (const linked of ['Designer', 'Garment', 'Prompt Structure']) {
    if (created.fields[linked]) fields[linked] = created.fields[linked];
  }
  return fields;
}

export class RecordStoreClient implements RecordStore {
  private readonly http: ServiceClient | null;
  private readonly config: RecordStoreConfig | null;

  constructor(config: RecordStoreConfig | null, timeoutMs: number, retry: RetryConfig) {
    this.config = config;
    this.http = config
      ? new ServiceClient('RecordStore', config.url, {
          timeoutMs,
          maxAttempts: retry.maxAttempts,
          retryBaseDelay: retry.baseDelayMs,
          headers: { Authorization: `Bearer ${config.apiKey}` },
        })
      : null;
  }

  isEnabled(): boolean {
    return this.http !== null;
  }

  /**
   * Write one score per structure record. Individual failures are counted;
   * the call only fails when every write failed.
   */
  async writeScores(scores: ScoreSet): Promise<ScoreWriteResult> {
    const entries = Object.entries(scores);

    if (!this.http || !this.config) {
      console.log('[RecordStore] Not configured - skipping score writes');
      return { updated: 0, failed: 0, total: entries.length, skipped: true };
    }

    let updated = 0;
    let failed = 0;

    for (const [structureId, score] of entries) {
      try {
        await this.http.request(`/${this.config.scoresTable}/${encodeURIComponent(structureId)}`, recordSchema, {
          method: 'PATCH',
          body: { fields: { optimizer_score: score } },
        });
        updated++;
      } catch (error) {
        failed++;
        console.warn(`[RecordStore] Score write for ${structureId} failed: ${errorMessage(error)}`);
      }
    }

    if (entries.length > 0 && updated === 0) {
      throw new CollaboratorError('RecordStore', `All ${entries.length} score writes failed`);
    }

    console.log(`[RecordStore] Wrote ${updated}/${entries.length} structure scores`);
    return { updated, failed, total: entries.length, skipped: false };
  }

  /**
   * Create prompt records in chunks, then mirror every created record into
   * the history table
   */
  async writePrompts(prompts: GeneratedPrompt[]): Promise<PromptWriteResult> {
    if (!this.http || !this.config) {
      console.log('[RecordStore] Not configured - skipping prompt writes');
      return { written: 0, failed: 0, historyWritten: 0, skipped: true };
    }

    let written = 0;
    let failed = 0;
    let historyWritten = 0;
    const created: StoredRecord[] = [];

    for (const batch of chunk(prompts, WRITE_CHUNK_SIZE)) {
      try {
        const result = await this.http.request(`/${this.config.promptsTable}`, recordListSchema, {
          method: 'POST',
          body: { records: batch.map((prompt) => ({ fields: promptFields(prompt) })) },
        });
        created.push(...result.records);
        written += result.records.length;
      } catch (error) {
        failed += batch.length;
        console.error(`[RecordStore] Failed to write prompt batch: ${errorMessage(error)}`);
      }
    }

    for (const batch of chunk(created, WRITE_CHUNK_SIZE)) {
      try {
        const result = await this.http.request(`/${this.config.historyTable}`, recordListSchema, {
          method: 'POST',
          body: { records: batch.map((record) => ({ fields: historyFields(record) })) },
        });
        historyWritten += result.records.length;
      } catch (error) {
        console.error(`[RecordStore] Failed to write history batch: ${errorMessage(error)}`);
      }
    }

    console.log(`[RecordStore] Prompt write complete: ${written} prompts, ${historyWritten} history records`);
    return { written, failed, historyWritten, skipped: false };
  }

  /**
   * Read the first record of the settings table
   *
   * @returns null when the store is disabled or holds no settings record
   */
  async fetchBatchSettings(): Promise<BatchSettings | null> {
    if (!this.http || !this.config) {
      return null;
    }

    const result = await this.http.request(`/${this.config.settingsTable}`, recordListSchema, {
      query: { maxRecords: '1' },
    });

    const first = result.records[0];
    if (!first) {
      return null;
    }

    const parseResult = settingsFieldsSchema.safeParse(first.fields);
    if (!parseResult.success) {
      throw new CollaboratorError('RecordStore', `Malformed batch settings record ${first.id}`);
    }

    return parseResult.data;
  }
}
