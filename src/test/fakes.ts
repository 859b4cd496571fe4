/**
 * In-process stand-ins for the collaborating services, and a ready-made
 * configuration for tests.
 */

import type { AppConfig } from '../modules/config/index.js';
import type {
  BatchSettings,
  Collaborators,
  GeneratedPrompt,
  GeneratorService,
  IdeaRequest,
  IdeaResult,
  OptimizerService,
  PreferenceUpdate,
  PromptWriteResult,
  RecordStore,
  ScoreResponse,
  ScoreSet,
  ScoreWriteResult,
  StrategistService,
  StructureInsights,
} from '../modules/services/index.js';

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 8000,
    services: {
      optimizerUrl: 'http://optimizer.test',
      generatorUrl: 'http://generator.test',
      strategistUrl: 'http://strategist.test',
    },
    recordStore: null,
    learning: { likeThreshold: 25, explorationRate: 0.2, scoreMaxAgeMs: 60_000 },
    generation: {
      defaultBatchIdeas: 3,
      defaultNumPrompts: 30,
      defaultRenderer: 'ImageFX',
      generatorBatchSize: 10,
      generatorBatchDelayMs: 0,
    },
    timeouts: {
      trainMs: 1000,
      scoreMs: 1000,
      updateMs: 1000,
      strategistMs: 1000,
      generatorMs: 1000,
      recordStoreMs: 1000,
    },
    retry: { maxAttempts: 3, baseDelayMs: 0 },
    shutdownGraceMs: 0,
    requestLogging: false,
    ...overrides,
  };
}

/**
 * Promise that resolves when `release` is called
 */
export function gate(): { promise: Promise<void>; release: () => void } {
  let release: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

export class FakeOptimizer implements OptimizerService {
  trainCalls = 0;
  scoreCalls = 0;
  insightRequests: string[][] = [];
  trainError: Error | null = null;
  scoreError: Error | null = null;
  insightsError: Error | null = null;
  /** When set, train waits for it before answering */
  trainGate: Promise<void> | null = null;
  scores: ScoreSet = { s1: 0.9, s2: 0.4 };

  async train(): Promise<Record<string, unknown>> {
    this.trainCalls++;
    if (this.trainGate) await this.trainGate;
    if (this.trainError) throw this.trainError;
    return { status: 'trained' };
  }

  async scoreStructures(): Promise<ScoreResponse> {
    this.scoreCalls++;
    if (this.scoreError) throw this.scoreError;
    return {
      structures: Object.entries(this.scores).map(([structureId, predictedSuccessScore]) => ({
        structureId,
        predictedSuccessScore,
      })),
      globalPreferenceVector: { bold: 0.7 },
    };
  }

  async getStructureInsights(structureIds: string[]): Promise<StructureInsights> {
    this.insightRequests.push(structureIds);
    if (this.insightsError) throw this.insightsError;
    return { status: 'ok', insights: { s1: { topWords: ['linen'] } } };
  }
}

export class FakeGenerator implements GeneratorService {
  warmUps = 0;
  updates: PreferenceUpdate[] = [];
  promptRequests: Array<{ numPrompts: number; renderer: string }> = [];
  updateError: Error | null = null;
  promptError: Error | null = null;

  async warmUp(): Promise<boolean> {
    this.warmUps++;
    return true;
  }

  async updatePreferences(update: PreferenceUpdate): Promise<Record<string, unknown>> {
    if (this.updateError) throw this.updateError;
    this.updates.push(update);
    return { status: 'updated' };
  }

  async generatePrompts(numPrompts: number, renderer: string): Promise<GeneratedPrompt[]> {
    this.promptRequests.push({ numPrompts, renderer });
    if (this.promptError) throw this.promptError;
    return Array.from({ length: numPrompts }, (_, i) => ({ promptText: `prompt ${i + 1}`, renderer }));
  }
}

export class FakeStrategist implements StrategistService {
  warmUps = 0;
  requests: IdeaRequest[] = [];
  ideasError: Error | null = null;

  async warmUp(): Promise<boolean> {
    this.warmUps++;
    return true;
  }

  async generateIdeas(request: IdeaRequest): Promise<IdeaResult> {
    this.requests.push(request);
    if (this.ideasError) throw this.ideasError;
    return { totalGenerated: request.numIdeas };
  }
}

export class FakeRecordStore implements RecordStore {
  enabled = true;
  writtenScores: ScoreSet[] = [];
  writtenPrompts: GeneratedPrompt[][] = [];
  settings: BatchSettings | null = null;
  scoreError: Error | null = null;
  promptError: Error | null = null;
  settingsError: Error | null = null;

  isEnabled(): boolean {
    return this.enabled;
  }

  async writeScores(scores: ScoreSet): Promise<ScoreWriteResult> {
    if (this.scoreError) throw this.scoreError;
    this.writtenScores.push(scores);
    const total = Object.keys(scores).length;
    return { updated: total, failed: 0, total, skipped: false };
  }

  async writePrompts(prompts: GeneratedPrompt[]): Promise<PromptWriteResult> {
    if (this.promptError) throw this.promptError;
    this.writtenPrompts.push(prompts);
    return { written: prompts.length, failed: 0, historyWritten: prompts.length, skipped: false };
  }

  async fetchBatchSettings(): Promise<BatchSettings | null> {
    if (this.settingsError) throw this.settingsError;
    return this.settings;
  }
}

export interface FakeCollaborators extends Collaborators {
  optimizer: FakeOptimizer;
  generator: FakeGenerator;
  strategist: FakeStrategist;
  recordStore: FakeRecordStore;
}

export function fakeCollaborators(): FakeCollaborators {
  return {
    optimizer: new FakeOptimizer(),
    generator: new FakeGenerator(),
    strategist: new FakeStrategist(),
    recordStore: new FakeRecordStore(),
  };
}

/**
 * Clock that only moves when told to
 */
export function manualClock(start: string = '2025-01-01T00:00:00.000Z'): {
  now: () => Date;
  advance: (ms: number) => void;
} {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
}
