/**
 * Service Module Types
 *
 * Domain shapes exchanged with the collaborating services, and the contracts
 * the coordinators depend on. The concrete HTTP clients implement these; tests
 * substitute in-process fakes.
 */

// =============================================================================
// SCORES
// =============================================================================

/**
 * Entity id → predicted-success score in [0, 1]
 */
export type ScoreSet = Record<string, number>;

/**
 * One structure as scored by the optimizer
 */
export interface StructureScore {
  structureId: string;
  predictedSuccessScore: number;
}

/**
 * Result of POST /score_structures
 */
export interface ScoreResponse {
  structures: StructureScore[];
  globalPreferenceVector: Record<string, unknown>;
}

export interface StructureInsights {
  status: string;
  insights: Record<string, unknown>;
}

/**
 * Collapse a score response into a ScoreSet
 */
export function toScoreSet(response: ScoreResponse): ScoreSet {
  const scores: ScoreSet = {};
  for (const structure of response.structures) {
    scores[structure.structureId] = structure.predictedSuccessScore;
  }
  return scores;
}

// =============================================================================
// GENERATION
// =============================================================================

/**
 * Payload pushed to the generator after a learning cycle
 */
export interface PreferenceUpdate {
  globalPreferenceVector: Record<string, unknown>;
  explorationRate: number;
  structureScores: ScoreSet;
  structurePromptInsights: Record<string, unknown>;
}

export interface GeneratedPrompt {
  promptText: string;
  renderer?: string;
  designerId?: string;
  garmentId?: string;
  promptStructureId?: string;
}

export interface IdeaRequest {
  numIdeas: number;
  scores: ScoreSet;
  explorationRate: number;
}

export interface IdeaResult {
  totalGenerated: number;
}

// =============================================================================
// RECORD STORE
// =============================================================================

/**
 * Batch defaults kept in the record store's settings table
 */
export interface BatchSettings {
  numPrompts?: number;
  renderer?: string;
}

export interface ScoreWriteResult {
  updated: number;
  failed: number;
  total: number;
  skipped: boolean;
}

export interface PromptWriteResult {
  written: number;
  failed: number;
  historyWritten: number;
  skipped: boolean;
}

// =============================================================================
// SERVICE CONTRACTS
// =============================================================================

export interface OptimizerService {
  train(): Promise<Record<string, unknown>>;
  scoreStructures(): Promise<ScoreResponse>;
  getStructureInsights(structureIds: string[]): Promise<StructureInsights>;
}

export interface GeneratorService {
  warmUp(): Promise<boolean>;
  updatePreferences(update: PreferenceUpdate): Promise<Record<string, unknown>>;
  generatePrompts(numPrompts: number, renderer: string): Promise<GeneratedPrompt[]>;
}

export interface StrategistService {
  warmUp(): Promise<boolean>;
  generateIdeas(request: IdeaRequest): Promise<IdeaResult>;
}

export interface RecordStore {
  isEnabled(): boolean;
  writeScores(scores: ScoreSet): Promise<ScoreWriteResult>;
  writePrompts(prompts: GeneratedPrompt[]): Promise<PromptWriteResult>;
  fetchBatchSettings(): Promise<BatchSettings | null>;
}

/**
 * Everything the coordinators call out to
 */
export interface Collaborators {
  optimizer: OptimizerService;
  generator: GeneratorService;
  strategist: StrategistService;
  recordStore: RecordStore;
}
