/**
 * Services Module
 *
 * HTTP clients for the collaborating services:
 * - Optimizer: train, score structures, structure insights
 * - Generator: preference updates, prompt generation
 * - Strategist: new structure ideas
 * - Record store: persisted scores, prompts and batch settings
 */

import type { AppConfig } from '../config/index.js';
import { GeneratorClient } from './generator.js';
import { OptimizerClient } from './optimizer.js';
import { RecordStoreClient } from './record-store.js';
import { StrategistClient } from './strategist.js';
import type { Collaborators } from './types.js';

export * from './types.js';
export { ServiceError, TransientNetworkError, CollaboratorError, errorMessage } from './errors.js';
export { ServiceClient, sleep, type ServiceClientConfig, type RequestOptions } from './http.js';
export { OptimizerClient } from './optimizer.js';
export { GeneratorClient } from './generator.js';
export { StrategistClient } from './strategist.js';
export { RecordStoreClient } from './record-store.js';

/**
 * Build the HTTP clients for every collaborator from configuration
 */
export function createCollaborators(config: AppConfig): Collaborators {
  return {
    optimizer: new OptimizerClient(config.services.optimizerUrl, config.timeouts, config.retry),
    generator: new GeneratorClient(config.services.generatorUrl, config.timeouts, config.retry, config.generation),
    strategist: new StrategistClient(config.services.strategistUrl, config.timeouts, config.retry),
    recordStore: new RecordStoreClient(config.recordStore, config.timeouts.recordStoreMs, config.retry),
  };
}
