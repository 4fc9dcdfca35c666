/**
 * Graph configuration defaults and validation
 */

import { InvalidArgumentError } from './errors.js';
import type { GraphConfig } from './types.js';
import { isLogLevel, resolveLogLevel } from '../utils/logger.js';

export const DEFAULT_GRAPH_NAME = 'knowledge_graph';

/**
 * Default configuration; `logLevel` follows KNOWLEDGE_GRAPH_LOG_LEVEL
 */
export function createDefaultGraphConfig(): GraphConfig {
  return {
    name: DEFAULT_GRAPH_NAME,
    decay: 0.5,
    seedMultiplier: 2,
    maxInlineBlockBytes: 800 * 1024,
    archiveCompression: 'none',
    maxChainLength: 5,
    reasoningWeights: {
      similarity: 0.5,
      pathConfidence: 0.3,
      coverage: 0.2
    },
    logLevel: resolveLogLevel()
  };
}

/**
 * Merge a partial configuration over the defaults and validate the result
 */
export function resolveGraphConfig(config: Partial<GraphConfig> = {}): GraphConfig {
  const defaults = createDefaultGraphConfig();
  const merged: GraphConfig = {
    ...defaults,
    ...config,
    reasoningWeights: {
      ...defaults.reasoningWeights,
      ...config.reasoningWeights
    }
  };
  validateGraphConfig(merged);
  return merged;
}

/**
 * Throws `InvalidArgumentError` naming the first invalid key
 */
export function validateGraphConfig(config: GraphConfig): void {
  if (config.name.length === 0) {
    throw new InvalidArgumentError('Graph name must not be empty');
  }
  if (!(config.decay > 0 && config.decay < 1)) {
    throw new InvalidArgumentError(`decay must be in (0, 1), got ${config.decay}`, { key: 'decay' });
  }
  if (!Number.isInteger(config.seedMultiplier) || config.seedMultiplier < 1) {
    throw new InvalidArgumentError(`seedMultiplier must be a positive integer, got ${config.seedMultiplier}`, {
      key: 'seedMultiplier'
    });
  }
  if (!Number.isInteger(config.maxInlineBlockBytes) || config.maxInlineBlockBytes < 1) {
    throw new InvalidArgumentError(`maxInlineBlockBytes must be a positive integer, got ${config.maxInlineBlockBytes}`, {
      key: 'maxInlineBlockBytes'
    });
  }
  if (config.archiveCompression !== 'none' && config.archiveCompression !== 'gzip') {
    throw new InvalidArgumentError(`Unknown archive compression: ${String(config.archiveCompression)}`, {
      key: 'archiveCompression'
    });
  }
  if (!Number.isInteger(config.maxChainLength) || config.maxChainLength < 3) {
    throw new InvalidArgumentError(`maxChainLength must be an integer of at least 3, got ${config.maxChainLength}`, {
      key: 'maxChainLength'
    });
  }
  for (const [term, weight] of Object.entries(config.reasoningWeights)) {
    if (!(Number.isFinite(weight) && weight > 0)) {
      throw new InvalidArgumentError(`Reasoning weight '${term}' must be positive, got ${weight}`, {
        key: 'reasoningWeights'
      });
    }
  }
  if (!isLogLevel(config.logLevel)) {
    throw new InvalidArgumentError(`Unknown log level: ${String(config.logLevel)}`, { key: 'logLevel' });
  }
}
