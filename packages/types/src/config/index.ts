export { ConfigLoader, CONFIG_FILE_NAMES, type ResolveConfigOptions } from './loader.js';
export {
  validateConfig,
  assertValidConfig,
  assertValidAnalysisConfig,
  assertValidWorkerConfig,
  assertValidWeights,
  WEIGHT_SUM_EPSILON,
} from './validator.js';
