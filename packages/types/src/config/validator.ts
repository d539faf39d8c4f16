import { ConfigurationError } from '../errors.js';
import { SCORE_DIMENSIONS, type ScoreDimension } from '../section.js';
import type {
  AnalysisConfig,
  ConfigOverrides,
  PersonaDocsConfig,
  ScoringWeights,
  SplitterConfig,
  WorkerConfig,
} from '../config.js';

/** 重みの合計に許容する誤差 */
export const WEIGHT_SUM_EPSILON = 1e-6;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScoreDimension(key: string): key is ScoreDimension {
  return (SCORE_DIMENSIONS as readonly string[]).includes(key);
}

function readNumber(obj: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number') {
    throw new ConfigurationError(`${path}.${key} must be a number`);
  }
  return value;
}

function readBoolean(obj: Record<string, unknown>, key: string, path: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${path}.${key} must be a boolean`);
  }
  return value;
}

/**
 * 設定オブジェクトの形をバリデーション
 *
 * 値の範囲は`assertValidConfig`でマージ後に検証する
 */
export function validateConfig(config: unknown): ConfigOverrides {
  if (!isRecord(config)) {
    throw new ConfigurationError('Config must be an object');
  }

  const result: ConfigOverrides = {};

  // バージョンのチェック
  if (config.version !== undefined) {
    if (typeof config.version !== 'string') {
      throw new ConfigurationError('config.version must be a string');
    }
    result.version = config.version;
  }

  // analysis設定のバリデーション
  if (config.analysis !== undefined) {
    result.analysis = validateAnalysisConfig(config.analysis);
  }

  // worker設定のバリデーション
  if (config.worker !== undefined) {
    result.worker = validateWorkerConfig(config.worker);
  }

  // splitter設定のバリデーション
  if (config.splitter !== undefined) {
    result.splitter = validateSplitterConfig(config.splitter);
  }

  return result;
}

function validateAnalysisConfig(analysis: unknown): NonNullable<ConfigOverrides['analysis']> {
  if (!isRecord(analysis)) {
    throw new ConfigurationError('config.analysis must be an object');
  }

  const result: NonNullable<ConfigOverrides['analysis']> = {};
  const path = 'config.analysis';

  const topK = readNumber(analysis, 'topK', path);
  if (topK !== undefined) result.topK = topK;

  const idealLength = readNumber(analysis, 'idealLength', path);
  if (idealLength !== undefined) result.idealLength = idealLength;

  const maxRefinedLength = readNumber(analysis, 'maxRefinedLength', path);
  if (maxRefinedLength !== undefined) result.maxRefinedLength = maxRefinedLength;

  const prefilter = readBoolean(analysis, 'prefilter', path);
  if (prefilter !== undefined) result.prefilter = prefilter;

  if (analysis.perDocumentCap !== undefined) {
    if (analysis.perDocumentCap !== null && typeof analysis.perDocumentCap !== 'number') {
      throw new ConfigurationError('config.analysis.perDocumentCap must be a number or null');
    }
    result.perDocumentCap = analysis.perDocumentCap;
  }

  if (analysis.weights !== undefined) {
    result.weights = validateWeightsShape(analysis.weights);
  }

  return result;
}

function validateWeightsShape(weights: unknown): Partial<ScoringWeights> {
  if (!isRecord(weights)) {
    throw new ConfigurationError('config.analysis.weights must be an object');
  }

  const result: Partial<ScoringWeights> = {};
  for (const [key, value] of Object.entries(weights)) {
    if (!isScoreDimension(key)) {
      throw new ConfigurationError(
        `config.analysis.weights.${key} is not a score dimension (expected one of: ${SCORE_DIMENSIONS.join(', ')})`
      );
    }
    if (typeof value !== 'number') {
      throw new ConfigurationError(`config.analysis.weights.${key} must be a number`);
    }
    result[key] = value;
  }
  return result;
}

function validateWorkerConfig(worker: unknown): Partial<WorkerConfig> {
  if (!isRecord(worker)) {
    throw new ConfigurationError('config.worker must be an object');
  }

  const result: Partial<WorkerConfig> = {};
  const maxConcurrent = readNumber(worker, 'maxConcurrent', 'config.worker');
  if (maxConcurrent !== undefined) result.maxConcurrent = maxConcurrent;

  const timeBudgetSeconds = readNumber(worker, 'timeBudgetSeconds', 'config.worker');
  if (timeBudgetSeconds !== undefined) result.timeBudgetSeconds = timeBudgetSeconds;

  return result;
}

function validateSplitterConfig(splitter: unknown): Partial<SplitterConfig> {
  if (!isRecord(splitter)) {
    throw new ConfigurationError('config.splitter must be an object');
  }

  const result: Partial<SplitterConfig> = {};
  const maxTokensPerSection = readNumber(splitter, 'maxTokensPerSection', 'config.splitter');
  if (maxTokensPerSection !== undefined) result.maxTokensPerSection = maxTokensPerSection;

  const maxDepth = readNumber(splitter, 'maxDepth', 'config.splitter');
  if (maxDepth !== undefined) result.maxDepth = maxDepth;

  return result;
}

/**
 * 重み表を検証
 * 6次元すべてが有限かつ非負で、合計が1 ± WEIGHT_SUM_EPSILON であること
 */
export function assertValidWeights(weights: ScoringWeights): void {
  let sum = 0;
  for (const dimension of SCORE_DIMENSIONS) {
    const weight = weights[dimension];
    if (typeof weight !== 'number' || !Number.isFinite(weight)) {
      throw new ConfigurationError(`weights.${dimension} must be a finite number`, { weights });
    }
    if (weight < 0) {
      throw new ConfigurationError(`weights.${dimension} must be non-negative (got ${weight})`, {
        weights,
      });
    }
    sum += weight;
  }

  if (Math.abs(sum - 1) > WEIGHT_SUM_EPSILON) {
    throw new ConfigurationError(`weights must sum to 1.0 (got ${sum})`, { weights });
  }
}

function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer (got ${value})`);
  }
}

function assertPositiveNumber(value: number, name: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be positive (got ${value})`);
  }
}

export function assertValidAnalysisConfig(analysis: AnalysisConfig): void {
  assertPositiveInteger(analysis.topK, 'analysis.topK');
  assertValidWeights(analysis.weights);
  assertPositiveNumber(analysis.idealLength, 'analysis.idealLength');
  assertPositiveInteger(analysis.maxRefinedLength, 'analysis.maxRefinedLength');
  if (analysis.perDocumentCap !== null) {
    assertPositiveInteger(analysis.perDocumentCap, 'analysis.perDocumentCap');
  }
}

export function assertValidWorkerConfig(worker: WorkerConfig): void {
  assertPositiveInteger(worker.maxConcurrent, 'worker.maxConcurrent');
  assertPositiveNumber(worker.timeBudgetSeconds, 'worker.timeBudgetSeconds');
}

/**
 * マージ済みの設定全体を検証
 */
export function assertValidConfig(config: PersonaDocsConfig): void {
  assertValidAnalysisConfig(config.analysis);
  assertValidWorkerConfig(config.worker);
  assertPositiveInteger(config.splitter.maxTokensPerSection, 'splitter.maxTokensPerSection');
  if (!Number.isInteger(config.splitter.maxDepth) || config.splitter.maxDepth < 1 || config.splitter.maxDepth > 3) {
    throw new ConfigurationError('splitter.maxDepth must be between 1 and 3');
  }
}
