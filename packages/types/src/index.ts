/**
 * @persona-docs/types
 * persona-docsの共通型定義
 */

// Document
export type { Document, Section, HeadingLevel } from './document.js';
export { HEADING_LEVELS, isHeadingLevel } from './document.js';

// Scored sections
export type {
  ScoreDimension,
  SubScores,
  ScoredSection,
  RankedSection,
  SubsectionAnalysis,
} from './section.js';
export { SCORE_DIMENSIONS } from './section.js';

// Persona
export type { PersonaInput, PersonaProfile } from './persona.js';

// Analysis result
export type { AnalysisMetadata, AnalysisResult } from './analysis.js';

// Config
export type {
  PersonaDocsConfig,
  AnalysisConfig,
  WorkerConfig,
  SplitterConfig,
  ScoringWeights,
  ConfigOverrides,
} from './config.js';
export { DEFAULT_CONFIG, DEFAULT_WEIGHTS } from './config.js';
export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  validateConfig,
  assertValidConfig,
  assertValidAnalysisConfig,
  assertValidWorkerConfig,
  assertValidWeights,
  WEIGHT_SUM_EPSILON,
  type ResolveConfigOptions,
} from './config/index.js';

// API (JSON)
export type {
  CollectionInputJson,
  AnalysisOptionsJson,
  ScoreDimensionJson,
  AnalysisOutputJson,
  OutputMetadataJson,
  ExtractedSectionJson,
  SubsectionAnalysisJson,
} from './api.js';

// Errors
export { ConfigurationError, InputError, ProcessingTimeout } from './errors.js';

// Logger
export type { Logger } from './logger.js';
export { silentLogger } from './logger.js';
