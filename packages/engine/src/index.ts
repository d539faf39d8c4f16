/**
 * @persona-docs/engine
 * ペルソナ駆動の文書解析エンジン
 */

// Pipeline
export {
  DocumentAnalyzer,
  type AnalyzeRequest,
  type DocumentAnalyzerOptions,
} from './analyzer/document-analyzer.js';
export { validateDocuments, EXPECTED_DOCUMENT_RANGE } from './analyzer/input-validator.js';

// Persona
export {
  PersonaProfileBuilder,
  buildQueryText,
  totalProfileWeight,
  LITERAL_TOKEN_WEIGHT,
} from './persona/profile-builder.js';
export {
  loadDefaultLexicon,
  parseLexicon,
  matchesCategory,
  type Lexicon,
  type LexiconCategory,
  type LexiconCategoryKind,
} from './persona/lexicon.js';

// Matching
export { SemanticMatcher, sectionMatchingText, type SemanticMatcherOptions } from './matcher/semantic-matcher.js';
export { TfidfVectorizer, cosineSimilarity, type SparseVector } from './matcher/tfidf-vectorizer.js';
export { VectorCache } from './matcher/vector-cache.js';

// Scoring / ranking / extraction
export {
  RelevanceScorer,
  SECTION_TYPE_WEIGHTS,
  contentQuality,
  personaAlignment,
  positionImportance,
  lengthAppropriateness,
  combineScores,
  type RelevanceScorerOptions,
  type SectionContext,
} from './scoring/relevance-scorer.js';
export { SectionRanker, compareScoredSections, type SectionRankerOptions } from './ranking/section-ranker.js';
export {
  SubsectionExtractor,
  reducedWeights,
  truncateAtWordBoundary,
  type SubsectionExtractorOptions,
} from './extraction/subsection-extractor.js';

// Worker
export { TaskPool, type TaskPoolOptions, type TaskPoolResult } from './worker/task-pool.js';
export { Deadline } from './worker/deadline.js';

// Output
export { toOutputJson, serializeResult, roundScore } from './output/serializer.js';

// Splitter
export {
  MarkdownSplitter,
  TextSplitter,
  TokenCounter,
  documentTitleFromFilename,
  type Splitter,
} from './splitter/index.js';

// Text
export { tokenize, extractWords, isStopword } from './text/tokenizer.js';
export { splitIntoChunks, splitParagraphs, splitSentences, previewHeading } from './text/sentences.js';
