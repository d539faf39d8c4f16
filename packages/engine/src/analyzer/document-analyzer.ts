/**
 * DocumentAnalyzer
 * ペルソナ駆動の文書解析パイプライン
 *
 * 1. 検証（設定・入力）: 失敗時はスコアリング前に中断
 * 2. バリアフェーズ: プロファイル構築、ベクトライザのfit
 * 3. 並列フェーズ: セクションのスコアリング → 順位付け → サブセクション抽出
 */

import {
  assertValidAnalysisConfig,
  assertValidWorkerConfig,
  ConfigLoader,
  type AnalysisResult,
  type Document,
  type Logger,
  type PersonaDocsConfig,
  type PersonaInput,
  type RankedSection,
  type ScoredSection,
  type Section,
  type SubsectionAnalysis,
} from '@persona-docs/types';
import { SubsectionExtractor } from '../extraction/subsection-extractor.js';
import { SemanticMatcher, sectionMatchingText } from '../matcher/semantic-matcher.js';
import { VectorCache } from '../matcher/vector-cache.js';
import type { SparseVector } from '../matcher/tfidf-vectorizer.js';
import type { Lexicon } from '../persona/lexicon.js';
import { PersonaProfileBuilder, buildQueryText } from '../persona/profile-builder.js';
import { SectionRanker } from '../ranking/section-ranker.js';
import { RelevanceScorer, type SectionContext } from '../scoring/relevance-scorer.js';
import { Deadline } from '../worker/deadline.js';
import { TaskPool } from '../worker/task-pool.js';
import { validateDocuments } from './input-validator.js';

export interface AnalyzeRequest {
  documents: readonly Document[];
  persona: PersonaInput;
}

export interface DocumentAnalyzerOptions {
  /** 検証済みの設定（デフォルト: DEFAULT_CONFIG） */
  config?: PersonaDocsConfig;
  logger?: Logger;
  /** 時刻の取得（テスト用、デフォルト: Date.now） */
  now?: () => number;
  /** レキシコン（デフォルト: 同梱のlexicon.json） */
  lexicon?: Lexicon;
}

interface SectionTask {
  section: Section;
  context: SectionContext;
}

export class DocumentAnalyzer {
  private readonly config: PersonaDocsConfig;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly profileBuilder: PersonaProfileBuilder;

  /**
   * @throws ConfigurationError 設定が不正な場合
   */
  constructor(options: DocumentAnalyzerOptions = {}) {
    this.config = options.config ?? ConfigLoader.getDefaultConfig();
    assertValidAnalysisConfig(this.config.analysis);
    assertValidWorkerConfig(this.config.worker);

    this.logger = options.logger ?? console;
    this.now = options.now ?? Date.now;
    this.profileBuilder = new PersonaProfileBuilder(options.lexicon);
  }

  /**
   * 文書コレクションを解析
   * @throws ConfigurationError ペルソナが空の場合
   * @throws InputError 文書コレクションが不正な場合
   */
  async analyze(request: AnalyzeRequest): Promise<AnalysisResult> {
    const { analysis, worker } = this.config;
    const deadline = Deadline.fromSeconds(worker.timeBudgetSeconds, this.now);

    // 1. 検証
    const profile = this.profileBuilder.build(request.persona);
    const totalSections = validateDocuments(request.documents, this.logger);

    this.logger.log(
      `[DocumentAnalyzer] Analyzing ${request.documents.length} documents (${totalSections} sections) for "${profile.role}"`
    );

    // 2. バリア: コーパス全体でfit
    const matcher = new SemanticMatcher({
      cache: new VectorCache<SparseVector>(),
      prefilter: analysis.prefilter,
    });
    const tasks = this.collectTasks(request.documents);
    matcher.fit(
      tasks.map((task) => sectionMatchingText(task.section)),
      buildQueryText(profile)
    );
    this.logger.log(
      `[DocumentAnalyzer] Vocabulary built (${matcher.vocabularySize} terms, focus: ${[...profile.focusTags].join(', ') || 'none'})`
    );

    const scorer = new RelevanceScorer(matcher, profile, {
      weights: analysis.weights,
      idealLength: analysis.idealLength,
    });
    const ranker = new SectionRanker({
      topK: analysis.topK,
      perDocumentCap: analysis.perDocumentCap,
    });
    const extractor = new SubsectionExtractor(matcher, profile, {
      weights: analysis.weights,
      maxRefinedLength: analysis.maxRefinedLength,
    });

    // 3. 並列フェーズ: スコアリング
    const scoringPool = new TaskPool({
      maxConcurrent: worker.maxConcurrent,
      deadline,
      name: 'ScoringPool',
      logger: this.logger,
    });
    const scoring = await scoringPool.run(tasks, (task) =>
      scorer.score(task.section, task.context)
    );
    const scored = scoring.results.filter(
      (result): result is ScoredSection => result !== undefined
    );

    // 4. 順位付け
    const ranked = ranker.rank(scored);

    // 5. 並列フェーズ: サブセクション抽出
    const extractionPool = new TaskPool({
      maxConcurrent: worker.maxConcurrent,
      deadline,
      name: 'ExtractionPool',
      logger: this.logger,
    });
    const extraction = await extractionPool.run(ranked, (section) => extractor.extract(section));
    const subsections = extraction.results.filter(
      (result): result is SubsectionAnalysis => result !== undefined
    );

    const partial = scoring.timeout !== null || extraction.timeout !== null;
    this.logger.log(
      `[DocumentAnalyzer] Selected ${ranked.length}/${scored.length} sections ` +
      `(${matcher.vectorCache.computeCount} vectors computed${partial ? ', partial result' : ''})`
    );

    return this.buildResult(request, profile.role, profile.task, scored.length, ranked, subsections, partial);
  }

  /**
   * 全セクションを文書の入力順・文書内の順に並べる
   */
  private collectTasks(documents: readonly Document[]): SectionTask[] {
    const tasks: SectionTask[] = [];
    documents.forEach((document, documentIndex) => {
      document.sections.forEach((section, ordinal) => {
        tasks.push({
          section,
          context: { documentIndex, ordinal, sectionCount: document.sections.length },
        });
      });
    });
    return tasks;
  }

  /**
   * 結果を構築してネストしたオブジェクトまでfreezeする
   * 入力のSectionはコピーしてからfreezeする
   */
  private buildResult(
    request: AnalyzeRequest,
    role: string,
    task: string,
    totalSectionsAnalyzed: number,
    ranked: RankedSection[],
    subsections: SubsectionAnalysis[],
    partial: boolean
  ): AnalysisResult {
    const result: AnalysisResult = {
      metadata: Object.freeze({
        inputDocuments: Object.freeze(request.documents.map((document) => document.filename)),
        persona: role,
        jobToBeDone: task,
        processingTimestamp: new Date(this.now()).toISOString(),
        totalSectionsAnalyzed,
        topSectionsSelected: ranked.length,
        partial,
      }),
      extractedSections: Object.freeze(
        ranked.map((entry) =>
          Object.freeze({
            ...entry,
            section: Object.freeze({ ...entry.section }),
            scores: Object.freeze({ ...entry.scores }),
          })
        )
      ),
      subsectionAnalysis: Object.freeze(
        subsections.map((subsection) =>
          Object.freeze({ ...subsection, section: Object.freeze({ ...subsection.section }) })
        )
      ),
    };
    return Object.freeze(result);
  }
}
