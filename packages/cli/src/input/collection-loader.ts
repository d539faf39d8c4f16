/**
 * 入力JSON（文書リスト・ペルソナ・タスク・設定ブロック）の読み込み
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import {
  InputError,
  HEADING_LEVELS,
  type AnalysisOptionsJson,
  type CollectionInputJson,
  type ConfigOverrides,
  type Document,
  type Logger,
  type ScoringWeights,
  type SplitterConfig,
} from '@persona-docs/types';
import { MarkdownSplitter, TextSplitter, type Splitter } from '@persona-docs/engine';

const WeightsSchema = z
  .object({
    semantic_similarity: z.number().optional(),
    content_quality: z.number().optional(),
    persona_alignment: z.number().optional(),
    section_type_weight: z.number().optional(),
    position_importance: z.number().optional(),
    length_appropriateness: z.number().optional(),
  })
  .strict();

const AnalysisOptionsSchema = z
  .object({
    top_k: z.number().optional(),
    weights: WeightsSchema.optional(),
    ideal_length: z.number().optional(),
    per_document_cap: z.number().nullable().optional(),
    time_budget_seconds: z.number().optional(),
    max_refined_length: z.number().optional(),
  })
  .strict();

const CollectionInputSchema = z.object({
  documents: z
    .array(
      z.object({
        filename: z.string().min(1),
        title: z.string().optional(),
      })
    )
    .min(1),
  persona: z.object({ role: z.string() }),
  job_to_be_done: z.object({ task: z.string() }),
  config: AnalysisOptionsSchema.optional(),
});

/** 解析済み文書（.json）の形式 */
const PreparsedDocumentSchema = z.object({
  title: z.string().optional(),
  sections: z.array(
    z.object({
      heading: z.string(),
      headingLevel: z.enum(HEADING_LEVELS),
      pageNumber: z.number().int().min(1),
      text: z.string(),
      position: z.number().int().min(0).optional(),
    })
  ),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * 入力JSONを検証
 * @throws InputError 形式が不正な場合
 */
export function parseCollectionInput(data: unknown): CollectionInputJson {
  const result = CollectionInputSchema.safeParse(data);
  if (!result.success) {
    throw new InputError(`Invalid collection input: ${formatIssues(result.error)}`, result.error.issues);
  }
  return result.data;
}

/**
 * 入力JSONのconfigブロックを設定の上書きに変換
 */
export function toConfigOverrides(options: AnalysisOptionsJson | undefined): ConfigOverrides {
  if (!options) {
    return {};
  }

  const weights: Partial<ScoringWeights> = {};
  if (options.weights) {
    const w = options.weights;
    if (w.semantic_similarity !== undefined) weights.semanticSimilarity = w.semantic_similarity;
    if (w.content_quality !== undefined) weights.contentQuality = w.content_quality;
    if (w.persona_alignment !== undefined) weights.personaAlignment = w.persona_alignment;
    if (w.section_type_weight !== undefined) weights.sectionTypeWeight = w.section_type_weight;
    if (w.position_importance !== undefined) weights.positionImportance = w.position_importance;
    if (w.length_appropriateness !== undefined) weights.lengthAppropriateness = w.length_appropriateness;
  }

  const analysis: NonNullable<ConfigOverrides['analysis']> = { weights };
  if (options.top_k !== undefined) analysis.topK = options.top_k;
  if (options.ideal_length !== undefined) analysis.idealLength = options.ideal_length;
  if (options.per_document_cap !== undefined) analysis.perDocumentCap = options.per_document_cap;
  if (options.max_refined_length !== undefined) analysis.maxRefinedLength = options.max_refined_length;

  const overrides: ConfigOverrides = { analysis };
  if (options.time_budget_seconds !== undefined) {
    overrides.worker = { timeBudgetSeconds: options.time_budget_seconds };
  }
  return overrides;
}

/**
 * 解析済み文書のJSONを文書に変換
 * セクションIDは「ファイル名#position」
 * @throws InputError 形式が不正な場合
 */
export function parsePreparsedDocument(data: unknown, filename: string): Document {
  const result = PreparsedDocumentSchema.safeParse(data);
  if (!result.success) {
    throw new InputError(`Invalid document ${filename}: ${formatIssues(result.error)}`, result.error.issues);
  }

  return {
    filename,
    title: result.data.title ?? filename,
    sections: result.data.sections.map((section, index) => {
      const position = section.position ?? index;
      return {
        id: `${filename}#${position}`,
        documentFilename: filename,
        heading: section.heading,
        headingLevel: section.headingLevel,
        pageNumber: section.pageNumber,
        text: section.text,
        position,
      };
    }),
  };
}

export interface LoadDocumentsOptions {
  /** 文書ファイルのディレクトリ */
  inputDir: string;
  splitter: SplitterConfig;
  logger?: Logger;
}

/**
 * 入力JSONの文書リストに従って文書ファイルを読み込む
 * 拡張子で分割方法を選ぶ: .md/.markdown → Markdown、.txt → テキスト、.json → 解析済み
 * @throws InputError ファイルがない、または未対応の形式の場合
 */
export async function loadDocuments(
  input: CollectionInputJson,
  options: LoadDocumentsOptions
): Promise<Document[]> {
  const logger = options.logger ?? console;
  const markdownSplitter = new MarkdownSplitter(options.splitter, logger);
  const textSplitter = new TextSplitter();

  const documents: Document[] = [];
  for (const entry of input.documents) {
    const filePath = path.resolve(options.inputDir, entry.filename);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new InputError(`Document not found: ${filePath}`);
      }
      throw error;
    }

    const document = parseDocumentContent(content, entry.filename, markdownSplitter, textSplitter);
    logger.log(`[CollectionLoader] Loaded ${entry.filename} (${document.sections.length} sections)`);

    documents.push(entry.title ? { ...document, title: entry.title } : document);
  }

  return documents;
}

function parseDocumentContent(
  content: string,
  filename: string,
  markdownSplitter: Splitter,
  textSplitter: Splitter
): Document {
  const extension = path.extname(filename).toLowerCase();
  switch (extension) {
    case '.md':
    case '.markdown':
      return markdownSplitter.split(content, filename);
    case '.txt':
      return textSplitter.split(content, filename);
    case '.json': {
      let parsed: unknown;
      try {
        parsed = JSON.parse(content);
      } catch (error) {
        throw new InputError(`Invalid JSON in document ${filename}`, error);
      }
      return parsePreparsedDocument(parsed, filename);
    }
    default:
      throw new InputError(
        `Unsupported document type "${extension}" for ${filename} (expected .md, .markdown, .txt or pre-parsed .json)`
      );
  }
}

/**
 * 入力JSONファイルを読み込んで検証
 */
export async function readCollectionInput(inputPath: string): Promise<CollectionInputJson> {
  let content: string;
  try {
    content = await fs.readFile(inputPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new InputError(`Input file not found: ${inputPath}`);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new InputError(`Invalid JSON in input file: ${inputPath}`, error);
  }
  return parseCollectionInput(parsed);
}
