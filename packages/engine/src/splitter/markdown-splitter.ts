import { marked, type Token, type Tokens } from 'marked';
import { nanoid } from 'nanoid';
import type { Document, HeadingLevel, Logger, Section, SplitterConfig } from '@persona-docs/types';
import { previewHeading } from '../text/sentences.js';
import type { Splitter } from './index.js';
import { documentTitleFromFilename } from './text-splitter.js';
import { TokenCounter } from './token-counter.js';

/** ページ区切りのマーカー（例: <!-- page 3 -->） */
const PAGE_MARKER_PATTERN = /<!--\s*page\s+(\d+)\s*-->/i;

interface SectionDraft {
  /** 0は見出しのない前文の段落 */
  depth: number;
  heading: string;
  pageNumber: number;
  content: string[];
}

const LEVEL_BY_DEPTH: Record<number, HeadingLevel> = {
  0: 'paragraph',
  1: 'H1',
  2: 'H2',
  3: 'H3',
};

/**
 * Markdownを章立てベースでセクションに分割するクラス
 *
 * - H1〜H3（maxDepthまで）の見出しごとに1セクション。本文は次の見出しまで
 * - それより深い見出しは親セクションの本文に含める
 * - 最初の見出しより前の段落はそれぞれparagraphセクション
 * - 唯一のH1が最初の見出しなら、それを文書タイトル（titleセクション）とする
 */
export class MarkdownSplitter implements Splitter {
  private readonly tokenCounter: TokenCounter;
  private readonly logger: Logger;

  constructor(
    private readonly config: SplitterConfig,
    logger: Logger = console
  ) {
    this.logger = logger;
    this.tokenCounter = new TokenCounter(logger);
  }

  /**
   * Markdownを分割
   * @param content Markdownテキスト
   * @param filename 文書のファイル名
   */
  split(content: string, filename: string): Document {
    // 1. Markdownをパース
    const tokens = marked.lexer(content);

    // 2. 見出しごとの下書きを作る
    const drafts = this.collectDrafts(tokens);

    // 3. タイトルを決めてセクションに変換
    const headingDrafts = drafts.filter((draft) => draft.depth > 0);
    const h1Drafts = headingDrafts.filter((draft) => draft.depth === 1);
    const titleDraft =
      h1Drafts.length === 1 && headingDrafts[0] === h1Drafts[0] ? h1Drafts[0] : null;

    const title = titleDraft?.heading ?? h1Drafts[0]?.heading ?? documentTitleFromFilename(filename);

    const sections = drafts.map((draft, position): Section => {
      const body = draft.content.join('\n\n').trim();
      const isTitle = draft === titleDraft;
      const section: Section = {
        id: nanoid(),
        documentFilename: filename,
        heading: draft.heading,
        headingLevel: isTitle ? 'title' : LEVEL_BY_DEPTH[draft.depth],
        pageNumber: draft.pageNumber,
        text: isTitle && !body ? draft.heading : body,
        position,
      };
      this.warnIfOversized(section);
      return section;
    });

    return { filename, title, sections };
  }

  /**
   * トークン列を見出し単位の下書きにまとめる
   */
  private collectDrafts(tokens: Token[]): SectionDraft[] {
    const drafts: SectionDraft[] = [];
    const maxDepth = Math.min(3, this.config.maxDepth);
    let current: SectionDraft | null = null;
    let pageNumber = 1;

    for (const token of tokens) {
      const raw = 'raw' in token && typeof token.raw === 'string' ? token.raw : '';

      if (token.type === 'html') {
        const marker = PAGE_MARKER_PATTERN.exec(raw);
        if (marker) {
          pageNumber = Math.max(1, parseInt(marker[1], 10));
          continue;
        }
      }

      if (token.type === 'heading') {
        const heading = token as Tokens.Heading;
        if (heading.depth <= maxDepth) {
          current = {
            depth: heading.depth,
            heading: heading.text.trim(),
            pageNumber,
            content: [],
          };
          drafts.push(current);
          continue;
        }
        // maxDepthより深い見出しは本文として扱う
      }

      if (token.type === 'space') {
        continue;
      }

      const text = raw.trim();
      if (!text) {
        continue;
      }

      if (current) {
        current.content.push(text);
      } else {
        // 見出しのない前文
        drafts.push({
          depth: 0,
          heading: previewHeading(text),
          pageNumber,
          content: [text],
        });
      }
    }

    return drafts;
  }

  private warnIfOversized(section: Section): void {
    const tokenCount = this.tokenCounter.count(section.text);
    if (tokenCount > this.config.maxTokensPerSection) {
      this.logger.warn(
        `[MarkdownSplitter] Section "${section.heading}" in ${section.documentFilename} exceeds maxTokensPerSection (${tokenCount} > ${this.config.maxTokensPerSection})`
      );
    }
  }
}
