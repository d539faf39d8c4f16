import * as path from 'path';
import { nanoid } from 'nanoid';
import type { Document, Section } from '@persona-docs/types';
import { previewHeading, splitParagraphs } from '../text/sentences.js';
import type { Splitter } from './index.js';

/** ページ区切り（フォームフィード） */
const PAGE_BREAK = '\f';

/**
 * ファイル名から拡張子を除いたものをタイトルとする
 */
export function documentTitleFromFilename(filename: string): string {
  return path.basename(filename, path.extname(filename));
}

/**
 * プレーンテキストを段落ごとのセクションに分割するクラス
 * フォームフィードでページ番号を進める
 */
export class TextSplitter implements Splitter {
  split(content: string, filename: string): Document {
    const sections: Section[] = [];

    content.split(PAGE_BREAK).forEach((page, pageIndex) => {
      for (const paragraph of splitParagraphs(page)) {
        sections.push({
          id: nanoid(),
          documentFilename: filename,
          heading: previewHeading(paragraph),
          headingLevel: 'paragraph',
          pageNumber: pageIndex + 1,
          text: paragraph,
          position: sections.length,
        });
      }
    });

    return {
      filename,
      title: documentTitleFromFilename(filename),
      sections,
    };
  }
}
