/**
 * Splitter interfaces and exports
 */

import type { Document } from '@persona-docs/types';

/**
 * Splitter interface
 */
export interface Splitter {
  split(content: string, filename: string): Document;
}

export { MarkdownSplitter } from './markdown-splitter.js';
export { TextSplitter, documentTitleFromFilename } from './text-splitter.js';
export { TokenCounter } from './token-counter.js';
