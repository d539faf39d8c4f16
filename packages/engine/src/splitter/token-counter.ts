import { encode } from 'gpt-tokenizer';
import type { Logger } from '@persona-docs/types';

/**
 * トークン数をカウントするクラス
 * セクションの大きさの警告に使う
 */
export class TokenCounter {
  constructor(private readonly logger: Logger = console) {}

  /**
   * テキストのトークン数を計測
   * 失敗時は文字数の1/4を概算値として返す
   */
  count(text: string): number {
    try {
      return encode(text).length;
    } catch (error) {
      this.logger.warn('[TokenCounter] Token counting failed, using character count / 4 as fallback:', error);
      return Math.ceil(text.length / 4);
    }
  }
}
