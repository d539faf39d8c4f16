/**
 * エラー定義
 *
 * ConfigurationError / InputError はスコアリング開始前に送出され、実行を中断する。
 * ProcessingTimeout はパイプライン内で回収され、部分結果に格下げされる。
 */

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InputError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'InputError';
  }
}

export class ProcessingTimeout extends Error {
  constructor(
    message: string,
    /** 経過時間（ミリ秒） */
    public readonly elapsedMs: number
  ) {
    super(message);
    this.name = 'ProcessingTimeout';
  }
}
