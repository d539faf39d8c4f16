/**
 * ログ出力先
 *
 * デフォルトはconsole。CLIの--quietやテストではsilentLoggerを渡す
 */
export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
