/**
 * TaskPool
 * 独立したタスクのキューを、上限付きの数のワーカーで消化する
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { ProcessingTimeout, type Logger } from '@persona-docs/types';
import type { Deadline } from './deadline.js';

export interface TaskPoolOptions {
  /** 最大同時処理数 */
  maxConcurrent: number;
  /** 時間予算（タスクの合間にだけ確認する） */
  deadline?: Deadline;
  /** ログのプレフィックス */
  name?: string;
  logger?: Logger;
}

export interface TaskPoolResult<R> {
  /** 入力順の結果。時間切れで処理されなかったタスクはundefined */
  results: Array<R | undefined>;
  /** 完了したタスク数 */
  completed: number;
  /** 時間切れで打ち切った場合のエラー */
  timeout: ProcessingTimeout | null;
}

export class TaskPool {
  private readonly maxConcurrent: number;
  private readonly deadline: Deadline | undefined;
  private readonly name: string;
  private readonly logger: Logger;

  constructor(options: TaskPoolOptions) {
    if (!Number.isInteger(options.maxConcurrent) || options.maxConcurrent <= 0) {
      throw new Error(`maxConcurrent must be a positive integer (got ${options.maxConcurrent})`);
    }
    this.maxConcurrent = options.maxConcurrent;
    this.deadline = options.deadline;
    this.name = options.name ?? 'TaskPool';
    this.logger = options.logger ?? console;
  }

  /**
   * 全タスクを実行
   *
   * キャンセルは協調的: 時間予算はタスクの開始前にだけ確認し、
   * 実行中のタスクは中断しない。ProcessingTimeout以外のエラーはそのまま伝播する
   */
  async run<T, R>(
    items: readonly T[],
    task: (item: T, index: number) => R | Promise<R>
  ): Promise<TaskPoolResult<R>> {
    const results = new Array<R | undefined>(items.length).fill(undefined);
    const state: { next: number; completed: number; timeout: ProcessingTimeout | null } = {
      next: 0,
      completed: 0,
      timeout: null,
    };

    const worker = async (): Promise<void> => {
      while (state.timeout === null && state.next < items.length) {
        try {
          this.deadline?.check();
        } catch (error) {
          if (error instanceof ProcessingTimeout) {
            state.timeout = error;
            return;
          }
          throw error;
        }

        const index = state.next++;
        results[index] = await task(items[index], index);
        state.completed++;

        // 他のワーカーと時間予算の確認に制御を渡す
        await yieldToEventLoop();
      }
    };

    const workerCount = Math.min(this.maxConcurrent, items.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (state.timeout) {
      this.logger.warn(
        `[${this.name}] Time budget exceeded: ${state.completed}/${items.length} tasks completed`
      );
    }

    return {
      results,
      completed: state.completed,
      timeout: state.timeout,
    };
  }
}
