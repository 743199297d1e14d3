/**
 * Controller
 * ハンドラに公開する唯一の操作（イベントの遅延投入）
 */

import type { Token } from "../types/index.js";
import { formatValue, type Logger } from "../logging/logger.js";

/**
 * 保留イベントのキュー（FIFO）
 * 単一スレッドのため排他は不要。ループは1遷移ごとに1件だけ取り出す
 */
export class EventQueue<E extends Token> {
  private readonly items: E[] = [];

  add(event: E): void {
    this.items.push(event);
  }

  /**
   * 先頭のイベントを取り出す（空なら undefined）
   */
  poll(): E | undefined {
    return this.items.shift();
  }

  clear(): void {
    this.items.length = 0;
  }

  get size(): number {
    return this.items.length;
  }
}

/**
 * ハンドラ向けの制限付きインターフェース
 * チャネルへは直接書き込まず、キューへの追加のみを行う
 */
export class Controller<E extends Token> {
  constructor(
    private readonly queue: EventQueue<E>,
    private readonly logger: Logger
  ) {}

  /**
   * 現在の遷移の完了後に処理されるイベントを投入
   */
  trigger(event: E): void {
    this.logger.debug(`Enqueuing event ${formatValue(event)}...`);
    this.queue.add(event);
  }
}
