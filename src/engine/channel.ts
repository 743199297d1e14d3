/**
 * Channel
 * 上限なしの非同期キュー。受信側は1つ（EventConsumer）を想定
 */

import { ChannelClosedError } from "../errors.js";
import type { Token } from "../types/index.js";

/**
 * receive() の結果
 */
export type ReceiveResult<T> = { closed: false; value: T } | { closed: true };

export class Channel<T extends Token> {
  private readonly buffer: T[] = [];
  private readonly receivers: Array<(result: ReceiveResult<T>) => void> = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * 値を送信する（待機中の受信者がいれば直接渡す）
   * @throws ChannelClosedError - クローズ済みの場合
   */
  send(value: T): void {
    if (this.closed) {
      throw new ChannelClosedError("Cannot send to a closed channel");
    }
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ closed: false, value });
      return;
    }
    this.buffer.push(value);
  }

  /**
   * 次の値を待つ。クローズされると { closed: true } で解決される
   */
  receive(): Promise<ReceiveResult<T>> {
    if (this.closed) {
      return Promise.resolve({ closed: true });
    }
    const value = this.buffer.shift();
    if (value !== undefined) {
      return Promise.resolve({ closed: false, value });
    }
    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * チャネルを閉じる。未受信の値は破棄され、待機中の受信者は closed で解決される
   * 2回目以降の呼び出しは何もしない
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.buffer.length = 0;
    const waiting = this.receivers.splice(0);
    for (const resolve of waiting) {
      resolve({ closed: true });
    }
  }
}
