/**
 * Event Consumer
 * チャネルからイベントを1件ずつ受信し、処理が終わるまで次を受信しない
 */

import type { Token } from "../types/index.js";
import { formatValue, type Logger } from "../logging/logger.js";
import type { Channel } from "./channel.js";

export class EventConsumer<E extends Token> {
  constructor(
    private channel: Channel<E>,
    private readonly logger: Logger
  ) {}

  /**
   * 受信ループを開始する
   * チャネルがクローズされると onClose を呼んで終了する。
   * onReceive の失敗は捕捉せず、返り値の Promise が reject される
   */
  async start(
    onReceive: (event: E) => Promise<void>,
    onClose?: () => void
  ): Promise<void> {
    // ループは開始時点のチャネルに束縛される（reset 後の新チャネルとは独立）
    const channel = this.channel;
    this.logger.debug("Starting event consumer...");

    for (;;) {
      const received = await channel.receive();
      if (received.closed) {
        this.logger.debug("Channel closed to receive events");
        onClose?.();
        return;
      }

      this.logger.debug(`Event ${formatValue(received.value)} received`);
      await onReceive(received.value);
    }
  }

  /**
   * 次回 start() で使うチャネルを差し替える
   */
  reset(channel: Channel<E>): void {
    this.channel = channel;
  }

  stop(): void {
    this.channel.close();
  }
}
