/**
 * エラー定義
 * エンジン全体で共通の形（name / code / cause）を持つ
 */

/** ConfigurationError のエラーコード */
export type ConfigurationErrorCode =
  | "EMPTY_TRANSITION_TABLE"
  | "MISSING_FINISH_TRANSITION";

/**
 * 遷移テーブルの構築時エラー
 * build() から同期的に送出され、マシンは返されない
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigurationErrorCode,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "ConfigurationError";
  }
}

/** StateMachineError のエラーコード */
export type StateMachineErrorCode = "ALREADY_RUNNING" | "MACHINE_STOPPED";

/**
 * ライフサイクル操作の誤用
 */
export class StateMachineError extends Error {
  constructor(
    message: string,
    public readonly code: StateMachineErrorCode,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "StateMachineError";
  }
}

/**
 * 失敗経路を宣言していないハンドラが error / exception を呼ばれた
 * プログラミングエラーとして扱い、エンジンは捕捉しない
 */
export class HandlerEscalationError extends Error {
  public readonly code = "HANDLER_ESCALATION";

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "HandlerEscalationError";
  }
}

/**
 * クローズ済みチャネルへの送信
 */
export class ChannelClosedError extends Error {
  public readonly code = "CHANNEL_CLOSED";

  constructor(message: string) {
    super(message);
    this.name = "ChannelClosedError";
  }
}
