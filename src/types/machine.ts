/**
 * ステートマシンの型定義
 *
 * ## 遷移テーブル Law（不変条件）
 *
 * - `size(table) >= 1` - 遷移が1件以上存在する
 * - `∃t ∈ table: t.action = "finish"` - 終了遷移が1件以上存在する
 *
 * @grounding TransitionTable.assertUsable() で build 時に検証
 *
 * ## 探索 Law
 *
 * - 状態固有のリストを先に探索し、`on` にイベントを含む最初の遷移を採用する
 * - 見つからない場合のみワイルドカード（キー null）を探索する
 * - ワイルドカード遷移は `exceptions` に現在状態を含む場合は対象外
 */

import type { EventHandler } from "../handler/event-handler.js";

/**
 * 状態・イベント・副作用に使える値
 * null はワイルドカードのキーとして予約されている
 */
export type Token = NonNullable<unknown>;

/**
 * 遷移後にマシンが行うこと
 * - none: 次の保留イベントを処理する
 * - finish: 今回の Run を終了する
 */
export type TransitionAction = "none" | "finish";

/**
 * 構築済みの遷移（build 後は不変）
 */
export interface Transition<S extends Token, E extends Token, SE extends Token, C> {
  /** ワイルドカード遷移で対象外とする状態 */
  readonly exceptions: ReadonlySet<S>;
  /** この遷移を発火させるイベント */
  readonly on: ReadonlySet<E>;
  /** 登録順に逐次実行されるハンドラ */
  readonly handlers: readonly EventHandler<S, E, C>[];
  /** 遷移先 */
  readonly to: S;
  /** onTransition に渡す副作用（なければコールバックは呼ばれない） */
  readonly effect?: SE;
  readonly action: TransitionAction;
}

/**
 * 遷移の入力（TransitionTable.add の引数）
 */
export interface TransitionSpec<S extends Token, E extends Token, SE extends Token, C> {
  on: Iterable<E>;
  to: S;
  handlers?: readonly EventHandler<S, E, C>[];
  effect?: SE;
  action?: TransitionAction;
  /** fromStates が空の場合のみ意味を持つ */
  exceptions?: Iterable<S>;
}

/**
 * 遷移完了時のコールバック
 * 副作用を持つ遷移が失敗せずに完了したときのみ呼ばれる
 */
export type TransitionCallback<S, E, SE, C> = (
  current: S,
  on: E,
  target: S,
  effect: SE,
  context: C
) => void;

/**
 * ハンドラの handle が失敗したときのコールバック
 */
export type ExceptionCallback<C, S, E> = (
  context: C,
  state: S,
  on: E,
  failure: unknown
) => void;

/**
 * 処理中のイベントがなくなったときのコールバック
 * 遷移が見つからずイベントが破棄された場合と、終了しない遷移の後に保留イベントがない場合に呼ばれる
 */
export type IdleCallback<S, C> = (state: S, context: C) => void;

/**
 * Run ID の形式: run-{UUIDv7}
 */
export type RunId = `run-${string}`;
