/**
 * Machine Builder
 * 遷移テーブルとコールバックを組み立てる設定用スコープ
 */

import {
  EventHandler,
  type HandlerFunction,
} from "../handler/event-handler.js";
import type { TransitionTable } from "../table/transition-table.js";
import type {
  ExceptionCallback,
  IdleCallback,
  Token,
  TransitionAction,
  TransitionCallback,
  TransitionSpec,
} from "../types/index.js";

/**
 * build 後にマシンへ渡すコールバック
 */
export interface MachineCallbacks<S, E, SE, C> {
  onTransition?: TransitionCallback<S, E, SE, C>;
  onException?: ExceptionCallback<C, S, E>;
  onIdle?: IdleCallback<S, C>;
}

/**
 * 遷移元の状態ごとの設定ブロック
 */
export type StatesBuilder<S extends Token, E extends Token, SE extends Token, C> = (
  scope: OnEventScope<S, E, SE, C>
) => TransitionSpec<S, E, SE, C>;

/**
 * イベントごとの設定ブロック
 */
export type TransitionBuilder<S extends Token, E extends Token, SE extends Token, C> = (
  scope: TransitionScope<S, E, SE, C>
) => TransitionSpec<S, E, SE, C>;

/**
 * build() に渡すトップレベルのスコープ
 */
export class MachineBuilder<S extends Token, E extends Token, SE extends Token, C> {
  private readonly callbacks: MachineCallbacks<S, E, SE, C> = {};

  constructor(private readonly table: TransitionTable<S, E, SE, C>) {}

  /**
   * 指定した状態からの遷移を追加
   */
  from(states: readonly S[], build: StatesBuilder<S, E, SE, C>): void {
    this.table.add(states, build(new OnEventScope<S, E, SE, C>([])));
  }

  /**
   * except に含まれない全ての状態からの遷移（ワイルドカード）を追加
   */
  fromAll(except: readonly S[], build: StatesBuilder<S, E, SE, C>): void {
    this.table.add([], build(new OnEventScope<S, E, SE, C>(except)));
  }

  /**
   * 副作用を持つ遷移が完了したときのコールバック
   */
  onTransition(callback: TransitionCallback<S, E, SE, C>): void {
    this.callbacks.onTransition = callback;
  }

  /**
   * ハンドラの handle が失敗したときのコールバック
   */
  onException(callback: ExceptionCallback<C, S, E>): void {
    this.callbacks.onException = callback;
  }

  /**
   * Run が次のイベントを待つだけになったときのコールバック
   * コールバック内で finish() を呼んでもよい
   */
  onIdle(callback: IdleCallback<S, C>): void {
    this.callbacks.onIdle = callback;
  }

  /** @internal */
  collectCallbacks(): MachineCallbacks<S, E, SE, C> {
    return { ...this.callbacks };
  }
}

/**
 * 発火イベントを指定するスコープ
 */
export class OnEventScope<S extends Token, E extends Token, SE extends Token, C> {
  constructor(private readonly exceptions: readonly S[]) {}

  /**
   * events のいずれかが発火したときの遷移を設定
   */
  on(events: readonly E[], build: TransitionBuilder<S, E, SE, C>): TransitionSpec<S, E, SE, C> {
    return build(new TransitionScope<S, E, SE, C>(events, this.exceptions));
  }
}

/**
 * ハンドラと遷移先を設定するスコープ
 */
export class TransitionScope<S extends Token, E extends Token, SE extends Token, C> {
  private readonly handlers: EventHandler<S, E, C>[] = [];

  constructor(
    private readonly events: readonly E[],
    private readonly exceptions: readonly S[]
  ) {}

  /**
   * ハンドラを追加する。登録順に1つずつ実行される
   * 関数を渡した場合は EventHandler.from() でラップされる
   */
  execute(handler: EventHandler<S, E, C> | HandlerFunction<S, E, C>): void {
    this.handlers.push(
      handler instanceof EventHandler ? handler : EventHandler.from(handler)
    );
  }

  /**
   * ハンドラ実行後に to へ遷移する
   */
  goTo(to: S, effect?: SE): TransitionSpec<S, E, SE, C> {
    return this.toSpec(to, "none", effect);
  }

  /**
   * state へ遷移して Run を終了する
   */
  finishOn(state: S, effect?: SE): TransitionSpec<S, E, SE, C> {
    return this.toSpec(state, "finish", effect);
  }

  private toSpec(to: S, action: TransitionAction, effect?: SE): TransitionSpec<S, E, SE, C> {
    return {
      on: this.events,
      to,
      handlers: [...this.handlers],
      exceptions: this.exceptions,
      action,
      ...(effect !== undefined && { effect }),
    };
  }
}
