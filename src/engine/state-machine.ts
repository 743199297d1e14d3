/**
 * State Machine
 * 単一の消費ループで遷移を直列に実行する非同期ステートマシン（Facade）
 *
 * ## 実行 Law
 *
 * - 同時に実行される遷移は常に1つ
 * - 遷移中に trigger されたイベントは、その遷移の副作用コールバックと状態更新の後に処理される
 * - ハンドラが失敗しても状態は遷移先へ進む（副作用コールバックのみ抑止される）
 * - 保留イベントのキューは Run ごとに分かれる。置き換えられた Run の trigger は新しい Run に届かない
 * - Run 中のコンテキストは消費ループが占有する。呼び出し側が外部から変更してはならない
 */

import { v7 as uuidv7 } from "uuid";
import { HandlerEscalationError, StateMachineError } from "../errors.js";
import { executeHandler, type HandlerOutcome } from "../handler/event-handler.js";
import { createLogger, formatValue, type Logger } from "../logging/logger.js";
import { TransitionTable } from "../table/transition-table.js";
import type {
  ExceptionCallback,
  IdleCallback,
  RunId,
  Token,
  Transition,
  TransitionCallback,
} from "../types/index.js";
import { MachineBuilder, type MachineCallbacks } from "./builder.js";
import { Channel } from "./channel.js";
import { Controller, EventQueue } from "./controller.js";
import { EventConsumer } from "./event-consumer.js";

/**
 * State Machine オプション
 */
export interface StateMachineOptions {
  /** 未指定時は createLogger(name) */
  logger?: Logger;
}

/**
 * start() から終了までの1回分の実行
 */
interface ActiveRun<E extends Token, C> {
  readonly id: RunId;
  readonly context: C;
  readonly channel: Channel<E>;
  readonly pending: EventQueue<E>;
  readonly controller: Controller<E>;
  failed: boolean;
}

export class StateMachine<S extends Token, E extends Token, SE extends Token, C> {
  private state: S;
  private channel: Channel<E> = new Channel<E>();
  private readonly consumer: EventConsumer<E>;
  private readonly onTransition: TransitionCallback<S, E, SE, C> | undefined;
  private readonly onException: ExceptionCallback<C, S, E>;
  private readonly onIdle: IdleCallback<S, C> | undefined;
  private run: ActiveRun<E, C> | null = null;
  private task: Promise<void> | null = null;

  private constructor(
    public readonly name: string,
    public readonly initialState: S,
    private readonly table: TransitionTable<S, E, SE, C>,
    callbacks: MachineCallbacks<S, E, SE, C>,
    private readonly logger: Logger
  ) {
    this.state = initialState;
    this.consumer = new EventConsumer(this.channel, logger);
    this.onTransition = callbacks.onTransition;
    this.onIdle = callbacks.onIdle;
    this.onException =
      callbacks.onException ??
      ((_context, state, on, failure) => {
        this.logger.error(
          `State machine ${this.name} failed with no exception handlers (state ${formatValue(state)}, event ${formatValue(on)})`,
          failure
        );
      });
  }

  /**
   * マシンを構築する
   * @throws ConfigurationError - 遷移がない、または終了遷移がない場合
   */
  static build<S extends Token, E extends Token, SE extends Token, C>(
    name: string,
    initialState: S,
    configure: (builder: MachineBuilder<S, E, SE, C>) => void,
    options: StateMachineOptions = {}
  ): StateMachine<S, E, SE, C> {
    const table = new TransitionTable<S, E, SE, C>();
    const builder = new MachineBuilder(table);
    configure(builder);
    table.assertUsable(name);

    return new StateMachine(
      name,
      initialState,
      table,
      builder.collectCallbacks(),
      options.logger ?? createLogger(name)
    );
  }

  /** 現在の状態（いつでも読み取り可能） */
  get currentState(): S {
    return this.state;
  }

  /** 消費ループが動作中か */
  get isRunning(): boolean {
    return this.run !== null && !this.run.channel.isClosed;
  }

  /** 直近の Run の ID（未開始なら undefined） */
  get runId(): RunId | undefined {
    return this.run?.id;
  }

  /**
   * Run を開始する。完了を待たずに戻る
   * @throws StateMachineError - 実行中、またはチャネルがクローズ済み（reset を使う）の場合
   */
  start(event: E, context: C): void {
    if (this.isRunning) {
      throw new StateMachineError(
        `State machine ${this.name} is already running`,
        "ALREADY_RUNNING"
      );
    }
    if (this.channel.isClosed) {
      throw new StateMachineError(
        `State machine ${this.name} has been stopped; use reset() to run it again`,
        "MACHINE_STOPPED"
      );
    }

    const pending = new EventQueue<E>();
    const run: ActiveRun<E, C> = {
      id: `run-${uuidv7()}`,
      context,
      channel: this.channel,
      pending,
      controller: new Controller(pending, this.logger),
      failed: false,
    };
    this.run = run;
    this.logger.info(`Starting ${run.id} on event ${formatValue(event)}`);

    this.task = this.consumer
      .start((received) => this.dispatch(run, received))
      .catch((error: unknown) => {
        // 捕捉されない失敗: ループを止めて呼び出し側へ伝播させる
        this.logger.error(`Event consumer of ${this.name} aborted (${run.id})`, error);
        run.channel.close();
        throw error;
      });

    run.channel.send(event);
  }

  /**
   * 初期状態に戻して消費ループを停止する
   */
  finish(): void {
    this.logger.info(`Finishing machine ${this.name}...`);
    this.state = this.initialState;
    this.consumer.stop();
  }

  /**
   * 新しいチャネルで最初から実行し直す
   * 前回の Run の保留イベントはそのキューごと破棄される
   */
  reset(event: E, context: C): void {
    const previous = this.run;
    this.finish();
    this.logger.info(`Resetting state machine ${this.name}...`);
    previous?.pending.clear();
    this.channel = new Channel<E>();
    this.consumer.reset(this.channel);
    this.start(event, context);
  }

  /**
   * 現在の Run の消費ループが終わると解決される
   * 捕捉されない失敗（error / exception / コールバックの失敗）で中断した場合は reject される
   */
  whenStopped(): Promise<void> {
    return this.task ?? Promise.resolve();
  }

  /**
   * 受信したイベントを1件処理する
   */
  private async dispatch(run: ActiveRun<E, C>, event: E): Promise<void> {
    const from = this.state;
    const transition = this.table.lookup(from, event);
    if (!transition) {
      this.logger.warn(
        `No transition found for state ${formatValue(from)} on event ${formatValue(event)}`
      );
      this.onIdle?.(from, run.context);
      return;
    }

    this.logger.info(`Event ${formatValue(event)} fired!`);
    await this.runHandlers(run, transition, from, event);

    // ハンドラ実行中に finish() / reset() された場合は何も反映しない
    if (this.run !== run || run.channel.isClosed) {
      this.logger.warn(`${run.id} was stopped before its transition completed`);
      return;
    }

    if (!run.failed && transition.effect !== undefined) {
      this.logger.debug(`Triggering side effect ${formatValue(transition.effect)}...`);
      this.onTransition?.(from, event, transition.to, transition.effect, run.context);
    }

    this.logger.info(`Transiting ${formatValue(from)} -> ${formatValue(transition.to)}`);
    this.state = transition.to;

    if (run.failed || transition.action === "finish") {
      this.logger.info(`Stopping ${run.id}${run.failed ? " after failure" : ""}`);
      run.channel.close();
      return;
    }

    const next = run.pending.poll();
    if (next === undefined) {
      this.onIdle?.(this.state, run.context);
      return;
    }
    this.logger.debug(`Sending event ${formatValue(next)}...`);
    run.channel.send(next);
  }

  /**
   * ハンドラを登録順に逐次実行する。handle が失敗したら残りは実行しない
   * 失敗経路を持たないハンドラのエスカレーションも handle の失敗として扱う
   */
  private async runHandlers(
    run: ActiveRun<E, C>,
    transition: Transition<S, E, SE, C>,
    from: S,
    event: E
  ): Promise<void> {
    for (const [index, handler] of transition.handlers.entries()) {
      this.logger.debug(`Start handler #${index + 1} (${formatValue(handler)})`);
      const outcome = await executeHandler(handler, run.controller, run.context, from, event).catch(
        (error: unknown): HandlerOutcome => {
          if (error instanceof HandlerEscalationError) {
            return { status: "failed", failure: error };
          }
          throw error;
        }
      );

      switch (outcome.status) {
        case "failed":
          run.failed = true;
          this.onException(run.context, from, event, outcome.failure);
          return;
        case "rejected":
          this.logger.info(`Handler #${index + 1} rejected event ${formatValue(event)}`);
          break;
        case "completed":
          this.logger.debug(`Finishing handler #${index + 1}`);
          break;
      }
    }
  }
}
