/**
 * Event Handler
 * 遷移時に実行されるロジックの契約（validate → handle / error → exception）
 */

import { HandlerEscalationError } from "../errors.js";
import type { Token } from "../types/machine.js";
import type { Controller } from "../engine/controller.js";

/**
 * validate の結果
 */
export type Validation = "valid" | "invalid";

/**
 * 1ハンドラの実行結果
 * - completed: validate → handle が成功
 * - rejected: validate が invalid を返し error が呼ばれた（Run の失敗ではない）
 * - failed: handle が失敗し exception が呼ばれた
 */
export type HandlerOutcome =
  | { status: "completed" }
  | { status: "rejected" }
  | { status: "failed"; failure: unknown };

/**
 * ハンドラ関数（簡易版ハンドラの本体）
 */
export type HandlerFunction<S extends Token, E extends Token, C> = (
  controller: Controller<E>,
  context: C,
  state: S,
  event: E
) => void | Promise<void>;

/**
 * 遷移ハンドラ
 *
 * @law validate は副作用を持たない
 * @law error / exception は失敗してはならない（失敗はエンジンで捕捉されない）
 */
export abstract class EventHandler<S extends Token, E extends Token, C> {
  abstract validate(controller: Controller<E>, context: C, state: S, event: E): Validation;

  /**
   * validate が valid のときのみ呼ばれる。コンテキストの更新や controller.trigger が可能
   */
  abstract handle(controller: Controller<E>, context: C, state: S, event: E): void | Promise<void>;

  /**
   * validate が invalid のときのみ呼ばれる
   */
  abstract error(controller: Controller<E>, context: C, state: S, event: E): void;

  /**
   * handle が失敗したときのみ呼ばれる
   */
  abstract exception(
    controller: Controller<E>,
    failure: unknown,
    context: C,
    state: S,
    event: E
  ): void;

  /**
   * handle のみを持つハンドラを生成
   * 失敗経路を宣言しないため、error / exception の呼び出しはエスカレーションされる
   */
  static from<S extends Token, E extends Token, C>(
    fn: HandlerFunction<S, E, C>
  ): EventHandler<S, E, C> {
    return new FunctionHandler(fn);
  }
}

/**
 * EventHandler.from() の実装
 */
class FunctionHandler<S extends Token, E extends Token, C> extends EventHandler<S, E, C> {
  constructor(private readonly fn: HandlerFunction<S, E, C>) {
    super();
  }

  override validate(): Validation {
    return "valid";
  }

  override handle(controller: Controller<E>, context: C, state: S, event: E): void | Promise<void> {
    return this.fn(controller, context, state, event);
  }

  override error(): void {
    throw new HandlerEscalationError("This event handler should not fail!");
  }

  override exception(_controller: Controller<E>, failure: unknown): void {
    throw new HandlerEscalationError(
      "This event handler should not throw nor handle exception!",
      failure
    );
  }
}

/**
 * プロトコルに従ってハンドラを1つ実行する
 * handle の失敗のみを捕捉し、validate / error / exception の失敗はそのまま伝播させる
 */
export async function executeHandler<S extends Token, E extends Token, C>(
  handler: EventHandler<S, E, C>,
  controller: Controller<E>,
  context: C,
  state: S,
  event: E
): Promise<HandlerOutcome> {
  const validation = handler.validate(controller, context, state, event);

  switch (validation) {
    case "valid": {
      try {
        await handler.handle(controller, context, state, event);
      } catch (failure) {
        handler.exception(controller, failure, context, state, event);
        return { status: "failed", failure };
      }
      return { status: "completed" };
    }
    case "invalid":
      handler.error(controller, context, state, event);
      return { status: "rejected" };
    default:
      return assertNever(validation);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unexpected validation result: ${String(value)}`);
}
