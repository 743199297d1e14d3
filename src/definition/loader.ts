/**
 * Machine 定義からステートマシンを構築する
 */

import { StateMachine, type StateMachineOptions } from "../engine/state-machine.js";
import type { TransitionScope } from "../engine/builder.js";
import { EventHandler } from "../handler/event-handler.js";
import type {
  ExceptionCallback,
  IdleCallback,
  TransitionCallback,
  TransitionSpec,
} from "../types/index.js";
import {
  DefinitionParseError,
  type MachineDefinition,
  type TransitionDefinition,
} from "./parser.js";

/** 定義から構築されるマシンの型（状態・イベント・副作用は文字列） */
export type DefinedMachine<C> = StateMachine<string, string, string, C>;

/** 名前で参照されるハンドラ */
export type HandlerRegistry<C> = Readonly<Record<string, EventHandler<string, string, C>>>;

/**
 * 構築オプション
 */
export interface BuildFromDefinitionOptions<C> extends StateMachineOptions {
  handlers?: HandlerRegistry<C>;
  onTransition?: TransitionCallback<string, string, string, C>;
  onException?: ExceptionCallback<C, string, string>;
  onIdle?: IdleCallback<string, C>;
}

/**
 * マシン定義からステートマシンを構築する
 * @throws DefinitionParseError - 未登録のハンドラ名を参照している場合
 * @throws ConfigurationError - 遷移テーブルが不変条件を満たさない場合
 */
export function buildFromDefinition<C>(
  definition: MachineDefinition,
  options: BuildFromDefinitionOptions<C> = {}
): DefinedMachine<C> {
  const registry = options.handlers ?? {};
  const resolved = definition.transitions.map((t, index) => ({
    definition: t,
    handlers: resolveHandlers(t, index, registry),
  }));

  const machineOptions: StateMachineOptions = {};
  if (options.logger !== undefined) {
    machineOptions.logger = options.logger;
  }

  return StateMachine.build<string, string, string, C>(
    definition.name,
    definition.initialState,
    (machine) => {
      for (const { definition: t, handlers } of resolved) {
        const build = (scope: TransitionScope<string, string, string, C>) =>
          configureTransition(scope, t, handlers);
        if (t.from === undefined) {
          machine.fromAll(t.except ?? [], (states) => states.on(t.on, build));
        } else {
          machine.from(t.from, (states) => states.on(t.on, build));
        }
      }
      if (options.onTransition) {
        machine.onTransition(options.onTransition);
      }
      if (options.onException) {
        machine.onException(options.onException);
      }
      if (options.onIdle) {
        machine.onIdle(options.onIdle);
      }
    },
    machineOptions
  );
}

/**
 * ハンドラ名をレジストリから解決する
 */
function resolveHandlers<C>(
  transition: TransitionDefinition,
  index: number,
  registry: HandlerRegistry<C>
): EventHandler<string, string, C>[] {
  return transition.handlers.map((name) => {
    const handler = Object.hasOwn(registry, name) ? registry[name] : undefined;
    if (!handler) {
      throw new DefinitionParseError(
        `Handler '${name}' referenced by transitions[${index}] is not registered`,
        "UNKNOWN_HANDLER"
      );
    }
    return handler;
  });
}

function configureTransition<C>(
  scope: TransitionScope<string, string, string, C>,
  transition: TransitionDefinition,
  handlers: EventHandler<string, string, C>[]
): TransitionSpec<string, string, string, C> {
  for (const handler of handlers) {
    scope.execute(handler);
  }
  if (transition.trigger.length > 0) {
    const events = [...transition.trigger];
    scope.execute(
      EventHandler.from<string, string, C>((controller) => {
        for (const event of events) {
          controller.trigger(event);
        }
      })
    );
  }
  return transition.finish
    ? scope.finishOn(transition.to, transition.effect)
    : scope.goTo(transition.to, transition.effect);
}
