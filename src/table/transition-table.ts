/**
 * Transition Table
 * 遷移元の状態（null = ワイルドカード）から遷移リストへの対応
 * @see src/types/machine.ts の Law コメント
 */

import { ConfigurationError } from "../errors.js";
import type { Token, Transition, TransitionSpec } from "../types/index.js";

export class TransitionTable<S extends Token, E extends Token, SE extends Token, C> {
  private readonly entries: Map<S | null, Transition<S, E, SE, C>[]> = new Map();

  /**
   * 遷移を1件追加する
   * fromStates の各状態のリスト末尾に追加し、空ならワイルドカードのリストに追加する
   */
  add(fromStates: Iterable<S>, spec: TransitionSpec<S, E, SE, C>): void {
    const states = [...new Set(fromStates)];
    const transition = createTransition(spec, states.length === 0);

    if (states.length === 0) {
      this.listFor(null).push(transition);
      return;
    }
    for (const state of states) {
      this.listFor(state).push(transition);
    }
  }

  /**
   * (current, event) に対応する遷移を探索する
   * 状態固有のリストを優先し、見つからなければ exceptions に含まれないワイルドカードを探す
   */
  lookup(current: S, event: E): Transition<S, E, SE, C> | undefined {
    const specific = this.entries.get(current)?.find((t) => t.on.has(event));
    if (specific) {
      return specific;
    }
    return this.entries
      .get(null)
      ?.find((t) => t.on.has(event) && !t.exceptions.has(current));
  }

  /**
   * 登録済み遷移の件数（複数状態に登録された遷移は状態ごとに数える）
   */
  get size(): number {
    let count = 0;
    for (const list of this.entries.values()) {
      count += list.length;
    }
    return count;
  }

  hasFinishTransition(): boolean {
    for (const list of this.entries.values()) {
      if (list.some((t) => t.action === "finish")) {
        return true;
      }
    }
    return false;
  }

  /**
   * マシンとして使用可能か検証する
   * @throws ConfigurationError - 遷移がない、または終了遷移がない場合
   */
  assertUsable(name: string): void {
    if (this.size === 0) {
      throw new ConfigurationError(
        `No transitions found for FSM ${name}`,
        "EMPTY_TRANSITION_TABLE"
      );
    }
    if (!this.hasFinishTransition()) {
      throw new ConfigurationError(
        `No final state found for FSM ${name}`,
        "MISSING_FINISH_TRANSITION"
      );
    }
  }

  private listFor(key: S | null): Transition<S, E, SE, C>[] {
    let list = this.entries.get(key);
    if (!list) {
      list = [];
      this.entries.set(key, list);
    }
    return list;
  }
}

/**
 * 入力から不変の遷移を生成
 * exactOptionalPropertyTypes に対応するため、effect が undefined の場合は省略
 */
function createTransition<S extends Token, E extends Token, SE extends Token, C>(
  spec: TransitionSpec<S, E, SE, C>,
  wildcard: boolean
): Transition<S, E, SE, C> {
  const transition: Transition<S, E, SE, C> = {
    exceptions: new Set<S>(wildcard ? (spec.exceptions ?? []) : []),
    on: new Set<E>(spec.on),
    handlers: Object.freeze([...(spec.handlers ?? [])]),
    to: spec.to,
    action: spec.action ?? "none",
    ...(spec.effect !== undefined && { effect: spec.effect }),
  };
  return Object.freeze(transition);
}
