/**
 * 型定義のエクスポート
 */

export type {
  Token,
  TransitionAction,
  Transition,
  TransitionSpec,
  TransitionCallback,
  ExceptionCallback,
  IdleCallback,
  RunId,
} from "./machine.js";

export type { Validation, HandlerOutcome } from "../handler/event-handler.js";

export type {
  MachineDefinition,
  TransitionDefinition,
} from "../definition/parser.js";
