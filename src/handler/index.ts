/**
 * Handler モジュール
 */

export { EventHandler, executeHandler } from "./event-handler.js";
export type { HandlerFunction, HandlerOutcome, Validation } from "./event-handler.js";
