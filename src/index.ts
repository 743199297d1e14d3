/**
 * async-fsm - Asynchronous Finite State Machine
 * @module async-fsm
 */

// Types
export * from "./types/index.js";

// Errors
export {
  ConfigurationError,
  StateMachineError,
  HandlerEscalationError,
  ChannelClosedError,
} from "./errors.js";
export type { ConfigurationErrorCode, StateMachineErrorCode } from "./errors.js";

// Logging
export { createLogger, resolveLogLevel, formatValue } from "./logging/index.js";
export type { Logger, LoggerOptions, LogLevel } from "./logging/index.js";

// Table
export { TransitionTable } from "./table/index.js";

// Handler
export { EventHandler, executeHandler } from "./handler/index.js";
export type { HandlerFunction } from "./handler/index.js";

// Engine
export {
  StateMachine,
  MachineBuilder,
  OnEventScope,
  TransitionScope,
  Controller,
  EventQueue,
  Channel,
  EventConsumer,
} from "./engine/index.js";
export type {
  StateMachineOptions,
  MachineCallbacks,
  StatesBuilder,
  TransitionBuilder,
  ReceiveResult,
} from "./engine/index.js";

// Definition
export {
  parseDefinition,
  parseDefinitionFile,
  DefinitionParseError,
  buildFromDefinition,
} from "./definition/index.js";
export type {
  DefinitionErrorCode,
  DefinedMachine,
  HandlerRegistry,
  BuildFromDefinitionOptions,
} from "./definition/index.js";
