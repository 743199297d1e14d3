/**
 * Definition モジュール
 * YAML のマシン定義
 */

export { parseDefinition, parseDefinitionFile, DefinitionParseError } from "./parser.js";
export type { DefinitionErrorCode, MachineDefinition, TransitionDefinition } from "./parser.js";

export { buildFromDefinition } from "./loader.js";
export type { DefinedMachine, HandlerRegistry, BuildFromDefinitionOptions } from "./loader.js";
