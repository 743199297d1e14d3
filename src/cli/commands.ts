/**
 * CLI コマンド
 * マシン定義の検証と実行（出力は JSON）
 */

import { buildFromDefinition, type HandlerRegistry } from "../definition/loader.js";
import {
  DefinitionParseError,
  parseDefinitionFile,
  type MachineDefinition,
} from "../definition/parser.js";
import { ConfigurationError, StateMachineError } from "../errors.js";
import { EventHandler } from "../handler/event-handler.js";
import { createLogger, type Logger } from "../logging/logger.js";

/** CLI が受け付けるオプション */
const OPTION_NAMES = ["file", "event", "context"] as const;

type OptionName = (typeof OPTION_NAMES)[number];

interface ParsedArgs {
  positionals: string[];
  options: Partial<Record<OptionName, string>>;
}

type CliContext = Record<string, unknown>;

/**
 * CLI の入出力
 */
export interface CliIo {
  /** 1回の呼び出しで1行（末尾の改行は含まない） */
  stdout: (text: string) => void;
  logger?: Logger;
}

/** CliError のエラーコード */
export type CliErrorCode = "INVALID_INPUT" | "RUN_STALLED";

export class CliError extends Error {
  constructor(
    public readonly code: CliErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "CliError";
  }
}

const defaultIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(`${text}\n`);
  },
};

/**
 * CLI を実行し、終了コードを返す
 */
export async function runCli(argv: string[], io: CliIo = defaultIo): Promise<number> {
  const [command, ...rest] = argv;

  if (command === undefined || command === "help" || command === "--help" || command === "-h") {
    outputHelp(io);
    return 0;
  }

  try {
    const parsed = parseArgs(rest);
    switch (command) {
      case "validate":
        await commandValidate(parsed, io);
        break;
      case "run":
        await commandRun(parsed, io);
        break;
      default:
        throw new CliError("INVALID_INPUT", `Unknown command: ${command}`);
    }
    return 0;
  } catch (error) {
    if (
      error instanceof CliError ||
      error instanceof DefinitionParseError ||
      error instanceof ConfigurationError ||
      error instanceof StateMachineError
    ) {
      const details = error instanceof CliError ? error.details : undefined;
      outputError(io, error.code, error.message, details);
      return 1;
    }
    const message = error instanceof Error ? error.message : "Unknown error";
    outputError(io, "INTERNAL_ERROR", message);
    return 1;
  }
}

/**
 * validate <file>
 * ハンドラ名は解決せず、遷移テーブルの構造のみを検証する
 */
async function commandValidate(parsed: ParsedArgs, io: CliIo): Promise<void> {
  const definition = await parseDefinitionFile(requireFile(parsed));
  const machine = buildFromDefinition<CliContext>(definition, {
    handlers: placeholderHandlers(definition),
    logger: io.logger ?? createLogger(definition.name),
  });

  outputJson(io, {
    valid: true,
    name: machine.name,
    initialState: machine.initialState,
    transitions: definition.transitions.length,
  });
}

/**
 * run <file> --event <E> [--context <json>]
 * 副作用ごとに1行出力し、停止したら最終状態を出力する
 * 処理するイベントがなくなった場合は、その状態で停止して RUN_STALLED を返す
 */
async function commandRun(parsed: ParsedArgs, io: CliIo): Promise<void> {
  const definition = await parseDefinitionFile(requireFile(parsed));
  const event = parsed.options.event;
  if (!event) {
    throw new CliError("INVALID_INPUT", "event is required");
  }
  const context = parsed.options.context !== undefined ? parseContext(parsed.options.context) : {};

  let stalledAt: string | undefined;
  const machine = buildFromDefinition<CliContext>(definition, {
    logger: io.logger ?? createLogger(definition.name),
    onTransition: (from, on, to, effect) => {
      io.stdout(JSON.stringify({ from, event: on, to, effect }));
    },
    onIdle: (state) => {
      stalledAt = state;
      machine.finish();
    },
  });

  machine.start(event, context);
  await machine.whenStopped();

  if (stalledAt !== undefined) {
    throw new CliError(
      "RUN_STALLED",
      `Run stalled at state ${stalledAt}: no transition or pending event to continue`,
      { state: stalledAt }
    );
  }
  io.stdout(JSON.stringify({ stopped: true, state: machine.currentState }));
}

/**
 * 定義が参照する全てのハンドラ名に何もしないハンドラを割り当てる
 */
function placeholderHandlers(definition: MachineDefinition): HandlerRegistry<CliContext> {
  const registry: Record<string, EventHandler<string, string, CliContext>> = {};
  for (const transition of definition.transitions) {
    for (const name of transition.handlers) {
      registry[name] = EventHandler.from<string, string, CliContext>(() => undefined);
    }
  }
  return registry;
}

function requireFile(parsed: ParsedArgs): string {
  const file = parsed.positionals[0] ?? parsed.options.file;
  if (!file) {
    throw new CliError("INVALID_INPUT", "definition file is required");
  }
  return file;
}

/**
 * コマンド以降の引数を解析する（--name value / --name=value）
 */
function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], options: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (!arg.startsWith("--")) {
      parsed.positionals.push(arg);
      continue;
    }

    const eqIndex = arg.indexOf("=");
    const name = arg.slice(2, eqIndex === -1 ? undefined : eqIndex);
    if (!isOptionName(name)) {
      throw new CliError("INVALID_INPUT", `Unknown option: --${name}`);
    }

    let value: string | undefined;
    if (eqIndex !== -1) {
      value = arg.slice(eqIndex + 1);
    } else {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        value = next;
        i++;
      }
    }
    if (value === undefined) {
      throw new CliError("INVALID_INPUT", `--${name} requires a value`);
    }
    parsed.options[name] = value;
  }

  return parsed;
}

function isOptionName(name: string): name is OptionName {
  return OPTION_NAMES.some((option) => option === name);
}

/**
 * --context の JSON をオブジェクトとして読む
 */
function parseContext(value: string): CliContext {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new CliError(
      "INVALID_INPUT",
      "context must be valid JSON",
      error instanceof Error ? { reason: error.message } : undefined
    );
  }
  if (!isCliContext(parsed)) {
    throw new CliError("INVALID_INPUT", "context must be a JSON object");
  }
  return parsed;
}

function isCliContext(value: unknown): value is CliContext {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function outputJson(io: CliIo, value: unknown): void {
  io.stdout(JSON.stringify(value, null, 2));
}

function outputError(io: CliIo, code: string, message: string, details?: unknown): void {
  outputJson(io, { error: { code, message, ...(details !== undefined && { details }) } });
}

function outputHelp(io: CliIo): void {
  outputJson(io, {
    commands: {
      validate: "Validate a machine definition file",
      run: "Run a machine definition from its initial state",
      help: "Show this help",
    },
    options: {
      validate: ["<file>", "--file"],
      run: ["<file>", "--file", "--event", "--context"],
    },
    env: ["ASYNC_FSM_LOG_LEVEL", "ASYNC_FSM_SILENT"],
  });
}
