/**
 * Machine 定義 YAML パーサー
 * 状態・イベント・副作用を文字列で表したマシン定義を読み込む
 */

import { parse as parseYaml } from "yaml";
import { z } from "zod";

/** DefinitionParseError のエラーコード */
export type DefinitionErrorCode =
  | "INVALID_YAML"
  | "INVALID_DEFINITION"
  | "READ_FAILED"
  | "UNKNOWN_HANDLER";

/**
 * パースエラー
 */
export class DefinitionParseError extends Error {
  constructor(
    message: string,
    public readonly code: DefinitionErrorCode,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "DefinitionParseError";
  }
}

/**
 * YAML 上の遷移定義
 */
export interface TransitionDefinition {
  /** 省略時はワイルドカード遷移 */
  from?: string[];
  /** ワイルドカード遷移で対象外とする状態 */
  except?: string[];
  on: string[];
  /** レジストリに登録されたハンドラ名 */
  handlers: string[];
  /** ハンドラ実行後に controller.trigger で投入するイベント */
  trigger: string[];
  to: string;
  effect?: string;
  finish: boolean;
}

/**
 * マシン定義
 */
export interface MachineDefinition {
  name: string;
  initialState: string;
  description?: string;
  transitions: TransitionDefinition[];
}

// =============================================================================
// Zod スキーマ定義
// =============================================================================

const NameListSchema = z.array(z.string().min(1));

const TransitionSchema = z
  .object({
    from: NameListSchema.min(1).optional(),
    except: NameListSchema.optional(),
    on: NameListSchema.min(1),
    handlers: NameListSchema.default([]),
    trigger: NameListSchema.default([]),
    to: z.string().min(1),
    effect: z.string().min(1).optional(),
    finish: z.boolean().default(false),
  })
  .refine((t) => t.from === undefined || t.except === undefined, {
    message: "except is only allowed on wildcard transitions (without from)",
    path: ["except"],
  });

/**
 * YAML のトップレベル構造
 */
const DefinitionYamlSchema = z.object({
  machine: z.object({
    name: z.string().min(1),
    initial_state: z.string().min(1),
    description: z.string().optional(),
  }),
  transitions: z.array(TransitionSchema),
});

type DefinitionYaml = z.infer<typeof DefinitionYamlSchema>;

// =============================================================================
// パース関数
// =============================================================================

/**
 * YAML 文字列をマシン定義にパースする
 * 遷移テーブルの不変条件（遷移数・終了遷移）は build 時に検証される
 * @throws DefinitionParseError - パースまたはスキーマ検証失敗時
 */
export function parseDefinition(yaml: string): MachineDefinition {
  let parsed: unknown;

  try {
    parsed = parseYaml(yaml);
  } catch (error) {
    throw new DefinitionParseError("Invalid YAML syntax", "INVALID_YAML", error);
  }

  const result = DefinitionYamlSchema.safeParse(parsed);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `${e.path.join(".")}: ${e.message}`)
      .join("; ");
    throw new DefinitionParseError(
      `Invalid machine definition: ${errors}`,
      "INVALID_DEFINITION"
    );
  }

  return yamlToDefinition(result.data);
}

/**
 * パース結果をマシン定義に変換
 * exactOptionalPropertyTypes に対応するため、undefined を除外
 */
function yamlToDefinition(yaml: DefinitionYaml): MachineDefinition {
  const result: MachineDefinition = {
    name: yaml.machine.name,
    initialState: yaml.machine.initial_state,
    transitions: yaml.transitions.map((t) => ({
      on: t.on,
      handlers: t.handlers,
      trigger: t.trigger,
      to: t.to,
      finish: t.finish,
      ...(t.from !== undefined && { from: t.from }),
      ...(t.except !== undefined && { except: t.except }),
      ...(t.effect !== undefined && { effect: t.effect }),
    })),
  };

  if (yaml.machine.description !== undefined) {
    result.description = yaml.machine.description;
  }

  return result;
}

/**
 * ファイルからマシン定義を読み込む
 * @throws DefinitionParseError - 読み込みまたはパース失敗時
 */
export async function parseDefinitionFile(filePath: string): Promise<MachineDefinition> {
  const fs = await import("node:fs/promises");

  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new DefinitionParseError(`Failed to read file: ${filePath}`, "READ_FAILED", error);
  }

  return parseDefinition(content);
}
