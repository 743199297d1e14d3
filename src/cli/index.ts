#!/usr/bin/env node
/**
 * async-fsm CLI
 * マシン定義ファイルの検証と実行
 */

import { runCli } from "./commands.js";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
