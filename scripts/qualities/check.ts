#!/usr/bin/env node
/**
 * @file 品質ゲートの単一実行ポイント。ポリシー検証→型検査→Lint→テストを順次実行する。
 * 備考: 特記事項なし
 * - ステップは qualities/check-steps.ts の定義順に直列実行する
 * - --fast 指定時はポリシー・型検査・Lint のみに絞る
 * - 非0終了/シグナル終了はその時点でゲート失敗とする
 * - Windows での npm 解決互換のため shell: true で起動する
 * @see qualities/check-steps.ts
 */
import { spawn } from 'node:child_process';
import { pathToFileURL } from 'node:url';
import { POLICY_PREFIX, stepDefs, type StepDef } from '../../qualities/check-steps.ts';

/**
 * 子プロセスでコマンドを実行（stdio 継承）。成功時 resolve、非0終了/シグナル時 reject。
 * @param {string} command 実行コマンド
 * @param {readonly string[]} args 引数配列（読み取り専用）
 * @returns {Promise<void>} 実行完了を表す Promise（非0終了時は reject）
 */
export function runCommand(command: string, args: readonly string[]): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      stdio: 'inherit',
      shell: true, // npm 解決の Windows 互換性向上
    });

    child.on('error', (error) => reject(error));
    child.on('exit', (code, signal) => {
      // シグナル終了はエラーとして扱う
      if (signal) return reject(new Error(`${command} terminated by signal: ${String(signal)}`));
      // 非0終了はエラーとして扱う
      if (code !== 0) return reject(new Error(`${command} ${args.join(' ')} exited with code ${String(code ?? -1)}`));
      resolve();
    });
  });
}

/**
 * 引数から実ゲートの対象ステップを選ぶ。
 * @param argv コマンドライン引数（node/スクリプトパスを除く）
 * @param defs ステップ定義
 * @returns 実行対象ステップ（定義順）
 */
export function selectGateSteps(argv: readonly string[], defs: ReadonlyArray<StepDef> = stepDefs): StepDef[] {
  // 高速モードでなければ全ステップ
  if (!argv.includes('--fast')) return [...defs];
  return defs.filter((d) => d.id.startsWith(POLICY_PREFIX) || d.id === 'typecheck' || d.id === 'lint');
}

/**
 * 品質ゲート本体を順次実行する。
 * @param steps 実行対象ステップ
 * @param exec コマンド実行関数
 * @param tag 進捗行の接頭タグ
 */
export async function runQualityGate(
  steps: readonly StepDef[],
  exec: (command: string, args: readonly string[]) => Promise<void> = runCommand,
  tag = 'qualities:check'
): Promise<void> {
  // 前段の成立を前提に順次実行する
  for (const step of steps) {
    process.stdout.write(`[${tag}] ${step.id}\n`);
    await exec(step.command, step.args);
  }
}

/** このファイルが直接起動されたかの判定（ユニットテストからの import を除外） */
const isMain = (() => {
  const arg1 = typeof process.argv[1] === 'string' ? process.argv[1] : null;
  // 直接起動の判定ができない場合は実行しない
  if (!arg1) return false;
  return import.meta.url === pathToFileURL(arg1).href;
})();

// 直接起動されたときのみゲートを起動する
if (isMain) {
  runQualityGate(selectGateSteps(process.argv.slice(2))).catch((e) => {
    // 例外を標準エラーで明確化して終了コードを非0にする
    const msg = e instanceof Error ? e.message : String(e);
    process.stderr.write(`${msg}\n`);
    process.exit(1);
  });
}
