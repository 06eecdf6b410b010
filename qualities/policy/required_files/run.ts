#!/usr/bin/env node
/**
 * @file required_files ポリシーの CLI ランナー
 * 備考: 引数は取らず、カレントディレクトリを対象とする
 * - 報告は標準出力、想定外の例外のみ標準エラーへ出す
 * - 終了コードは 0（全件存在）/ 1（欠落あり・例外）
 * @see qualities/policy/required_files/index.ts
 */
import { pathToFileURL } from 'node:url';
import { EXIT_ERROR } from './constants.ts';
import { runRequiredFiles } from './index.ts';
import type { ReportWriter } from './types.ts';

/**
 * カレントディレクトリに対してポリシーを実行し、例外は失敗として報告する。
 * @param cwd 基準ディレクトリの取得関数
 * @param out 報告の出力先
 * @param err 例外メッセージの出力先
 * @returns 終了コード
 */
export function runCli(
  cwd: () => string = () => process.cwd(),
  out: ReportWriter = (text) => { process.stdout.write(text); },
  err: ReportWriter = (text) => { process.stderr.write(text); }
): number {
  // 読み取り不能なカレント等の例外は失敗として終了する
  try {
    return runRequiredFiles(cwd(), out);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    err(`[policy:required_files] ${msg}\n`);
    return EXIT_ERROR;
  }
}

/** このファイルが直接起動されたかの判定 */
const isMain = (() => {
  const arg1 = typeof process.argv[1] === 'string' ? process.argv[1] : null;
  // 呼び出しパスが不明な場合は実行しない
  if (!arg1) return false;
  return import.meta.url === pathToFileURL(arg1).href;
})();

// 直接起動されたときのみ判定を実行する
if (isMain) {
  process.exitCode = runCli();
}
