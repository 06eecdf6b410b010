#!/usr/bin/env node
/**
 * @file 実装中 preflight チェックの実行器
 * 備考: 特記事項なし
 * - preflight/both スコープのステップを定義順に実行する
 * - ci スコープの test は含めず、素早い自己点検を可能にする
 * - エラーは握り潰さず非0終了で明示する
 * @see qualities/check-steps.ts
 */
import { pathToFileURL } from 'node:url';
import { stepDefs, type StepDef } from '../../qualities/check-steps.ts';
import { runCommand, runQualityGate } from './check.ts';

/**
 * preflight 対象の抽出（ci スコープのみのステップを除外）
 * @param defs ステップ定義
 * @returns 実行対象ステップ（定義順）
 */
export function selectPreflightSteps(defs: ReadonlyArray<StepDef> = stepDefs): StepDef[] {
  return defs.filter((d) => {
    const scope = d.runScope ?? 'ci';
    return scope === 'preflight' || scope === 'both';
  });
}

// 直接起動のみ実行（ユニットテスト import 時は実行しない）
const isMain = (() => {
  const arg1 = typeof process.argv[1] === 'string' ? process.argv[1] : null;
  // 呼び出し元が不明な場合は実行しない
  if (!arg1) return false;
  return import.meta.url === pathToFileURL(arg1).href;
})();

// CLI エントリポイントとして起動された場合にのみ preflight を実行する
if (isMain) {
  runQualityGate(selectPreflightSteps(), runCommand, 'qualities:preflight').catch((e) => {
    // 失敗時は理由を可視化し非0で終了する
    const msg = e instanceof Error ? e.message : String(e);
    process.stderr.write(`[qualities:preflight] ${msg}\n`);
    process.exit(1);
  });
}
