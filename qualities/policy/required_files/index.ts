/**
 * @file 必須ファイルポリシーのエントリポイント
 * 備考: 特記事項なし
 * - 一覧を定義順に1回だけ走査し present/missing に分割する
 * - 報告文言の組み立てと終了コードの決定は副作用を持たない
 * - 出力と終了は run.ts 側に限定する
 * - 存在判定は差し替え可能にし、テストから FS を介さず検証できるようにする
 * @see qualities/policy/required_files/run.ts
 * @see qualities/policy/required_files/constants.ts
 */

import {
  ALL_PRESENT_MESSAGE,
  EXIT_MISSING,
  EXIT_OK,
  MISSING_HEADER,
  MISSING_ITEM_PREFIX,
  REQUIRED_FILES,
} from './constants.ts';
import { isRegularFile } from './fs-utils.ts';
import type { CheckResult, ExistsFn, ReportWriter, RequiredFileSet } from './types.ts';

/**
 * 一覧の各パスを定義順に判定し、存在/欠落へ分割する。
 * @param rootDir 判定の基準ディレクトリ
 * @param files 必須ファイル一覧
 * @param exists 存在判定関数
 * @returns 判定結果
 */
export function checkPresence(
  rootDir: string,
  files: RequiredFileSet = REQUIRED_FILES,
  exists: ExistsFn = isRegularFile
): CheckResult {
  const present: string[] = [];
  const missing: string[] = [];
  // 定義順を保ったまま振り分ける
  for (const rel of files) {
    // 判定結果に応じて格納先を切り替える
    if (exists(rootDir, rel)) present.push(rel);
    else missing.push(rel);
  }

  return { present, missing };
}

/**
 * 判定結果を報告行の配列へ整形する。
 * @param result 判定結果
 * @returns 出力行（改行を含まない）
 */
export function formatReport(result: CheckResult): readonly string[] {
  // 欠落なしは1行のみ
  if (result.missing.length === 0) return [ALL_PRESENT_MESSAGE];
  return [MISSING_HEADER, ...result.missing.map((rel) => `${MISSING_ITEM_PREFIX}${rel}`)];
}

/**
 * 判定結果から終了コードを決める。
 * @param result 判定結果
 * @returns 0 または 1
 */
export function exitCodeFor(result: CheckResult): number {
  return result.missing.length === 0 ? EXIT_OK : EXIT_MISSING;
}

/**
 * 判定・報告・終了コード決定を一括で行う。
 * @param rootDir 判定の基準ディレクトリ
 * @param write 報告の出力先
 * @param files 必須ファイル一覧
 * @returns 終了コード
 */
export function runRequiredFiles(
  rootDir: string,
  write: ReportWriter,
  files: RequiredFileSet = REQUIRED_FILES
): number {
  const result = checkPresence(rootDir, files);
  write(`${formatReport(result).join('\n')}\n`);
  return exitCodeFor(result);
}
