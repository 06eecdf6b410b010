/**
 * @file FS ユーティリティ（required_files）
 * 備考: 特記事項なし
 * - 判定は同期 API で逐次に行う
 * - 通常ファイルのみを存在扱いとし、同名ディレクトリは欠落とみなす
 * - 権限や内容は検査しない
 * @see qualities/policy/required_files/index.ts
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * ルートからの相対パスを絶対パスへ変換する。
 * @param rootDir ルートディレクトリ
 * @param rel 相対パス
 * @returns 絶対パス
 */
export const toAbs = (rootDir: string, rel: string): string => path.resolve(rootDir, rel);

/**
 * 指定パスが通常ファイルとして存在するかを判定する。
 * @param rootDir ルートディレクトリ
 * @param relPath ルートからの相対パス
 * @returns 通常ファイルなら true
 */
export const isRegularFile = (rootDir: string, relPath: string): boolean => {
  const st = fs.statSync(toAbs(rootDir, relPath), { throwIfNoEntry: false });
  // 見つからない場合は欠落として扱う
  if (!st) return false;
  return st.isFile();
};
