/**
 * @file 必須ファイルポリシー型定義
 * 備考: 特記事項なし
 * - 判定結果は実行ごとに生成し永続化しない
 * - present/missing は元の一覧順を保った部分列とする
 * @see qualities/policy/required_files/index.ts
 */

/** 必須ファイル一覧（順序付き・非空を型で保証する） */
export type RequiredFileSet = readonly [string, ...string[]];

/** 1回の判定結果。present と missing で一覧を分割する */
export type CheckResult = {
  readonly present: readonly string[];
  readonly missing: readonly string[];
};

/** 存在判定関数の型（ルートと相対パスを受け取る） */
export type ExistsFn = (rootDir: string, relPath: string) => boolean;

/** 報告出力先の型 */
export type ReportWriter = (text: string) => void;
