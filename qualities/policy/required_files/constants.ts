/**
 * @file 必須ファイルポリシーの定数（対象一覧と出力文言）
 * 備考: 対象一覧はソース固定で、設定ファイルや引数からは変更しない
 * - 一覧の並び順がそのまま判定順と報告順になる
 * - パスはリポジトリルート（実行時のカレント）からの相対で記す
 * - 出力文言は CI ログの照合対象なので変更時はテストも合わせて更新する
 * - 終了コードは 0/1 の二値のみを使い、例外も 1 とする
 * @see qualities/policy/required_files/index.ts
 * @see qualities/check-steps.ts
 */
import type { RequiredFileSet } from './types.ts';

/** 必須ファイル一覧（空にしない） */
export const REQUIRED_FILES: RequiredFileSet = ['README.md', '.gitignore'];

/** 全件存在時の1行メッセージ */
export const ALL_PRESENT_MESSAGE: string = 'All required files are present.';
/** 欠落時の見出し行 */
export const MISSING_HEADER: string = 'Missing required files:';
/** 欠落ファイル行の接頭辞 */
export const MISSING_ITEM_PREFIX: string = '- ';

/** 成功時の終了コード */
export const EXIT_OK: number = 0;
/** 欠落ありの終了コード */
export const EXIT_MISSING: number = 1;
/** 判定中の例外（カレント取得失敗など）の終了コード */
export const EXIT_ERROR: number = 1;
