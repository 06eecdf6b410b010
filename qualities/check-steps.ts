/**
 * @file 品質ゲート実行手順の定義
 * 備考: 特記事項なし
 * - 並び順がそのまま実行順（ポリシー → 型検査 → Lint → テスト）
 * - 各ステップは子プロセスとして実行するコマンドと引数で表す
 * - runScope で preflight の対象を切り分ける（実ゲートは全ステップ）
 * @see scripts/qualities/check.ts
 * @see scripts/qualities/preflight.ts
 */

/**
 * 実行スコープ。
 * - 'ci': CI/本番ゲート用の既定スコープ
 * - 'preflight': 実装中の軽量チェック用
 * - 'both': ci と preflight の双方に該当
 */
export type RunScope = 'ci' | 'preflight' | 'both';

/**
 * ゲート実行ステップの定義。
 */
export type StepDef = Readonly<{
  id: string;
  command: string;
  args: ReadonlyArray<string>;
  runScope?: RunScope; // 省略時は 'ci' と解釈
}>;

/** ポリシー系ステップの ID 接頭辞 */
export const POLICY_PREFIX = 'policy:';

/**
 * ゲート実行ステップ定義（実行順序は優先度を反映）
 */
export const stepDefs: ReadonlyArray<StepDef> = [
  { id: 'policy:required_files', command: 'npx', args: ['tsx', 'qualities/policy/required_files/run.ts'], runScope: 'both' },
  { id: 'typecheck', command: 'npm', args: ['run', 'typecheck', '--silent'], runScope: 'both' },
  { id: 'lint',      command: 'npm', args: ['run', 'lint', '--silent'],      runScope: 'both' },
  { id: 'test',      command: 'npm', args: ['test', '--silent'] },
] as const;
