#!/usr/bin/env node
/**
 * @file 本番ゲート通過時の監査ログ送信（AWS CLI 経由で CloudWatch Logs へ1行記録）
 * 備考: prod ワークフローで required_files ポリシーが成功した後にのみ起動される
 * - 資格情報・リージョン・ロググループは環境変数から読み、欠落は起動時に失敗させる
 * - 認証情報は子プロセスの環境変数で渡し、引数には載せない
 * - 送信手順は純粋関数で組み立て、実行関数は差し替え可能にする
 * - 送信の再試行は行わず、失敗は非0終了で CI に委ねる
 * - メッセージはタイムスタンプのみを含む
 * @see .github/workflows/prod.yml
 * @see scripts/qualities/check.ts
 */
import { spawn } from 'node:child_process';
import { pathToFileURL } from 'node:url';

/** AWS_REGION 未設定時の既定リージョン */
export const DEFAULT_REGION = 'us-east-1';
/** 監査メッセージの接頭辞 */
const AUDIT_MESSAGE_PREFIX = 'Prod validation passed at ';
/** ログストリーム名の接頭辞 */
const STREAM_PREFIX = 'prod-validation-';
/** 呼び出す CLI */
const AWS_CLI = 'aws';

/** 監査送信の設定 */
export type AuditConfig = Readonly<{
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
  logGroupName: string;
}>;

/** 1回分の CLI 呼び出し */
export type AuditInvocation = Readonly<{
  command: string;
  args: readonly string[];
  env: Readonly<Record<string, string>>;
}>;

/** 送信手順一式 */
export type AuditPlan = Readonly<{
  message: string;
  logStreamName: string;
  invocations: readonly AuditInvocation[];
}>;

/** 子プロセス実行関数の型 */
export type ExecFn = (invocation: AuditInvocation) => Promise<void>;

/** 設定不備（必須の環境変数が無い/空） */
export class AuditConfigError extends Error {
  readonly variable: string;

  constructor(variable: string) {
    super(`missing required environment variable: ${variable}`);
    this.name = 'AuditConfigError';
    this.variable = variable;
  }
}

/**
 * 必須の環境変数を取得する。
 * @param env 環境変数
 * @param name 変数名
 * @returns 前後空白を除いた値
 */
function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name]?.trim() ?? '';
  // 空は未設定と同じ扱いにする
  if (value === '') throw new AuditConfigError(name);
  return value;
}

/**
 * 環境変数から監査送信の設定を読み込む。
 * @param env 環境変数（既定は process.env）
 * @returns 設定
 */
export function loadAuditConfig(env: NodeJS.ProcessEnv = process.env): AuditConfig {
  const region = env.AWS_REGION?.trim();
  return {
    accessKeyId: requireEnv(env, 'AWS_ACCESS_KEY_ID'),
    secretAccessKey: requireEnv(env, 'AWS_SECRET_ACCESS_KEY'),
    region: region ? region : DEFAULT_REGION,
    logGroupName: requireEnv(env, 'LOG_GROUP_NAME'),
  };
}

/**
 * 監査メッセージを組み立てる。
 * @param now 記録時刻
 * @returns メッセージ本文
 */
export function formatAuditMessage(now: Date): string {
  return `${AUDIT_MESSAGE_PREFIX}${now.toISOString()}`;
}

/**
 * 時刻からログストリーム名を決める（CloudWatch はストリーム名に ':' を許さない）。
 * @param now 記録時刻
 * @returns ストリーム名
 */
export function toLogStreamName(now: Date): string {
  return `${STREAM_PREFIX}${now.toISOString().replace(/:/g, '-')}`;
}

/**
 * 送信手順（ストリーム作成 → イベント送信）を組み立てる。
 * @param config 設定
 * @param now 記録時刻
 * @returns 送信手順
 */
export function buildAuditPlan(config: AuditConfig, now: Date): AuditPlan {
  const message = formatAuditMessage(now);
  const logStreamName = toLogStreamName(now);
  const env = {
    AWS_ACCESS_KEY_ID: config.accessKeyId,
    AWS_SECRET_ACCESS_KEY: config.secretAccessKey,
    AWS_DEFAULT_REGION: config.region,
  };
  const target = ['--log-group-name', config.logGroupName, '--log-stream-name', logStreamName];
  const events = JSON.stringify([{ timestamp: now.getTime(), message }]);
  return {
    message,
    logStreamName,
    invocations: [
      { command: AWS_CLI, args: ['logs', 'create-log-stream', ...target, '--region', config.region], env },
      {
        command: AWS_CLI,
        args: ['logs', 'put-log-events', ...target, '--log-events', events, '--region', config.region],
        env,
      },
    ],
  };
}

/**
 * CLI 呼び出しを子プロセスで実行する（stdio 継承）。非0終了/シグナル時は reject。
 * @param invocation 呼び出し内容
 * @returns 完了を表す Promise
 */
export function runInvocation(invocation: AuditInvocation): Promise<void> {
  const { command, args, env } = invocation;
  return new Promise((resolve, reject) => {
    // JSON 引数を崩さないよう shell は使わない
    const child = spawn(command, [...args], { stdio: 'inherit', env: { ...process.env, ...env } });
    child.on('error', (error) => reject(error));
    child.on('exit', (code, signal) => {
      // シグナル終了はエラーとして扱う
      if (signal) return reject(new Error(`${command} terminated by signal: ${String(signal)}`));
      // 非0終了はエラーとして扱う
      if (code !== 0) return reject(new Error(`${command} ${args.slice(0, 2).join(' ')} exited with code ${String(code ?? -1)}`));
      resolve();
    });
  });
}

/**
 * 送信手順を順に実行する。最初の失敗で中断する。
 * @param plan 送信手順
 * @param exec 実行関数
 */
export async function runAudit(plan: AuditPlan, exec: ExecFn = runInvocation): Promise<void> {
  // ストリーム作成が済んでからイベントを送る
  for (const invocation of plan.invocations) {
    await exec(invocation);
  }
}

/**
 * 環境変数を読み、現在時刻で監査ログを1件送る。
 * @param exec 実行関数
 * @param now 記録時刻
 * @returns 送信した手順
 */
export async function main(exec: ExecFn = runInvocation, now: Date = new Date()): Promise<AuditPlan> {
  const plan = buildAuditPlan(loadAuditConfig(), now);
  await runAudit(plan, exec);
  process.stdout.write(`[audit] ${plan.message} (stream: ${plan.logStreamName})\n`);
  return plan;
}

/** このファイルが直接起動されたかの判定 */
const isMain = (() => {
  const arg1 = typeof process.argv[1] === 'string' ? process.argv[1] : null;
  // 呼び出しパスが不明な場合は実行しない
  if (!arg1) return false;
  return import.meta.url === pathToFileURL(arg1).href;
})();

// CLI として起動されたときのみ送信する
if (isMain) {
  main().catch((e) => {
    const msg = e instanceof Error ? e.message : String(e);
    process.stderr.write(`[audit] ${msg}\n`);
    process.exit(1);
  });
}
