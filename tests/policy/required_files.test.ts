/**
 * @file Policy: required_files の判定・整形・終了コード
 * 備考: 特記事項なし
 * - 一時ディレクトリにファイルを配置して実 FS で判定する
 * - 欠落行は一覧順で出ることを確認する
 * - 同名ディレクトリは欠落扱いとなることを確認する
 * @see qualities/policy/required_files/index.ts
 */
import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, expectTypeOf, it } from 'vitest';
import {
  ALL_PRESENT_MESSAGE,
  MISSING_HEADER,
  REQUIRED_FILES,
} from '../../qualities/policy/required_files/constants.ts';
import { isRegularFile } from '../../qualities/policy/required_files/fs-utils.ts';
import {
  checkPresence,
  exitCodeFor,
  formatReport,
  runRequiredFiles,
} from '../../qualities/policy/required_files/index.ts';
import { runCli } from '../../qualities/policy/required_files/run.ts';
import type { RequiredFileSet } from '../../qualities/policy/required_files/types.ts';
import { cleanupDir, createTmpDir, ensureDir, writeTextFile } from '../framework/fsFixtures.ts';

describe('policy: required_files', () => {
  let tmp = '';

  beforeEach(() => {
    tmp = createTmpDir();
  });

  afterEach(() => {
    cleanupDir(tmp);
  });

  it('lists README.md and .gitignore in that order', () => {
    expect(REQUIRED_FILES).toEqual(['README.md', '.gitignore']);
  });

  it('passes when every required file exists', () => {
    writeTextFile(path.join(tmp, 'README.md'), '# demo\n');
    writeTextFile(path.join(tmp, '.gitignore'), 'node_modules\n');

    const result = checkPresence(tmp);
    expect(result).toEqual({ present: ['README.md', '.gitignore'], missing: [] });
    expect(formatReport(result)).toEqual(['All required files are present.']);
    expect(exitCodeFor(result)).toBe(0);
  });

  it('reports README.md when only .gitignore exists', () => {
    writeTextFile(path.join(tmp, '.gitignore'), 'dist\n');

    const out: string[] = [];
    const code = runRequiredFiles(tmp, (text) => out.push(text));
    expect(code).toBe(1);
    expect(out).toEqual(['Missing required files:\n- README.md\n']);
  });

  it('lists every entry for an empty directory', () => {
    const result = checkPresence(tmp);
    expect(result.present).toEqual([]);
    expect(result.missing).toEqual(['README.md', '.gitignore']);
    expect(formatReport(result)).toEqual([MISSING_HEADER, '- README.md', '- .gitignore']);
    expect(exitCodeFor(result)).toBe(1);
  });

  it('keeps list order and reports only the missing middle entry', () => {
    writeTextFile(path.join(tmp, 'C.md'), 'c');
    writeTextFile(path.join(tmp, 'A.md'), 'a');

    const result = checkPresence(tmp, ['A.md', 'B.md', 'C.md']);
    expect(result).toEqual({ present: ['A.md', 'C.md'], missing: ['B.md'] });
    expect(formatReport(result)).toEqual(['Missing required files:', '- B.md']);
  });

  it('reports missing entries in list order, not alphabetical', () => {
    const result = checkPresence(tmp, ['zeta.txt', 'alpha.txt']);
    expect(formatReport(result)).toEqual(['Missing required files:', '- zeta.txt', '- alpha.txt']);
  });

  it('resolves nested relative paths against the root', () => {
    writeTextFile(path.join(tmp, 'docs', 'CONTRIBUTING.md'), 'x');

    const result = checkPresence(tmp, ['docs/CONTRIBUTING.md', 'docs/SECURITY.md']);
    expect(result).toEqual({ present: ['docs/CONTRIBUTING.md'], missing: ['docs/SECURITY.md'] });
  });

  it('treats a directory with a required name as missing', () => {
    ensureDir(path.join(tmp, 'README.md'));
    writeTextFile(path.join(tmp, '.gitignore'), '');

    expect(isRegularFile(tmp, 'README.md')).toBe(false);
    expect(checkPresence(tmp).missing).toEqual(['README.md']);
  });

  it('gives identical output and status on repeated runs', () => {
    writeTextFile(path.join(tmp, 'README.md'), '# demo\n');

    const first: string[] = [];
    const second: string[] = [];
    const c1 = runRequiredFiles(tmp, (t) => first.push(t));
    const c2 = runRequiredFiles(tmp, (t) => second.push(t));
    expect(c1).toBe(c2);
    expect(first).toEqual(second);
    expect(first).toEqual(['Missing required files:\n- .gitignore\n']);
  });

  it('uses the injected existence check in list order', () => {
    const seen: string[] = [];
    const result = checkPresence('/unused', ['x', 'y', 'z'], (_root, rel) => {
      seen.push(rel);
      return rel !== 'y';
    });
    expect(seen).toEqual(['x', 'y', 'z']);
    expect(result).toEqual({ present: ['x', 'z'], missing: ['y'] });
  });

  it('does not modify the working directory', () => {
    writeTextFile(path.join(tmp, 'README.md'), '# demo\n');
    const before = fs.readdirSync(tmp).sort();
    runRequiredFiles(tmp, () => undefined);
    expect(fs.readdirSync(tmp).sort()).toEqual(before);
  });

  it('passes with the success line as the whole report', () => {
    writeTextFile(path.join(tmp, 'README.md'), '# demo\n');
    writeTextFile(path.join(tmp, '.gitignore'), 'node_modules\n');

    const out: string[] = [];
    expect(runRequiredFiles(tmp, (t) => out.push(t))).toBe(0);
    expect(out).toEqual([`${ALL_PRESENT_MESSAGE}\n`]);
  });

  it('rejects an empty file list at the type level', () => {
    expectTypeOf<readonly []>().not.toMatchTypeOf<RequiredFileSet>();
    expectTypeOf<readonly ['README.md']>().toMatchTypeOf<RequiredFileSet>();
    expect(REQUIRED_FILES.length).toBeGreaterThan(0);
  });
});

// 概要: CLI 入口が報告と終了コードを返し、例外を標準エラー側へ流すことを検証
describe('policy: required_files runCli', () => {
  it('reports against the directory the cwd function returns', () => {
    const tmp = createTmpDir();
    try {
      writeTextFile(path.join(tmp, 'README.md'), '# demo\n');
      const out: string[] = [];
      const err: string[] = [];
      const code = runCli(() => tmp, (t) => out.push(t), (t) => err.push(t));
      expect(code).toBe(1);
      expect(out).toEqual(['Missing required files:\n- .gitignore\n']);
      expect(err).toEqual([]);
    } finally {
      cleanupDir(tmp);
    }
  });

  it('exits 1 with the message on stderr when the working directory cannot be read', () => {
    const out: string[] = [];
    const err: string[] = [];
    const code = runCli(
      () => {
        throw new Error('ENOENT: no such file or directory, uv_cwd');
      },
      (t) => out.push(t),
      (t) => err.push(t)
    );
    expect(code).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual(['[policy:required_files] ENOENT: no such file or directory, uv_cwd\n']);
  });
});
