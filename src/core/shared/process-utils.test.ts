import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { ProcessRunner, findExecutable, getProcessRunner } from './process-utils';

describe('process-utils', () => {
  let binDir: string;
  let otherDir: string;

  beforeAll(async () => {
    binDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bin-a-'));
    otherDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bin-b-'));
    await fs.writeFile(path.join(binDir, 'rpmbuild'), '#!/bin/sh\n', { mode: 0o755 });
    await fs.writeFile(path.join(binDir, 'notes.txt'), 'text', { mode: 0o644 });
    await fs.writeFile(path.join(otherDir, 'rpmbuild'), '#!/bin/sh\n', { mode: 0o755 });
  });

  afterAll(async () => {
    await fs.remove(binDir);
    await fs.remove(otherDir);
  });

  describe('findExecutable', () => {
    it('PATH 순서대로 첫 실행 파일을 찾음', async () => {
      const searchPath = [binDir, otherDir].join(path.delimiter);
      expect(await findExecutable('rpmbuild', searchPath)).toBe(path.join(binDir, 'rpmbuild'));
    });

    it('실행 권한이 없으면 무시', async () => {
      expect(await findExecutable('notes.txt', binDir)).toBeNull();
    });

    it('없는 명령은 null', async () => {
      expect(await findExecutable('appimagetool', binDir)).toBeNull();
    });

    it('경로가 주어지면 그 파일만 확인', async () => {
      const direct = path.join(otherDir, 'rpmbuild');
      expect(await findExecutable(direct, '')).toBe(direct);
      expect(await findExecutable(path.join(otherDir, 'missing'), binDir)).toBeNull();
    });

    it('디렉토리는 실행 파일이 아님', async () => {
      expect(await findExecutable(binDir, '')).toBeNull();
    });
  });

  describe('ProcessRunner', () => {
    const runner = new ProcessRunner();

    it('종료 코드와 stdout, stderr 를 따로 모음', async () => {
      const result = await runner.run('sh', ['-c', 'echo out; echo err >&2; exit 3']);
      expect(result).toEqual({ exitCode: 3, stdout: 'out\n', stderr: 'err\n' });
    });

    it('시그널로 종료되면 128', async () => {
      const result = await runner.run('sh', ['-c', 'kill -9 $$']);
      expect(result.exitCode).toBe(128);
    });

    it('실행 파일이 없으면 reject', async () => {
      await expect(runner.run('claude-desktop-missing-tool', [])).rejects.toThrow(/ENOENT/);
    });

    it('cwd 에서 실행', async () => {
      const result = await runner.run('sh', ['-c', 'pwd -P'], { cwd: binDir });
      expect(result.stdout).toBe(`${await fs.realpath(binDir)}\n`);
    });

    it('env 를 주면 그 환경으로 실행', async () => {
      const result = await runner.run('sh', ['-c', 'printf "%s" "$BUILD_FLAVOUR"'], {
        env: { PATH: process.env.PATH, BUILD_FLAVOUR: 'rpm' },
      });
      expect(result.stdout).toBe('rpm');
    });

    it('which 는 PATH 에서 찾음', async () => {
      expect(await runner.which('sh')).not.toBeNull();
      expect(await runner.which('claude-desktop-missing-tool')).toBeNull();
    });
  });

  describe('getProcessRunner', () => {
    it('싱글톤 인스턴스 반환', () => {
      expect(getProcessRunner()).toBe(getProcessRunner());
    });
  });
});
