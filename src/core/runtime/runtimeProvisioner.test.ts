import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { RuntimeProvisionFailedError } from '../errors';
import { FakeRunner } from '../../test-utils/fakeRunner';
import { installFakeNpm } from '../../test-utils/fakeToolchain';
import { RuntimeProvisioner } from './runtimeProvisioner';

describe('RuntimeProvisioner', () => {
  let appDir: string;

  beforeEach(async () => {
    appDir = await fs.mkdtemp(path.join(os.tmpdir(), 'provision-test-'));
  });

  afterEach(async () => {
    await fs.remove(appDir);
  });

  it('지정한 버전의 electron 을 스테이징 디렉토리에 설치', async () => {
    const runner = installFakeNpm(new FakeRunner());

    const binary = await new RuntimeProvisioner(runner).provision({ appDir, electronVersion: '37.2.0' });

    expect(binary).toBe(path.join(appDir, 'node_modules', 'electron', 'dist', 'electron'));
    expect(runner.callsOf('npm')).toHaveLength(1);
    expect(runner.callsOf('npm')[0].args).toEqual([
      'install',
      '--no-save',
      '--no-package-lock',
      '--no-fund',
      '--no-audit',
      '--prefix',
      appDir,
      'electron@37.2.0',
    ]);
    expect(runner.callsOf('npm')[0].options.cwd).toBe(appDir);
  });

  it('npm 이 실패하면 종료 코드와 stderr 를 담아 실패', async () => {
    const runner = new FakeRunner().on('npm', () => ({ exitCode: 1, stderr: 'npm ERR! 404 Not Found\n' }));

    const error = await new RuntimeProvisioner(runner)
      .provision({ appDir, electronVersion: '0.0.0' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RuntimeProvisionFailedError);
    expect(error).toMatchObject({
      message: 'Electron 설치 실패 (exit 1)',
      stage: 'provision',
      details: { exitCode: 1, stderr: 'npm ERR! 404 Not Found' },
    });
  });

  it('npm 이 없으면 실패', async () => {
    await expect(
      new RuntimeProvisioner(new FakeRunner()).provision({ appDir, electronVersion: 'latest' })
    ).rejects.toThrow('npm 을 실행할 수 없습니다: spawn npm ENOENT');
  });

  it('설치 후 실행 파일이 없으면 실패', async () => {
    const runner = new FakeRunner().on('npm', () => undefined);

    await expect(
      new RuntimeProvisioner(runner).provision({ appDir, electronVersion: 'latest' })
    ).rejects.toThrow(RuntimeProvisionFailedError);
  });
});
