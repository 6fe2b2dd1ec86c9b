import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { ArtifactNotFoundError, PackageBuildFailedError } from '../errors';
import { FakeRunner } from '../../test-utils/fakeRunner';
import { escapeRegExp, locateArtifact, runPackagingTool } from './packager';

describe('packager', () => {
  describe('runPackagingTool', () => {
    it('성공하면 결과 반환', async () => {
      const runner = new FakeRunner().on('rpmbuild', () => ({ stdout: 'Wrote: x.rpm' }));

      const result = await runPackagingTool(runner, 'rpmbuild', ['-bb', 'a.spec'], { cwd: '/tmp' });

      expect(result).toEqual({ exitCode: 0, stdout: 'Wrote: x.rpm', stderr: '' });
      expect(runner.calls).toEqual([{ command: 'rpmbuild', args: ['-bb', 'a.spec'], options: { cwd: '/tmp' } }]);
    });

    it('종료 코드가 0 이 아니면 실패', async () => {
      const runner = new FakeRunner().on('rpmbuild', () => ({ exitCode: 1, stderr: 'error: Bad file\n' }));

      const error = await runPackagingTool(runner, 'rpmbuild', []).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PackageBuildFailedError);
      expect(error).toMatchObject({
        message: 'rpmbuild 실패: exit 1',
        stage: 'package',
        details: { tool: 'rpmbuild', exitCode: 1, stderr: 'error: Bad file' },
      });
    });

    it('도구가 없으면 실패', async () => {
      await expect(runPackagingTool(new FakeRunner(), 'appimagetool', [])).rejects.toThrow(
        'appimagetool 실패: 실행할 수 없습니다: spawn appimagetool ENOENT'
      );
    });
  });

  describe('locateArtifact', () => {
    let dir: string;
    const pattern = /^claude-desktop-1\.2\.3-.+\.x86_64\.rpm$/;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'locate-test-'));
    });

    afterEach(async () => {
      await fs.remove(dir);
    });

    it('예상 경로 우선', async () => {
      const expected = path.join(dir, 'x86_64', 'claude-desktop-1.2.3-1.x86_64.rpm');
      await fs.outputFile(expected, 'rpm');
      await fs.outputFile(path.join(dir, 'claude-desktop-1.2.3-0.x86_64.rpm'), 'old');

      await expect(locateArtifact(expected, dir, pattern)).resolves.toBe(expected);
    });

    it('예상 경로에 없으면 깊이 2 까지 검색', async () => {
      const found = path.join(dir, 'RPMS', 'claude-desktop-1.2.3-2.x86_64.rpm');
      await fs.outputFile(found, 'rpm');
      await fs.outputFile(path.join(dir, 'a', 'b', 'claude-desktop-1.2.3-1.x86_64.rpm'), 'too deep');

      await expect(locateArtifact(path.join(dir, 'x86_64', 'missing.rpm'), dir, pattern)).resolves.toBe(found);
    });

    it('아무 것도 없으면 ArtifactNotFoundError', async () => {
      const expected = path.join(dir, 'x86_64', 'claude-desktop-1.2.3-1.x86_64.rpm');

      const error = await locateArtifact(expected, dir, pattern).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ArtifactNotFoundError);
      expect(error).toMatchObject({ details: { expectedPath: expected, searchDir: dir } });
    });
  });

  it('escapeRegExp', () => {
    expect(escapeRegExp('claude-desktop-1.2.3+git')).toBe('claude-desktop-1\\.2\\.3\\+git');
    expect(new RegExp(`^${escapeRegExp('a.b')}$`).test('axb')).toBe(false);
  });
});
