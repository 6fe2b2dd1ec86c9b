import { describe, it, expect } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { createTestContext } from '../../test-utils/fixtures';
import { ProcessRunner } from '../shared/process-utils';
import { formatChangelogDate, renderPostInstallScript, renderRpmSpec } from './rpmSpec';

describe('rpmSpec', () => {
  describe('formatChangelogDate', () => {
    it('영문 요일, 월, 두 자리 일', () => {
      expect(formatChangelogDate(new Date(2026, 9, 18))).toBe('Sun Oct 18 2026');
      expect(formatChangelogDate(new Date(2025, 0, 5))).toBe('Sun Jan 05 2025');
    });
  });

  describe('renderPostInstallScript', () => {
    const script = renderPostInstallScript('claude-desktop');

    it('chrome-sandbox 경로', () => {
      expect(script).toContain(
        'SANDBOX_PATH="/usr/lib/claude-desktop/node_modules/electron/dist/chrome-sandbox"\n'
      );
      expect(script).toContain('    chmod 4755 "$SANDBOX_PATH"');
    });

    it('항상 성공으로 끝난다', () => {
      expect(script.startsWith('#!/bin/sh\n')).toBe(true);
      expect(script.endsWith('exit 0\n')).toBe(true);
    });

    it('sh 로 실행하면 chrome-sandbox 가 없어도 경고만 내고 0 으로 종료', async () => {
      const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'postinst-'));
      try {
        const scriptPath = path.join(tmpDir, 'postinst.sh');
        await fs.writeFile(scriptPath, script);

        const result = await new ProcessRunner().run('sh', [scriptPath], { cwd: tmpDir });

        expect(result.exitCode).toBe(0);
        expect(result.stdout).toBe(
          [
            'Updating desktop database...',
            'Setting chrome-sandbox permissions...',
            'Warning: chrome-sandbox not found at /usr/lib/claude-desktop/node_modules/electron/dist/chrome-sandbox. Sandbox may not function correctly.',
            '',
          ].join('\n')
        );
      } finally {
        await fs.remove(tmpDir);
      }
    });
  });

  describe('renderRpmSpec', () => {
    const context = createTestContext('/tmp/spec-test');
    const spec = renderRpmSpec({
      context,
      installRoot: '/tmp/spec-test/work/package',
      postInstallScript: renderPostInstallScript('claude-desktop'),
      iconSizes: [16, 256],
      date: new Date(2026, 9, 18),
    });
    const lines = spec.split('\n');

    it('헤더 필드', () => {
      expect(lines).toContain('Name:           claude-desktop');
      expect(lines).toContain('Version:        1.2.3');
      expect(lines).toContain('Release:        1');
      expect(lines).toContain('Summary:        Claude Desktop for Linux');
      expect(lines).toContain('BuildArch:      x86_64');
      expect(lines).toContain('AutoReqProv:    no');
    });

    it('설치 트리를 buildroot 로 복사', () => {
      expect(lines).toContain('cp -a "/tmp/spec-test/work/package/." %{buildroot}/');
    });

    it('%post 에 설치 후 스크립트', () => {
      const post = lines.indexOf('%post');
      expect(lines[post + 1]).toBe('#!/bin/sh');
      expect(lines.slice(post).indexOf('exit 0')).toBeGreaterThan(0);
    });

    it('%files 는 실제로 설치한 아이콘만', () => {
      const files = lines.slice(lines.indexOf('%files') + 1, lines.indexOf('%changelog') - 1);
      expect(files).toEqual([
        '%defattr(-,root,root,-)',
        '/usr/bin/claude-desktop',
        '/usr/lib/claude-desktop',
        '/usr/share/applications/claude-desktop.desktop',
        '/usr/share/icons/hicolor/16x16/apps/claude-desktop.png',
        '/usr/share/icons/hicolor/256x256/apps/claude-desktop.png',
      ]);
    });

    it('%changelog', () => {
      expect(lines.slice(-3)).toEqual([
        '* Sun Oct 18 2026 Test Maintainer <test@example.com> - 1.2.3-1',
        '- Claude Desktop version 1.2.3',
        '',
      ]);
    });
  });
});
