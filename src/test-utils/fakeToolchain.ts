/**
 * 테스트용 가짜 도구 모음 (7z, wrestool, icotool, npm, rpmbuild, appimagetool)
 * 설치 파일 구조는 실제 Squirrel 인스톨러와 같은 상대 경로를 따른다.
 */

import * as asar from '@electron/asar';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { FakeRunner } from './fakeRunner';

// icotool 이 claude.exe 에서 뽑아내는 파일 인덱스
export const ICON_INDEX: Record<number, number> = { 16: 13, 24: 11, 32: 10, 48: 8, 64: 7, 256: 6 };
export const ALL_ICON_SIZES = [16, 24, 32, 48, 64, 256];

export const DEFAULT_APP_FILES: Record<string, string> = {
  'package.json': '{"name":"claude","main":".vite/build/index.js"}',
  '.vite/build/index.js': 'function r(){}\nt.destroy(),r();\n',
  '.vite/renderer/main_window/assets/MainWindowPage-a1b2c3.js': 'if(!e && n){hideTitleBar()}\n',
  'node_modules/claude-native/index.js': 'module.exports = require("./claude-native-binding.node");\n',
};

export interface FakeInstallerOptions {
  version?: string;
  nupkgName?: string;
  appFiles?: Record<string, string>;
  withAppAsar?: boolean;
  withUnpacked?: boolean;
}

async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    await fs.ensureDir(path.dirname(target));
    await fs.writeFile(target, content);
  }
}

/**
 * `7z x -y <archive> -o<dir>` 를 흉내낸다
 */
export function installFake7z(runner: FakeRunner, options: FakeInstallerOptions = {}): FakeRunner {
  const version = options.version ?? '1.2.3';
  const nupkgName = options.nupkgName ?? `AnthropicClaude-${version}-full.nupkg`;

  return runner.on('7z', async (args) => {
    const archive = args[2];
    const outputDir = args[3].slice(2);
    await fs.ensureDir(outputDir);

    if (archive.endsWith('.exe')) {
      await fs.writeFile(path.join(outputDir, nupkgName), 'nupkg');
      await fs.writeFile(path.join(outputDir, 'RELEASES'), `0000 ${nupkgName} 1`);
      return;
    }

    const netDir = path.join(outputDir, 'lib', 'net45');
    const resourcesDir = path.join(netDir, 'resources');
    await fs.ensureDir(resourcesDir);
    await fs.writeFile(path.join(netDir, 'claude.exe'), 'MZ');
    await fs.writeFile(path.join(resourcesDir, 'TrayIconTemplate.png'), 'tray');
    await fs.writeFile(path.join(resourcesDir, 'en-US.json'), '{"hello":"Hello"}');

    if (options.withAppAsar !== false) {
      const sourceDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fake-app-'));
      await writeFiles(sourceDir, options.appFiles ?? DEFAULT_APP_FILES);
      await asar.createPackage(sourceDir, path.join(resourcesDir, 'app.asar'));
      await fs.remove(sourceDir);
    }
    if (options.withUnpacked !== false) {
      await writeFiles(path.join(resourcesDir, 'app.asar.unpacked'), {
        'node_modules/claude-native/claude-native-binding.node': 'binary',
      });
    }
  });
}

/**
 * wrestool 과 icotool. iconSizes 에 있는 크기만 PNG 를 만든다
 */
export function installFakeIconTools(runner: FakeRunner, iconSizes: number[] = ALL_ICON_SIZES): FakeRunner {
  return runner
    .on('wrestool', async (_args, options) => {
      await fs.writeFile(path.join(options.cwd ?? '.', 'claude.ico'), 'ico');
    })
    .on('icotool', async (_args, options) => {
      for (const size of iconSizes) {
        const name = `claude_${ICON_INDEX[size]}_${size}x${size}x32.png`;
        await fs.writeFile(path.join(options.cwd ?? '.', name), `png-${size}`);
      }
    });
}

/**
 * `npm install --prefix <dir> electron@<ver>`
 */
export function installFakeNpm(runner: FakeRunner): FakeRunner {
  return runner.on('npm', async (args) => {
    const prefix = args[args.indexOf('--prefix') + 1];
    const distDir = path.join(prefix, 'node_modules', 'electron', 'dist');
    await fs.ensureDir(distDir);
    await fs.writeFile(path.join(distDir, 'electron'), 'elf');
    await fs.writeFile(path.join(distDir, 'chrome-sandbox'), 'elf');
  });
}

function defineValue(args: string[], name: string): string {
  const define = args.find((arg) => arg.startsWith(`${name} `));
  return define ? define.slice(name.length + 1) : '';
}

/**
 * rpmbuild. spec 의 Name/Version/Release/BuildArch 로 `_rpmdir/<arch>/` 에 파일을 만든다
 */
export function installFakeRpmbuild(runner: FakeRunner): FakeRunner {
  return runner.on('rpmbuild', async (args) => {
    const spec = await fs.readFile(args[args.length - 1], 'utf-8');
    const field = (name: string): string => new RegExp(`^${name}:\\s*(.+)$`, 'm').exec(spec)?.[1] ?? '';
    const arch = field('BuildArch');
    const fileName = `${field('Name')}-${field('Version')}-${field('Release')}.${arch}.rpm`;
    const target = path.join(defineValue(args, '_rpmdir'), arch, fileName);
    await fs.ensureDir(path.dirname(target));
    await fs.writeFile(target, 'rpm');
  });
}

/**
 * appimagetool [-u info] <AppDir> <output>
 */
export function installFakeAppImageTool(runner: FakeRunner): FakeRunner {
  return runner.on('appimagetool', async (args) => {
    await fs.writeFile(args[args.length - 1], 'appimage');
  });
}
