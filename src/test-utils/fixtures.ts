/**
 * 패키저 테스트용 빌드 컨텍스트와 스테이징 디렉토리
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { BuildContext, IconSize, ResolvedIcons, StagingTree } from '../types';
import { BuildContextInput, createBuildContext } from '../core/context';

export function createTestContext(root: string, overrides: Partial<BuildContextInput> = {}): BuildContext {
  return createBuildContext({
    version: '1.2.3',
    architecture: 'x86_64',
    workDir: path.join(root, 'work'),
    outputDir: path.join(root, 'out'),
    packageName: 'claude-desktop',
    maintainer: 'Test Maintainer <test@example.com>',
    description: 'Claude Desktop for Linux',
    buildFormat: 'rpm',
    cleanPolicy: 'no',
    release: '1',
    ...overrides,
  });
}

/**
 * `<workDir>/electron-app` 에 app.asar 자리와 아이콘을 만든다
 */
export async function createFakeStaging(
  context: BuildContext,
  iconSizes: IconSize[] = [16, 24, 32, 48, 64, 256]
): Promise<StagingTree> {
  const appDir = context.stagingDir;
  const iconDir = path.join(context.workDir, 'icons');
  await fs.outputFile(path.join(appDir, 'app.asar'), 'asar');
  await fs.outputFile(path.join(appDir, 'app.asar.unpacked', 'node_modules', 'claude-native', 'index.js'), 'shim');

  const icons: ResolvedIcons = {};
  for (const size of iconSizes) {
    const file = path.join(iconDir, `claude_${size}.png`);
    await fs.outputFile(file, `png-${size}`);
    icons[size] = file;
  }

  return {
    appDir,
    version: context.version,
    icons,
    extractDir: path.join(context.workDir, 'claude-extract'),
    trayIcons: [],
    localeFiles: [],
  };
}
