/**
 * Patch Stage
 * app.asar 를 풀어 Windows 전용 네이티브 모듈을 대체하고 소스 패치 규칙을 적용한 뒤 다시 묶는다.
 */

import * as asar from '@electron/asar';
import * as fs from 'fs-extra';
import * as path from 'path';
import { StagingTree } from '../../types';
import { ExtractionFailedError, errorMessage } from '../errors';
import { recreateDir } from '../shared/file-utils';
import { PatchRule, PatchRuleResult, applyPatchRule, loadPatchRules } from './patchRule';
import logger from '../../utils/logger';

/** 패키지에 포함된 리소스 디렉토리 (shims, patch-rules.json) */
export const RESOURCES_DIR = path.resolve(__dirname, '..', '..', '..', 'resources');
export const DEFAULT_PATCH_RULES_PATH = path.join(RESOURCES_DIR, 'patch-rules.json');

/** asar 읽기/쓰기 */
export interface AsarTool {
  extract(archivePath: string, destDir: string): Promise<void>;
  pack(sourceDir: string, archivePath: string, options: { unpack?: string }): Promise<void>;
}

// @electron/asar 는 경로별로 헤더를 캐시하므로 같은 경로에 다시 쓰면 캐시를 비운다
export const electronAsarTool: AsarTool = {
  async extract(archivePath, destDir) {
    asar.extractAll(archivePath, destDir);
    asar.uncache(archivePath);
  },
  async pack(sourceDir, archivePath, options) {
    await asar.createPackageWithOptions(sourceDir, archivePath, options);
    asar.uncache(archivePath);
  },
};

/** 네이티브 모듈 대체 항목 */
export interface NativeShim {
  /** asar 루트 기준 경로 */
  entry: string;
  /** resources/shims/ 아래 대체 파일 */
  source: string;
}

export const DEFAULT_NATIVE_SHIMS: NativeShim[] = [
  { entry: 'node_modules/claude-native/index.js', source: 'claude-native.js' },
];

export interface PatchOptions {
  workDir: string;
  staging: StagingTree;
  rules: PatchRule[];
  shims?: NativeShim[];
  onWarning?: (message: string) => void;
}

export interface PatchReport {
  contentsDir: string;
  shims: string[];
  rules: PatchRuleResult[];
  copiedResources: number;
}

/**
 * 설정에 사용자 규칙 파일이 있으면 그것을, 없으면 기본 규칙을 읽는다
 */
export async function resolvePatchRules(customPath?: string): Promise<PatchRule[]> {
  return loadPatchRules(customPath ? path.resolve(customPath) : DEFAULT_PATCH_RULES_PATH);
}

export class AsarPatcher {
  constructor(
    private asarTool: AsarTool = electronAsarTool,
    private shimsDir: string = path.join(RESOURCES_DIR, 'shims')
  ) {}

  async patch(options: PatchOptions): Promise<PatchReport> {
    const { staging } = options;
    const shims = options.shims ?? DEFAULT_NATIVE_SHIMS;
    const archivePath = path.join(staging.appDir, 'app.asar');
    const unpackedDir = path.join(staging.appDir, 'app.asar.unpacked');
    const contentsDir = path.join(path.resolve(options.workDir), 'app.asar.contents');

    await recreateDir(contentsDir);
    try {
      await this.asarTool.extract(archivePath, contentsDir);
    } catch (error) {
      throw new ExtractionFailedError(`app.asar 를 풀 수 없습니다: ${errorMessage(error)}`, { archivePath }, 'patch');
    }

    // 1. 네이티브 모듈 대체 (asar 내부 + unpacked 양쪽)
    const replaced: string[] = [];
    for (const shim of shims) {
      const content = await fs.readFile(path.join(this.shimsDir, shim.source), 'utf-8');
      for (const root of [contentsDir, unpackedDir]) {
        const target = path.join(root, shim.entry);
        await fs.ensureDir(path.dirname(target));
        await fs.writeFile(target, content, 'utf-8');
      }
      replaced.push(shim.entry);
      logger.debug('네이티브 모듈 대체', { entry: shim.entry, source: shim.source });
    }

    // 2. 트레이 아이콘, 로케일 파일 복사
    const resourcesTarget = path.join(contentsDir, 'resources');
    for (const file of staging.trayIcons) {
      await fs.copy(file, path.join(resourcesTarget, path.basename(file)));
    }
    for (const file of staging.localeFiles) {
      await fs.copy(file, path.join(resourcesTarget, 'i18n', path.basename(file)));
    }

    // 3. 소스 패치 규칙
    const results: PatchRuleResult[] = [];
    for (const rule of options.rules) {
      const result = await applyPatchRule(rule, contentsDir);
      if (result.status === 'skipped') {
        const message = `선택 패치 규칙이 적용되지 않았습니다: ${rule.id}`;
        logger.warn(message, { files: rule.files });
        options.onWarning?.(message);
      } else {
        logger.info('패치 적용', { rule: rule.id, files: result.files, replacements: result.replacements });
      }
      results.push(result);
    }

    // 4. 다시 묶기 (.node 바이너리는 unpacked 로)
    await fs.remove(archivePath);
    await this.asarTool.pack(contentsDir, archivePath, { unpack: '*.node' });

    logger.info('app.asar 재구성 완료', { archivePath });

    return {
      contentsDir,
      shims: replaced,
      rules: results,
      copiedResources: staging.trayIcons.length + staging.localeFiles.length,
    };
  }
}
