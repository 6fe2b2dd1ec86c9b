/**
 * 빌드 파이프라인
 * resolve → extract → provision → patch → package → cleanup 을 순서대로 실행한다.
 * 어느 스테이지든 실패하면 즉시 중단한다.
 */

import { EventEmitter } from 'eventemitter3';
import * as path from 'path';
import {
  Architecture,
  BuildFormat,
  BuildResult,
  CleanPolicy,
  DownloadProgressEvent,
  PackagerState,
  StageName,
} from '../../types';
import { BuildConfig } from '../config';
import { BuildSettings, createBuildContext, detectArchitecture, validateBuildSettings } from '../context';
import { InputResolver } from '../resolver/inputResolver';
import { ResourceExtractor } from '../extractor/resourceExtractor';
import { RuntimeProvisioner } from '../runtime/runtimeProvisioner';
import { AsarPatcher, AsarTool, electronAsarTool, resolvePatchRules } from '../patcher/asarPatcher';
import { Packager } from '../packager/packager';
import { RpmPackager } from '../packager/rpmPackager';
import { AppImagePackager } from '../packager/appImagePackager';
import { CommandRunner, getProcessRunner } from '../shared/process-utils';
import { finalizeBuild } from './cleanup';
import logger from '../../utils/logger';

export interface BuildOptions {
  config: BuildConfig;
  buildFormat: BuildFormat;
  cleanPolicy: CleanPolicy;
  /** 생략 시 호스트 아키텍처 */
  architecture?: Architecture;
  /** 지정 시 다운로드 대신 로컬 설치 파일 사용 */
  installerPath?: string;
  workDir?: string;
  outputDir?: string;
}

export interface BuildPipelineDeps {
  runner?: CommandRunner;
  inputResolver?: InputResolver;
  asarTool?: AsarTool;
  packagers?: Partial<Record<BuildFormat, Packager>>;
}

export interface BuildPipelineEvents {
  stageStart: (stage: StageName) => void;
  stageComplete: (stage: StageName, duration: number) => void;
  stageFailed: (stage: StageName, error: Error) => void;
  warning: (stage: StageName, message: string) => void;
  downloadProgress: (progress: DownloadProgressEvent) => void;
  packagerState: (state: PackagerState) => void;
}

export function createPackager(format: BuildFormat, runner: CommandRunner): Packager {
  switch (format) {
    case 'rpm':
      return new RpmPackager(runner);
    case 'appimage':
      return new AppImagePackager(runner);
  }
}

export class BuildPipeline extends EventEmitter<BuildPipelineEvents> {
  private runner: CommandRunner;
  private inputResolver: InputResolver;
  private asarTool: AsarTool;
  private packagers: Partial<Record<BuildFormat, Packager>>;

  constructor(deps: BuildPipelineDeps = {}) {
    super();
    this.runner = deps.runner ?? getProcessRunner();
    this.inputResolver = deps.inputResolver ?? new InputResolver();
    this.asarTool = deps.asarTool ?? electronAsarTool;
    this.packagers = deps.packagers ?? {};
  }

  async run(options: BuildOptions): Promise<BuildResult> {
    const startTime = Date.now();
    const { config } = options;
    const workDir = path.resolve(options.workDir ?? config.workDir);

    logger.info('빌드 시작', { format: options.buildFormat, workDir });

    const { settings, installer } = await this.runStage('resolve', async () => {
      const settings: BuildSettings = {
        architecture: options.architecture ?? detectArchitecture(),
        workDir,
        outputDir: path.resolve(options.outputDir ?? config.outputDir),
        packageName: config.packageName,
        maintainer: config.maintainer,
        description: config.description,
        buildFormat: options.buildFormat,
        cleanPolicy: options.cleanPolicy,
        release: config.release,
      };
      validateBuildSettings(settings);

      const installer = await this.inputResolver.resolve({
        architecture: settings.architecture,
        workDir,
        downloadUrls: config.downloadUrls,
        installerPath: options.installerPath,
        onProgress: (progress) => this.emit('downloadProgress', progress),
      });
      return { settings, installer };
    });

    const { staging, context } = await this.runStage('extract', async () => {
      const staging = await new ResourceExtractor(this.runner).extract({
        installerPath: installer.path,
        workDir,
        onWarning: (message) => this.emit('warning', 'extract', message),
      });
      // 버전은 nupkg 파일명에서 확정된다
      const context = createBuildContext({ ...settings, version: staging.version });
      return { staging, context };
    });

    if (config.bundleElectron) {
      await this.runStage('provision', () =>
        new RuntimeProvisioner(this.runner).provision({
          appDir: staging.appDir,
          electronVersion: config.electronVersion,
        })
      );
    } else {
      const message = 'Electron 을 번들하지 않습니다. 설치 환경에 electron 이 있어야 합니다';
      logger.warn(message);
      this.emit('warning', 'provision', message);
    }

    await this.runStage('patch', async () => {
      const rules = await resolvePatchRules(config.patchRulesPath);
      return new AsarPatcher(this.asarTool).patch({
        workDir: context.workDir,
        staging,
        rules,
        onWarning: (message) => this.emit('warning', 'patch', message),
      });
    });

    const packaged = await this.runStage('package', () => {
      const packager = this.packagers[context.buildFormat] ?? createPackager(context.buildFormat, this.runner);
      return packager.package({
        context,
        staging,
        appImageUpdateInfo: config.appImageUpdateInfo,
        onWarning: (message) => this.emit('warning', 'package', message),
        onStateChange: (state) => this.emit('packagerState', state),
      });
    });

    const finalized = await this.runStage('cleanup', () => finalizeBuild(context, packaged, installer));

    const result: BuildResult = {
      artifactPath: finalized.artifactPath,
      version: context.version,
      architecture: context.architecture,
      format: context.buildFormat,
      cleaned: finalized.cleaned,
      duration: Date.now() - startTime,
    };
    logger.info('빌드 완료', { ...result });
    return result;
  }

  private async runStage<T>(stage: StageName, task: () => Promise<T>): Promise<T> {
    const stageStart = Date.now();
    this.emit('stageStart', stage);
    logger.debug('스테이지 시작', { stage });

    try {
      const result = await task();
      const duration = Date.now() - stageStart;
      logger.debug('스테이지 완료', { stage, duration });
      this.emit('stageComplete', stage, duration);
      return result;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error(`스테이지 실패: ${stage}`, { error: err.message });
      this.emit('stageFailed', stage, err);
      throw err;
    }
  }
}
