/**
 * Electron 런타임을 앱 스테이징 디렉토리의 node_modules 에 설치한다.
 * 패키지가 시스템 electron 없이 실행되도록 하기 위함.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { RuntimeProvisionFailedError, errorMessage, tailLines } from '../errors';
import { CommandResult, CommandRunner } from '../shared/process-utils';
import logger from '../../utils/logger';

export interface ProvisionOptions {
  appDir: string;
  electronVersion: string;
}

/** 스테이징 디렉토리 기준 Electron 실행 파일 위치 */
export const ELECTRON_BINARY_SUBPATH = path.join('node_modules', 'electron', 'dist', 'electron');

export class RuntimeProvisioner {
  constructor(private runner: CommandRunner) {}

  async provision(options: ProvisionOptions): Promise<string> {
    const electronBinary = path.join(options.appDir, ELECTRON_BINARY_SUBPATH);
    const spec = `electron@${options.electronVersion}`;

    logger.info('Electron 런타임 설치 중', { spec, appDir: options.appDir });

    let result: CommandResult;
    try {
      result = await this.runner.run(
        'npm',
        ['install', '--no-save', '--no-package-lock', '--no-fund', '--no-audit', '--prefix', options.appDir, spec],
        { cwd: options.appDir }
      );
    } catch (error) {
      throw new RuntimeProvisionFailedError(`npm 을 실행할 수 없습니다: ${errorMessage(error)}`);
    }

    if (result.exitCode !== 0) {
      throw new RuntimeProvisionFailedError(`Electron 설치 실패 (exit ${result.exitCode})`, {
        exitCode: result.exitCode,
        stderr: tailLines(result.stderr),
      });
    }

    if (!(await fs.pathExists(electronBinary))) {
      throw new RuntimeProvisionFailedError(`설치 후 Electron 실행 파일이 없습니다: ${electronBinary}`);
    }

    logger.info('Electron 런타임 설치 완료', { electronBinary });
    return electronBinary;
  }
}
