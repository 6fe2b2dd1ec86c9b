// 외부 도구(7z, rpmbuild, appimagetool 등) 실행 유틸리티
import { spawn } from 'child_process';
import * as fs from 'fs-extra';
import * as path from 'path';
import logger from '../../utils/logger';

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * 서브프로세스 실행 인터페이스
 * 테스트에서는 프로세스를 띄우지 않는 구현으로 대체한다.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
  /** PATH 에서 실행 파일을 찾는다. 없으면 null */
  which(command: string): Promise<string | null>;
}

export class ProcessRunner implements CommandRunner {
  /**
   * 명령을 실행하고 종료 코드와 출력을 모아 반환한다.
   * 실행 파일 자체를 찾지 못하면 reject 된다.
   */
  async run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    logger.debug('명령 실행', { command, args, cwd: options.cwd });

    return new Promise<CommandResult>((resolve, reject) => {
      const proc = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      proc.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      proc.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      proc.on('error', (err) => {
        reject(err);
      });

      proc.on('close', (code, signal) => {
        const exitCode = code ?? (signal ? 128 : 1);
        logger.debug('명령 종료', { command, exitCode });
        if (stdout) logger.debug(stdout.trimEnd());
        resolve({ exitCode, stdout, stderr });
      });
    });
  }

  async which(command: string): Promise<string | null> {
    return findExecutable(command, process.env.PATH ?? '');
  }
}

/**
 * PATH 문자열에서 실행 가능한 파일을 찾는다.
 */
export async function findExecutable(command: string, searchPath: string): Promise<string | null> {
  if (command.includes('/')) {
    return (await isExecutable(command)) ? command : null;
  }
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, command);
    if (await isExecutable(candidate)) {
      return candidate;
    }
  }
  return null;
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) return false;
    await fs.access(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

// 싱글톤 인스턴스
let processRunnerInstance: ProcessRunner | null = null;

export function getProcessRunner(): ProcessRunner {
  if (!processRunnerInstance) {
    processRunnerInstance = new ProcessRunner();
  }
  return processRunnerInstance;
}
