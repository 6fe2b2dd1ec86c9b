// 공통 모듈 진입점

// 파일 유틸리티
export {
  downloadFile,
  recreateDir,
  listFilesRecursive,
  writeTextFile,
  HttpStatusError,
} from './file-utils';
export type { ProgressCallback } from './file-utils';

// 프로세스 실행
export { ProcessRunner, getProcessRunner, findExecutable } from './process-utils';
export type { CommandRunner, CommandResult, RunOptions } from './process-utils';
