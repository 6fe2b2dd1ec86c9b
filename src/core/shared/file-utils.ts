// 파일 다운로드 및 파일 시스템 유틸리티
import axios from 'axios';
import * as fs from 'fs-extra';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';

export type ProgressCallback = (downloaded: number, total: number) => void;

/** HTTP 상태 코드가 2xx 가 아닐 때 */
export class HttpStatusError extends Error {
  constructor(readonly status: number) {
    super(`HTTP ${status}`);
    this.name = 'HttpStatusError';
  }
}

/**
 * 파일 다운로드 (진행률 콜백 포함)
 * 재시도와 타임아웃 없이 한 번만 시도한다. 실패하면 받다 만 파일은 지운다.
 */
export async function downloadFile(
  url: string,
  destPath: string,
  onProgress?: ProgressCallback
): Promise<void> {
  await fs.ensureDir(path.dirname(destPath));

  try {
    const response = await axios.get<Readable>(url, {
      responseType: 'stream',
      maxRedirects: 10,
      validateStatus: () => true,
      headers: { 'User-Agent': 'claude-desktop-linux/1.0' },
    });

    if (response.status < 200 || response.status >= 300) {
      response.data.destroy();
      throw new HttpStatusError(response.status);
    }

    const totalLength = parseInt(String(response.headers['content-length'] ?? '0'), 10);
    let downloadedLength = 0;

    response.data.on('data', (chunk: Buffer) => {
      downloadedLength += chunk.length;
      onProgress?.(downloadedLength, totalLength);
    });

    await pipeline(response.data, fs.createWriteStream(destPath));
  } catch (error) {
    await fs.remove(destPath);
    throw error;
  }
}

/**
 * 디렉토리를 비우고 다시 만든다 (스테이지 재실행 시 이전 결과 제거)
 */
export async function recreateDir(dir: string): Promise<void> {
  await fs.remove(dir);
  await fs.ensureDir(dir);
}

/**
 * 디렉토리 아래 모든 파일의 상대 경로 목록 (정렬됨, '/' 구분)
 */
export async function listFilesRecursive(rootDir: string): Promise<string[]> {
  const results: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else {
        results.push(path.relative(rootDir, fullPath).split(path.sep).join('/'));
      }
    }
  }

  if (await fs.pathExists(rootDir)) {
    await walk(rootDir);
  }
  return results.sort();
}

/**
 * 텍스트 파일 작성 후 권한 지정
 */
export async function writeTextFile(filePath: string, content: string, mode = 0o644): Promise<void> {
  await fs.ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, content, 'utf-8');
  await fs.chmod(filePath, mode);
}
