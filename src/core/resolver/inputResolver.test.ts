import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import axios from 'axios';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { DownloadProgressEvent } from '../../types';
import { DownloadFailedError, InputNotFoundError } from '../errors';
import { InputResolver, getDownloadPath, getInputResolver } from './inputResolver';

// axios 모킹
vi.mock('axios');
const mockedAxios = vi.mocked(axios, true);

const downloadUrls = {
  x86_64: 'https://downloads.example.com/nest-win-x64/Claude-Setup-x64.exe',
  aarch64: 'https://downloads.example.com/nest-win-arm64/Claude-Setup-arm64.exe',
};

describe('InputResolver', () => {
  let workDir: string;
  const resolver = new InputResolver();

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'resolver-test-'));
    mockedAxios.get.mockReset();
  });

  afterEach(async () => {
    await fs.remove(workDir);
  });

  describe('로컬 설치 파일', () => {
    it('존재하면 그대로 사용하고 다운로드하지 않음', async () => {
      const installer = path.join(workDir, 'Claude-Setup-x64.exe');
      await fs.writeFile(installer, 'MZ');

      const artifact = await resolver.resolve({
        architecture: 'x86_64',
        workDir,
        downloadUrls,
        installerPath: installer,
      });

      expect(artifact).toEqual({ path: installer, sourceKind: 'local' });
      expect(mockedAxios.get).not.toHaveBeenCalled();
    });

    it('없으면 InputNotFoundError', async () => {
      const missing = path.join(workDir, 'missing.exe');
      await expect(
        resolver.resolve({ architecture: 'x86_64', workDir, downloadUrls, installerPath: missing })
      ).rejects.toThrow(InputNotFoundError);
    });

    it('디렉토리를 지정하면 InputNotFoundError', async () => {
      await expect(
        resolver.resolve({ architecture: 'x86_64', workDir, downloadUrls, installerPath: workDir })
      ).rejects.toMatchObject({ code: 'INPUT_NOT_FOUND', details: { path: workDir } });
    });
  });

  describe('다운로드', () => {
    it('아키텍처별 주소에서 받아 작업 디렉토리에 저장', async () => {
      mockedAxios.get.mockResolvedValueOnce({
        status: 200,
        headers: { 'content-length': '4' },
        data: Readable.from([Buffer.from('MZ..')]),
      });
      const events: DownloadProgressEvent[] = [];

      const artifact = await resolver.resolve({
        architecture: 'aarch64',
        workDir,
        downloadUrls,
        onProgress: (event) => events.push(event),
      });

      const expectedPath = path.join(workDir, 'Claude-Setup-arm64.exe');
      expect(artifact).toEqual({ path: expectedPath, sourceKind: 'downloaded' });
      expect(await fs.readFile(expectedPath, 'utf-8')).toBe('MZ..');
      expect(mockedAxios.get.mock.calls[0][0]).toBe(downloadUrls.aarch64);
      expect(events).toEqual([{ downloadedBytes: 4, totalBytes: 4, progress: 100 }]);
    });

    it('2xx 가 아니면 DownloadFailedError (재시도 없음)', async () => {
      mockedAxios.get.mockResolvedValueOnce({ status: 403, headers: {}, data: Readable.from([]) });

      const error = await resolver
        .resolve({ architecture: 'x86_64', workDir, downloadUrls })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DownloadFailedError);
      expect(error).toMatchObject({ details: { url: downloadUrls.x86_64, status: 403 } });
      expect(mockedAxios.get).toHaveBeenCalledTimes(1);
    });

    it('네트워크 에러는 DownloadFailedError', async () => {
      mockedAxios.get.mockRejectedValueOnce(new Error('socket hang up'));

      await expect(resolver.resolve({ architecture: 'x86_64', workDir, downloadUrls })).rejects.toThrow(
        `다운로드 실패 (socket hang up): ${downloadUrls.x86_64}`
      );
    });

    it('주소 형식이 잘못되면 요청 없이 DownloadFailedError', async () => {
      const error = await resolver
        .resolve({ architecture: 'x86_64', workDir, downloadUrls: { ...downloadUrls, x86_64: 'not a url' } })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DownloadFailedError);
      expect(error).toMatchObject({ stage: 'resolve', details: { url: 'not a url' } });
      expect(mockedAxios.get).not.toHaveBeenCalled();
    });
  });

  describe('getDownloadPath', () => {
    it('URL 의 파일명을 사용', () => {
      expect(getDownloadPath('/work', 'https://example.com/a/b/Setup.exe?x=1')).toBe(path.join('/work', 'Setup.exe'));
    });

    it('파일명이 없으면 installer.exe', () => {
      expect(getDownloadPath('/work', 'https://example.com/')).toBe(path.join('/work', 'installer.exe'));
    });
  });

  describe('getInputResolver', () => {
    it('싱글톤 인스턴스 반환', () => {
      expect(getInputResolver()).toBe(getInputResolver());
    });
  });
});
