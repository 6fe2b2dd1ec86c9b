import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import {
  ConfigManager,
  DEFAULT_CONFIG,
  getConfigManager,
  isConfigKey,
  isDownloadUrl,
  mergeConfig,
  parseConfigValue,
} from './config';

describe('config', () => {
  describe('parseConfigValue', () => {
    it('불리언, 숫자, 문자열 변환', () => {
      expect(parseConfigValue('true')).toBe(true);
      expect(parseConfigValue('false')).toBe(false);
      expect(parseConfigValue('3')).toBe(3);
      expect(parseConfigValue('debug')).toBe('debug');
      expect(parseConfigValue('')).toBe('');
    });
  });

  describe('isConfigKey', () => {
    it('점 표기 키 허용', () => {
      expect(isConfigKey('downloadUrls.x86_64')).toBe(true);
      expect(isConfigKey('packageName')).toBe(true);
      expect(isConfigKey('downloadUrls')).toBe(false);
      expect(isConfigKey('unknown')).toBe(false);
    });
  });

  describe('isDownloadUrl', () => {
    it('http, https 만 허용', () => {
      expect(isDownloadUrl('https://example.com/Claude-Setup-x64.exe')).toBe(true);
      expect(isDownloadUrl('http://mirror.example.com/setup.exe')).toBe(true);
      expect(isDownloadUrl('file:///tmp/setup.exe')).toBe(false);
      expect(isDownloadUrl('not a url')).toBe(false);
    });
  });

  describe('mergeConfig', () => {
    it('저장값이 없으면 기본값', () => {
      expect(mergeConfig(undefined)).toEqual(DEFAULT_CONFIG);
    });

    it('타입이 맞는 값만 반영', () => {
      const config = mergeConfig({
        packageName: 'claude-test',
        release: 2,
        bundleElectron: 'no',
        downloadUrls: { aarch64: 'https://example.com/arm.exe' },
      });
      expect(config.packageName).toBe('claude-test');
      expect(config.release).toBe('2');
      expect(config.bundleElectron).toBe(true);
      expect(config.downloadUrls.aarch64).toBe('https://example.com/arm.exe');
      expect(config.downloadUrls.x86_64).toBe(DEFAULT_CONFIG.downloadUrls.x86_64);
    });

    it('기본값 객체를 변경하지 않음', () => {
      mergeConfig({ downloadUrls: { x86_64: 'https://example.com/x.exe' } });
      expect(DEFAULT_CONFIG.downloadUrls.x86_64).not.toBe('https://example.com/x.exe');
    });
  });

  describe('ConfigManager', () => {
    let baseDir: string;
    let manager: ConfigManager;

    beforeEach(async () => {
      baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-test-'));
      manager = new ConfigManager(baseDir);
    });

    afterEach(async () => {
      await fs.remove(baseDir);
    });

    it('경로 구성', () => {
      expect(manager.getConfigPath()).toBe(path.join(baseDir, 'settings.json'));
      expect(manager.getLogsDir()).toBe(path.join(baseDir, 'logs'));
    });

    it('파일이 없으면 기본값 로드', async () => {
      expect(await manager.loadConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('저장 후 다시 로드', async () => {
      await manager.saveConfig({ ...DEFAULT_CONFIG, maintainer: 'Test Maintainer' });
      const loaded = await manager.loadConfig();
      expect(loaded.maintainer).toBe('Test Maintainer');
    });

    it('set 으로 중첩 키 변경', () => {
      const config = manager.set('downloadUrls.x86_64', 'https://example.com/setup.exe');
      expect(config.downloadUrls.x86_64).toBe('https://example.com/setup.exe');
      expect(manager.getConfig().downloadUrls.x86_64).toBe('https://example.com/setup.exe');
    });

    it('다운로드 주소가 http(s) 가 아니면 거부하고 저장하지 않음', () => {
      expect(() => manager.set('downloadUrls.x86_64', 'foo')).toThrow('http(s) 주소가 아닙니다: foo');
      expect(() => manager.set('downloadUrls.aarch64', 'ftp://example.com/a.exe')).toThrow();
      expect(manager.getConfig().downloadUrls.x86_64).toBe(DEFAULT_CONFIG.downloadUrls.x86_64);
    });

    it('set 은 숫자 값을 문자열 설정으로 저장', () => {
      manager.set('release', 3);
      expect(manager.getConfig().release).toBe('3');
    });

    it('알 수 없는 키는 거부', () => {
      expect(() => manager.set('cachePath', '/tmp')).toThrow('알 수 없는 설정 키입니다: cachePath');
    });

    it('bundleElectron 은 불리언만 허용', () => {
      expect(() => manager.set('bundleElectron', 'yes')).toThrow();
      expect(manager.set('bundleElectron', false).bundleElectron).toBe(false);
    });

    it('reset 은 기본값으로 되돌림', () => {
      manager.set('packageName', 'other');
      manager.reset();
      expect(manager.getConfig()).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('getConfigManager', () => {
    it('싱글톤 인스턴스 반환', () => {
      expect(getConfigManager()).toBe(getConfigManager());
    });
  });
});
