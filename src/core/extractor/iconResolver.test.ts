import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { largestIcon, resolveIcons } from './iconResolver';

describe('iconResolver', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'icons-test-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  const touch = (name: string): Promise<void> => fs.writeFile(path.join(dir, name), name);

  it('크기별 아이콘과 빠진 크기를 구분', async () => {
    await touch('claude_13_16x16x32.png');
    await touch('claude_6_256x256x32.png');
    await touch('claude_8_48x48x32.png');

    const { icons, missing } = await resolveIcons(dir);

    expect(icons).toEqual({
      16: path.join(dir, 'claude_13_16x16x32.png'),
      48: path.join(dir, 'claude_8_48x48x32.png'),
      256: path.join(dir, 'claude_6_256x256x32.png'),
    });
    expect(missing).toEqual([24, 32, 64]);
  });

  it('같은 크기가 여러 개면 인덱스가 작은 것', async () => {
    await touch('claude_12_32x32x32.png');
    await touch('claude_10_32x32x32.png');

    const { icons } = await resolveIcons(dir);
    expect(icons[32]).toBe(path.join(dir, 'claude_10_32x32x32.png'));
  });

  it('지원하지 않는 크기와 다른 형식은 무시', async () => {
    await touch('claude_1_128x128x32.png');
    await touch('claude_2_48x48x8.png');
    await touch('claude.ico');

    const { icons, missing } = await resolveIcons(dir);
    expect(icons).toEqual({});
    expect(missing).toHaveLength(6);
  });

  it('없는 디렉토리는 모든 크기가 빠짐', async () => {
    const { missing } = await resolveIcons(path.join(dir, 'missing'));
    expect(missing).toEqual([16, 24, 32, 48, 64, 256]);
  });

  describe('largestIcon', () => {
    it('가장 큰 크기의 아이콘', () => {
      expect(largestIcon({ 16: '/a/16.png', 64: '/a/64.png' })).toBe('/a/64.png');
      expect(largestIcon({})).toBeUndefined();
    });
  });
});
