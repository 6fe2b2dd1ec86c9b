import * as fs from 'fs-extra';
import * as path from 'path';
import { ICON_SIZES, IconSize, ResolvedIcons } from '../../types';

// icotool 이 만드는 파일명: claude_<index>_<size>x<size>x32.png
const ICON_FILE_PATTERN = /^claude_(\d+)_(\d+)x(\d+)x32\.png$/;

export interface IconResolution {
  icons: ResolvedIcons;
  missing: IconSize[];
}

function isIconSize(size: number): size is IconSize {
  return (ICON_SIZES as readonly number[]).includes(size);
}

/**
 * 디렉토리에서 크기별 아이콘 파일을 찾는다.
 * 같은 크기가 여러 개면 인덱스가 가장 작은 것을 쓴다. 없는 크기는 missing 으로 보고한다.
 */
export async function resolveIcons(dir: string): Promise<IconResolution> {
  const entries = (await fs.pathExists(dir)) ? await fs.readdir(dir) : [];
  const candidates = new Map<IconSize, { index: number; file: string }>();

  for (const entry of entries) {
    const match = ICON_FILE_PATTERN.exec(entry);
    if (!match) continue;

    const index = Number(match[1]);
    const width = Number(match[2]);
    const height = Number(match[3]);
    if (width !== height || !isIconSize(width)) continue;

    const current = candidates.get(width);
    if (!current || index < current.index) {
      candidates.set(width, { index, file: path.join(dir, entry) });
    }
  }

  const icons: ResolvedIcons = {};
  const missing: IconSize[] = [];
  for (const size of ICON_SIZES) {
    const found = candidates.get(size);
    if (found) {
      icons[size] = found.file;
    } else {
      missing.push(size);
    }
  }
  return { icons, missing };
}

/**
 * 가장 큰 아이콘 (AppImage 루트 아이콘용)
 */
export function largestIcon(icons: ResolvedIcons): string | undefined {
  for (const size of [...ICON_SIZES].reverse()) {
    const file = icons[size];
    if (file) return file;
  }
  return undefined;
}
