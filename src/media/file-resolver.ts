import fs from 'fs/promises';
import path from 'path';
import { compareIgnoreCase } from '../utils/text.js';
import { getLogger } from '../utils/logger.js';

export const AUDIO_EXTENSION = '.mp3';

function isAudioFilename(filename: string): boolean {
  return filename.toLowerCase().endsWith(AUDIO_EXTENSION);
}

/**
 * メディアディレクトリ直下のMP3だけを扱う。
 * 要求されたファイル名はディレクトリ外に出ないことを確認してから返す。
 */
export class FileResolver {
  private mediaRoot: string;
  private logger = getLogger();

  constructor(mediaDir: string) {
    this.mediaRoot = path.resolve(mediaDir);
  }

  // ファイル名の大文字小文字を無視した順で返す（フィードの並びを毎回同じにする）
  async listAudioFiles(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.mediaRoot);
    } catch (error) {
      // 読めないディレクトリは空として扱い、フィード自体は返す
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        this.logger.debug({ mediaRoot: this.mediaRoot }, 'メディアディレクトリが存在しません');
      } else {
        this.logger.warn({ mediaRoot: this.mediaRoot, error }, 'メディアディレクトリの読み込みに失敗しました');
      }
      return [];
    }

    const files: string[] = [];
    for (const name of entries.filter(isAudioFilename).sort(compareIgnoreCase)) {
      const filePath = path.join(this.mediaRoot, name);
      if (await this.isRegularFile(filePath)) {
        files.push(filePath);
      }
    }
    return files;
  }

  async resolveAudioFile(filename: string): Promise<string | undefined> {
    const normalizedName = filename.trim();
    if (!normalizedName || !isAudioFilename(normalizedName)) {
      return undefined;
    }

    // 正規化した結果がメディアディレクトリの中に留まる場合だけ許可
    const resolved = path.resolve(this.mediaRoot, normalizedName);
    if (path.dirname(resolved) !== this.mediaRoot) {
      this.logger.warn({ filename }, 'メディアディレクトリ外へのアクセスを拒否しました');
      return undefined;
    }
    if (!(await this.isRegularFile(resolved))) {
      return undefined;
    }
    return resolved;
  }

  private async isRegularFile(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile();
    } catch {
      return false;
    }
  }
}
