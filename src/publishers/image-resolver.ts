import fs from 'fs/promises';
import path from 'path';
import { compareIgnoreCase, stripExtension } from '../utils/text.js';
import { getLogger } from '../utils/logger.js';

// エピソードのファイル名から画像ファイル名を引く
export interface ImageResolver {
  resolve(episodeFilename: string): string | undefined;
}

function baseNameKey(filename: string): string {
  return stripExtension(filename.trim()).toLowerCase();
}

/**
 * 画像ディレクトリのファイル一覧。拡張子は問わず、ベース名を大文字小文字を無視して照合する。
 * 例: episode-2.mp3 → episode-2.webp
 */
export class ImageCatalog implements ImageResolver {
  private imagesByBaseName = new Map<string, string>();

  constructor(imageFilenames: readonly string[]) {
    // 同じベース名が複数ある場合も毎回同じ画像を選ぶよう、並べてから先頭を採用
    for (const filename of [...imageFilenames].sort(compareIgnoreCase)) {
      const key = baseNameKey(filename);
      if (key && !this.imagesByBaseName.has(key)) {
        this.imagesByBaseName.set(key, filename);
      }
    }
  }

  get size(): number {
    return this.imagesByBaseName.size;
  }

  resolve(episodeFilename: string): string | undefined {
    const key = baseNameKey(episodeFilename);
    return key ? this.imagesByBaseName.get(key) : undefined;
  }
}

// リクエストごとに画像ディレクトリを読み直す
export async function loadImageCatalog(imagesDir: string): Promise<ImageCatalog> {
  const logger = getLogger();
  const dir = path.resolve(imagesDir);

  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    // 画像が無くてもフィードは画像タグなしで生成できる
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      logger.debug({ dir }, '画像ディレクトリが存在しません');
    } else {
      logger.warn({ dir, error }, '画像ディレクトリの読み込みに失敗しました');
    }
    return new ImageCatalog([]);
  }

  const files: string[] = [];
  for (const name of entries) {
    try {
      const stats = await fs.stat(path.join(dir, name));
      if (stats.isFile()) {
        files.push(name);
      }
    } catch (error) {
      logger.debug({ dir, name, error }, '画像ファイルの情報を取得できませんでした');
    }
  }
  return new ImageCatalog(files);
}
