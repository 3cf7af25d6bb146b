import fs from 'fs/promises';
import path from 'path';
import type { AudioTags, Episode, SemanticTagKey, TagReader } from './index.js';
import { parseDateParts } from './date-parts.js';
import { formatDuration, normalizeDurationSeconds } from '../utils/audio.js';
import { nonBlank, stripExtension } from '../utils/text.js';
import { errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export const UNKNOWN_ARTIST = 'Unknown';
export const DEFAULT_ALBUM = 'Podcast Archive';

// フォールバックチェーンの1回分の参照
export type TagLookup =
  | { kind: 'semantic'; key: SemanticTagKey }
  | { kind: 'raw'; frameId: string };

function semantic(...keys: SemanticTagKey[]): TagLookup[] {
  return keys.map((key): TagLookup => ({ kind: 'semantic', key }));
}

function raw(...frameIds: string[]): TagLookup[] {
  return frameIds.map((frameId): TagLookup => ({ kind: 'raw', frameId }));
}

// 説明文はツールによって保存先が違う。コメント系のタグを優先し、生のフレームIDは後で試す
export const DESCRIPTION_CHAIN: readonly TagLookup[] = [
  ...semantic('comment', 'lyrics', 'composer'),
  ...raw('COMM', 'COMMENT', 'DESCRIPTION', 'DESC', 'REMARK', 'REMARKS'),
];

// 年だけのタグもあれば録音日時まで入ったタグもある
export const DATE_CHAIN: readonly TagLookup[] = [
  ...semantic('year', 'albumYear', 'originalYear', 'recordingDate', 'originalReleaseDate', 'recordingStartDate'),
  ...raw('TDRC', 'TYER', 'DATE', 'YEAR', 'ORIGINALYEAR'),
];

/**
 * 順に試して最初に値が得られたものを返す
 */
export function findFirst<T, R>(items: readonly T[], attempt: (item: T) => R | undefined): R | undefined {
  for (const item of items) {
    const result = attempt(item);
    if (result !== undefined) {
      return result;
    }
  }
  return undefined;
}

function describeLookup(lookup: TagLookup): string {
  return lookup.kind === 'semantic' ? lookup.key : lookup.frameId;
}

export class MetadataResolver {
  private tagReader: TagReader;
  private logger = getLogger();

  constructor(tagReader: TagReader) {
    this.tagReader = tagReader;
  }

  /**
   * 読めないファイルは除外し、残りのエピソードを入力順で返す
   */
  async resolveAll(filePaths: readonly string[]): Promise<Episode[]> {
    const episodes: Episode[] = [];
    for (const filePath of filePaths) {
      const episode = await this.resolve(filePath);
      if (episode) {
        episodes.push(episode);
      }
    }

    this.logger.debug({ total: filePaths.length, resolved: episodes.length }, 'エピソードのメタデータを解決しました');
    return episodes;
  }

  async resolve(filePath: string): Promise<Episode | undefined> {
    const filename = path.basename(filePath);
    const source = await this.readSource(filePath, filename);
    if (!source) {
      return undefined;
    }
    const { tags, fileSizeBytes } = source;

    const lookup = (entry: TagLookup): string | undefined => this.lookup(tags, entry, filename);

    const publishedAt = findFirst(DATE_CHAIN, (entry) => parseDateParts(lookup(entry)));
    const durationSeconds = normalizeDurationSeconds(tags.durationSeconds);

    return {
      filename,
      title: lookup({ kind: 'semantic', key: 'title' }) ?? stripExtension(filename),
      artist: lookup({ kind: 'semantic', key: 'artist' }) ?? UNKNOWN_ARTIST,
      album: lookup({ kind: 'semantic', key: 'album' }) ?? DEFAULT_ALBUM,
      description: findFirst(DESCRIPTION_CHAIN, lookup) ?? '',
      year: publishedAt?.year,
      publishedAt,
      fileSizeBytes,
      durationSeconds,
      durationText: formatDuration(durationSeconds),
    };
  }

  private async readSource(
    filePath: string,
    filename: string
  ): Promise<{ tags: AudioTags; fileSizeBytes: number } | undefined> {
    try {
      const tags = await this.tagReader.read(filePath);
      const stats = await fs.stat(filePath);
      return { tags, fileSizeBytes: stats.size };
    } catch (error) {
      // 壊れたファイルが1つあってもフィード全体は止めない
      this.logger.warn({ file: filename, error: errorMessage(error) }, '読み込めない音声ファイルをスキップします');
      return undefined;
    }
  }

  // 1キー分の参照。失敗したキーだけを未設定として扱い、チェーンは続ける
  private lookup(tags: AudioTags, entry: TagLookup, filename: string): string | undefined {
    try {
      const value = entry.kind === 'semantic' ? tags.getFirst(entry.key) : tags.getFirstRaw(entry.frameId);
      return nonBlank(value);
    } catch (error) {
      this.logger.debug(
        { file: filename, key: describeLookup(entry), error: errorMessage(error) },
        'タグの読み取りに失敗したため未設定として扱います'
      );
      return undefined;
    }
  }
}
