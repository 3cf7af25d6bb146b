import { parseFile, type IAudioMetadata } from 'music-metadata';
import type { AudioTags, SemanticTagKey, TagReader } from './index.js';

type CommonTags = IAudioMetadata['common'];

// parseFileの結果のうち、タグ解決に使う部分
export interface AudioMetadataSource {
  common: Partial<CommonTags>;
  native: IAudioMetadata['native'];
  format: Pick<IAudioMetadata['format'], 'duration'>;
}

// 意味上のタグ名の読み先。frames（ネイティブフレームID）を先に試し、無ければcommonタグを使う
interface FieldSource {
  readonly frames?: readonly string[];
  readonly common?: keyof CommonTags;
}

// common.year / originalyear は数値の年だけになるので、日時を含むフレームの文字列を優先する
const SEMANTIC_FIELDS: Record<SemanticTagKey, FieldSource> = {
  title: { common: 'title' },
  artist: { common: 'artist' },
  album: { common: 'album' },
  comment: { common: 'comment' },
  lyrics: { common: 'lyrics' },
  composer: { common: 'composer' },
  year: { frames: ['TDRC', 'TYER', 'DATE', 'YEAR'], common: 'year' },
  albumYear: { frames: ['TDRL', 'RELEASEDATE'], common: 'releasedate' },
  originalYear: { frames: ['TDOR', 'TORY', 'ORIGINALDATE', 'ORIGINALYEAR'], common: 'originalyear' },
  recordingDate: { common: 'date' },
  originalReleaseDate: { common: 'originaldate' },
  recordingStartDate: { frames: ['TXXX:RECORDINGSTARTDATE', 'RECORDINGSTARTDATE'] },
};

function hasText(value: object): value is { text: unknown } {
  return 'text' in value;
}

/**
 * タグ値を文字列にする。配列は先頭要素、コメントや歌詞はtext、数値は文字列化。
 */
export function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : undefined;
  }
  if (Array.isArray(value)) {
    for (const item of value) {
      const text = textOf(item);
      if (text !== undefined) {
        return text;
      }
    }
    return undefined;
  }
  if (value !== null && typeof value === 'object' && hasText(value)) {
    return textOf(value.text);
  }
  return undefined;
}

/**
 * music-metadataの解析結果をAudioTagsとして扱う
 */
export function createAudioTags(metadata: AudioMetadataSource): AudioTags {
  const getFirstRaw = (frameId: string): string | undefined => {
    const wanted = frameId.toUpperCase();
    // ID3v2.3、ID3v2.4、vorbis、APEv2などすべてのタグブロックを順に探す
    for (const tags of Object.values(metadata.native)) {
      for (const tag of tags) {
        if (tag.id.toUpperCase() !== wanted) {
          continue;
        }
        const value: unknown = tag.value;
        const text = textOf(value);
        if (text !== undefined) {
          return text;
        }
      }
    }
    return undefined;
  };

  const getFirst = (key: SemanticTagKey): string | undefined => {
    const source = SEMANTIC_FIELDS[key];
    for (const frameId of source.frames ?? []) {
      const text = getFirstRaw(frameId);
      if (text !== undefined) {
        return text;
      }
    }
    if (source.common === undefined) {
      return undefined;
    }
    const value: unknown = metadata.common[source.common];
    return textOf(value);
  };

  return {
    getFirst,
    getFirstRaw,
    durationSeconds: metadata.format.duration,
  };
}

export class MusicMetadataTagReader implements TagReader {
  async read(filePath: string): Promise<AudioTags> {
    // アートワークはフィード側で別ファイルから解決するので読み込まない
    const metadata = await parseFile(filePath, { skipCovers: true });
    return createAudioTags(metadata);
  }
}
