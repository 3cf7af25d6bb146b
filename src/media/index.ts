import type { DateParts } from './date-parts.js';

// タグから解決した1ファイル分のエピソード情報
export interface Episode {
  readonly filename: string; // 一覧内で一意
  readonly title: string;
  readonly artist: string;
  readonly album: string;
  readonly description: string; // 無ければ空文字
  readonly year?: number; // publishedAtと同じタグから得た年
  readonly publishedAt?: DateParts;
  readonly fileSizeBytes: number;
  readonly durationSeconds: number;
  readonly durationText: string; // HH:MM:SS
}

// ライブラリの違いを吸収した意味上のタグ名
export type SemanticTagKey =
  | 'title'
  | 'artist'
  | 'album'
  | 'comment'
  | 'lyrics'
  | 'composer'
  | 'year'
  | 'albumYear'
  | 'originalYear'
  | 'recordingDate'
  | 'originalReleaseDate'
  | 'recordingStartDate';

// 1ファイルから読み取ったタグ。各メソッドはキー単位で失敗（throw）することがある
export interface AudioTags {
  getFirst(key: SemanticTagKey): string | undefined;
  getFirstRaw(frameId: string): string | undefined;
  readonly durationSeconds: number | undefined;
}

// タグリーダーインターフェース
export interface TagReader {
  read(filePath: string): Promise<AudioTags>;
}

export {
  parseDateParts,
  hasFullDateTime,
  toIsoPartial,
  toInstant,
  type DateParts,
  type DatePrecision,
} from './date-parts.js';
export { MetadataResolver } from './metadata-resolver.js';
export { MusicMetadataTagReader } from './tag-reader.js';
export { FileResolver } from './file-resolver.js';
