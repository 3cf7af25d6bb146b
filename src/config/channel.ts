import type { PodcastConfig } from './schema.js';
import { nonBlank, trimTrailingSlashes } from '../utils/text.js';

export const DEFAULT_BASE_URL = 'http://localhost:8080';
export const DEFAULT_CHANNEL_TITLE = 'Podcast Archive';
export const DEFAULT_CHANNEL_DESCRIPTION = 'Local podcast archive feed.';
export const DEFAULT_CHANNEL_AUTHOR = 'Podcast Archive';
export const DEFAULT_OWNER_NAME = 'Podcast Archive';
export const DEFAULT_OWNER_EMAIL = 'owner@example.com';
export const DEFAULT_IMAGE_BASE_PATH = '/images';

/**
 * フィード生成で使うチャンネル情報。すべて空でない値に正規化済み。
 */
export interface ChannelSettings {
  readonly baseUrl: string; // 末尾スラッシュなし
  readonly title: string;
  readonly link: string;
  readonly description: string;
  readonly author: string;
  readonly explicit: boolean;
  readonly imageUrl?: string;
  readonly ownerName: string;
  readonly ownerEmail: string;
  readonly imageBasePath: string; // 先頭スラッシュあり、末尾スラッシュなし
}

function normalizeUrl(value: string | undefined): string | undefined {
  const trimmed = value === undefined ? undefined : trimTrailingSlashes(value);
  return trimmed ? trimmed : undefined;
}

// URLの結合を毎回同じ形にするため "/images" の形にそろえる
export function normalizeImageBasePath(value: string | undefined): string {
  const trimmed = nonBlank(value);
  if (!trimmed) {
    return DEFAULT_IMAGE_BASE_PATH;
  }
  const withLeadingSlash = trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
  const normalized = withLeadingSlash.replace(/\/+$/, '');
  return normalized || '/';
}

export function resolveChannelSettings(podcast: Partial<PodcastConfig>): ChannelSettings {
  const baseUrl = normalizeUrl(podcast.baseUrl) ?? DEFAULT_BASE_URL;

  return Object.freeze({
    baseUrl,
    title: nonBlank(podcast.channelTitle) ?? DEFAULT_CHANNEL_TITLE,
    // チャンネルリンク未設定でもRSSとして有効になるようbaseUrlを使う
    link: normalizeUrl(podcast.channelLink) ?? baseUrl,
    description: nonBlank(podcast.channelDescription) ?? DEFAULT_CHANNEL_DESCRIPTION,
    author: nonBlank(podcast.channelAuthor) ?? DEFAULT_CHANNEL_AUTHOR,
    explicit: podcast.explicit ?? false,
    imageUrl: nonBlank(podcast.channelImageUrl),
    ownerName: nonBlank(podcast.channelOwnerName) ?? DEFAULT_OWNER_NAME,
    ownerEmail: nonBlank(podcast.channelOwnerEmail) ?? DEFAULT_OWNER_EMAIL,
    imageBasePath: normalizeImageBasePath(podcast.imageBasePath),
  });
}
