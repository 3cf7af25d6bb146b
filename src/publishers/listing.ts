import type { Episode } from '../media/index.js';
import type { ChannelSettings } from '../config/channel.js';
import { buildFileUrl } from './rss-feed.js';

// JSON一覧の1件分
export interface ListingItem {
  name: string;
  url: string;
  title: string;
  artist: string;
  album: string;
  duration: string;
  description: string;
  year: number | null;
}

// 入力順（ファイル一覧の順）のまま変換する
export function buildListing(episodes: readonly Episode[], settings: Pick<ChannelSettings, 'baseUrl'>): ListingItem[] {
  return episodes.map((episode) => ({
    name: episode.filename,
    url: buildFileUrl(settings.baseUrl, episode.filename),
    title: episode.title,
    artist: episode.artist,
    album: episode.album,
    duration: episode.durationText,
    description: episode.description,
    year: episode.year ?? null,
  }));
}
