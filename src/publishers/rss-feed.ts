import RSS from 'rss';
import { createHash, type Hash } from 'crypto';
import type { Episode } from '../media/index.js';
import { hasFullDateTime, toInstant, toIsoPartial } from '../media/date-parts.js';
import type { ChannelSettings } from '../config/channel.js';
import type { ImageResolver } from './image-resolver.js';
import { formatDurationMillis } from '../utils/audio.js';
import { compareIgnoreCase, nonBlank, stripInvalidXmlChars } from '../utils/text.js';
import { FeedSerializationError, HashAlgorithmUnavailableError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export const ITUNES_NAMESPACE = 'http://www.itunes.com/dtds/podcast-1.0.dtd';
export const GUID_PREFIX = 'urn:podcastarchive:';
const GUID_HASH_ALGORITHM = 'sha256';
const AUDIO_MIME_TYPE = 'audio/mpeg';

// rssパッケージ（xmlパッケージ）が受け付ける要素の形
export type XmlContent =
  | string
  | number
  | { _attr: Record<string, string | number> }
  | { _cdata: string }
  | readonly XmlElement[];
export type XmlElement = Readonly<Record<string, XmlContent>>;

/**
 * itunes:* などの拡張要素を積み上げる。add は常に新しいインスタンスを返す。
 */
export class CustomElements {
  private constructor(private readonly elements: readonly XmlElement[]) {}

  static empty(): CustomElements {
    return new CustomElements([]);
  }

  add(name: string, content: XmlContent): CustomElements {
    return new CustomElements([...this.elements, { [name]: content }]);
  }

  addOptional<T>(name: string, value: T | undefined, render: (value: T) => XmlContent): CustomElements {
    return value === undefined ? this : this.add(name, render(value));
  }

  // 空白だけのテキストは要素ごと出さない
  addText(name: string, value: string): CustomElements {
    const text = stripInvalidXmlChars(value);
    return this.addOptional(name, nonBlank(text) === undefined ? undefined : text, (content) => content);
  }

  get length(): number {
    return this.elements.length;
  }

  build(): XmlElement[] {
    return [...this.elements];
  }
}

// 年の降順（年なしは末尾）、同じ年はファイル名の昇順
export function compareEpisodes(a: Episode, b: Episode): number {
  if (a.year !== b.year) {
    if (a.year === undefined) return 1;
    if (b.year === undefined) return -1;
    return b.year - a.year;
  }
  return compareIgnoreCase(a.filename, b.filename);
}

export function sortEpisodes(episodes: readonly Episode[]): Episode[] {
  return [...episodes].sort(compareEpisodes);
}

// 配信先のURLが変わってもクライアントが同じエピソードと認識できるよう、ファイル名だけから作る
export function buildStableGuid(filename: string): string {
  let hash: Hash;
  try {
    hash = createHash(GUID_HASH_ALGORITHM);
  } catch (error) {
    throw new HashAlgorithmUnavailableError(GUID_HASH_ALGORITHM, { cause: error });
  }
  return GUID_PREFIX + hash.update(filename.trim().toLowerCase(), 'utf8').digest('hex');
}

export function buildFileUrl(baseUrl: string, filename: string): string {
  return `${baseUrl}/file/${encodeURIComponent(filename)}`;
}

export function buildImageUrl(settings: Pick<ChannelSettings, 'baseUrl' | 'imageBasePath'>, imageFilename: string): string {
  const basePath = settings.imageBasePath === '/' ? '' : settings.imageBasePath;
  return `${settings.baseUrl}${basePath}/${encodeURIComponent(imageFilename)}`;
}

// 空の itunes:* 要素を行ごと取り除く（属性や中身があるものは残す）
const EMPTY_ITUNES_ELEMENT = /\n?[ \t]*<(itunes:[\w.-]+)\s*(?:\/>|><\/\1>)/g;
const CDATA_SECTION = /(<!\[CDATA\[[\s\S]*?\]\]>)/;

// CDATAの中は本文なので書き換えない（splitの奇数番目がCDATA）
export function stripEmptyItunesElements(xml: string): string {
  return xml
    .split(CDATA_SECTION)
    .map((part, index) => (index % 2 === 1 ? part : part.replace(EMPTY_ITUNES_ELEMENT, '')))
    .join('');
}

export function serializeFeed(feed: Pick<RSS, 'xml'>): string {
  try {
    return feed.xml({ indent: true });
  } catch (error) {
    throw new FeedSerializationError(undefined, { cause: error });
  }
}

function channelElements(settings: ChannelSettings): CustomElements {
  return CustomElements.empty()
    .addText('itunes:author', settings.author)
    .add('itunes:explicit', String(settings.explicit))
    .addText('itunes:summary', settings.description)
    .add('itunes:owner', [
      { 'itunes:name': stripInvalidXmlChars(settings.ownerName) },
      { 'itunes:email': stripInvalidXmlChars(settings.ownerEmail) },
    ])
    .addOptional('itunes:image', settings.imageUrl, (href) => ({ _attr: { href } }));
}

function itemElements(episode: Episode, settings: ChannelSettings, imageFilename: string | undefined): CustomElements {
  return CustomElements.empty()
    .addOptional('dc:date', episode.publishedAt, toIsoPartial)
    .addText('itunes:author', episode.artist)
    .addText('itunes:title', episode.title)
    .addText('itunes:subtitle', episode.album)
    .addText('itunes:summary', episode.description)
    .add('itunes:explicit', String(settings.explicit))
    .add('itunes:duration', formatDurationMillis(Math.max(episode.durationSeconds, 0) * 1000))
    .addOptional('itunes:image', imageFilename, (image) => ({ _attr: { href: buildImageUrl(settings, image) } }));
}

export class RSSFeedBuilder {
  private logger = getLogger();

  constructor(private readonly settings: ChannelSettings) {}

  build(episodes: readonly Episode[], images: ImageResolver): string {
    const { settings } = this;

    const feed = new RSS({
      title: stripInvalidXmlChars(settings.title),
      description: stripInvalidXmlChars(settings.description),
      feed_url: `${settings.baseUrl}/feed?format=rss`,
      site_url: settings.link,
      generator: 'podcast-archive',
      custom_namespaces: { itunes: ITUNES_NAMESPACE },
      custom_elements: channelElements(settings).build(),
    });

    for (const episode of sortEpisodes(episodes)) {
      const fileUrl = buildFileUrl(settings.baseUrl, episode.filename);
      const publishedAt = episode.publishedAt;
      // pubDateは時刻まで分かるときだけ。年だけの日付を1月1日として出さない
      const pubDate = publishedAt && hasFullDateTime(publishedAt) ? toInstant(publishedAt) : undefined;

      feed.item({
        title: stripInvalidXmlChars(episode.title),
        description: stripInvalidXmlChars(episode.description),
        url: fileUrl,
        guid: buildStableGuid(episode.filename),
        author: stripInvalidXmlChars(episode.artist),
        date: pubDate ?? '',
        enclosure: {
          url: fileUrl,
          type: AUDIO_MIME_TYPE,
          size: Math.max(episode.fileSizeBytes, 0),
        },
        custom_elements: itemElements(episode, settings, images.resolve(episode.filename)).build(),
      });
    }

    const xml = stripEmptyItunesElements(serializeFeed(feed));
    this.logger.debug({ count: episodes.length }, 'RSSフィードを生成しました');
    return xml;
  }
}

export function buildFeed(episodes: readonly Episode[], settings: ChannelSettings, images: ImageResolver): string {
  return new RSSFeedBuilder(settings).build(episodes, images);
}
