import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger.js';

// サーバー設定
const serverSchema = z.object({
  port: z.number().int().positive().default(8080),
});

// 音声ファイルの置き場所
const mediaSchema = z.object({
  dir: z.string().default('./podcasts'),
});

// エピソード画像の置き場所
const imagesSchema = z.object({
  dir: z.string().default('./public/images'),
});

// チャンネル設定（空文字は channel.ts で既定値に置き換える）
const podcastSchema = z.object({
  baseUrl: z.string().default('http://localhost:8080'),
  channelTitle: z.string().default('Podcast Archive'),
  channelLink: z.string().default(''),
  channelDescription: z.string().default('Local podcast archive feed.'),
  channelAuthor: z.string().default('Podcast Archive'),
  explicit: z.boolean().default(false),
  channelImageUrl: z.string().default(''),
  channelOwnerName: z.string().default('Podcast Archive'),
  channelOwnerEmail: z.string().default('owner@example.com'),
  imageBasePath: z.string().default('/images'),
});

// ログ設定
const loggingSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
});

// メイン設定スキーマ
export const configSchema = z.object({
  server: serverSchema.default({}),
  media: mediaSchema.default({}),
  images: imagesSchema.default({}),
  podcast: podcastSchema.default({}),
  logging: loggingSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type PodcastConfig = z.infer<typeof podcastSchema>;
