import 'dotenv/config';
import path from 'path';
import { loadConfig, resolveChannelSettings } from './config/index.js';
import { FileResolver, MetadataResolver, MusicMetadataTagReader } from './media/index.js';
import { createServer, startServer } from './publishers/index.js';
import { createLogger } from './utils/logger.js';

async function main(): Promise<void> {
  // コマンドライン引数を解析
  const args = process.argv.slice(2);
  const configPath = args.find((a) => a.startsWith('--config='))?.slice('--config='.length);

  // 設定を読み込み
  const config = loadConfig(configPath);

  // ロガーを初期化
  const logger = createLogger(config.logging.level);
  const settings = resolveChannelSettings(config.podcast);
  const mediaDir = path.resolve(config.media.dir);
  const imagesDir = path.resolve(config.images.dir);

  logger.info({ mediaDir, imagesDir, baseUrl: settings.baseUrl }, 'ポッドキャストアーカイブを起動します');

  const app = createServer({
    fileResolver: new FileResolver(mediaDir),
    metadataResolver: new MetadataResolver(new MusicMetadataTagReader()),
    imagesDir,
    settings,
  });
  const server = await startServer(app, config.server.port);

  logger.info(`エピソード一覧: ${settings.baseUrl}/feed`);
  logger.info(`RSSフィード: ${settings.baseUrl}/feed?format=rss`);

  // シグナルハンドリング
  const shutdown = (): void => {
    logger.info('シャットダウンを開始します');
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('起動エラー:', error);
  process.exit(1);
});
