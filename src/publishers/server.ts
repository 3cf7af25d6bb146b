import express, { type Express, type Request } from 'express';
import type { Server } from 'http';
import type { FileResolver, MetadataResolver } from '../media/index.js';
import type { ChannelSettings } from '../config/channel.js';
import { buildFeed } from './rss-feed.js';
import { buildListing } from './listing.js';
import { loadImageCatalog } from './image-resolver.js';
import { errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface ServerDeps {
  fileResolver: Pick<FileResolver, 'listAudioFiles' | 'resolveAudioFile'>;
  metadataResolver: Pick<MetadataResolver, 'resolveAll'>;
  imagesDir: string;
  settings: ChannelSettings;
}

const RSS_CONTENT_TYPE = 'application/rss+xml; charset=utf-8';
const RSS_ACCEPT_TYPES = ['application/rss+xml', 'application/xml'];

// ?format=rss か Accept ヘッダーでRSSを要求しているか
export function wantsRss(req: Pick<Request, 'query' | 'headers'>): boolean {
  const format = req.query.format;
  if (typeof format === 'string' && format.trim().toLowerCase() === 'rss') {
    return true;
  }
  const accept = req.headers.accept?.toLowerCase() ?? '';
  return RSS_ACCEPT_TYPES.some((type) => accept.includes(type));
}

export function createServer(deps: ServerDeps): Express {
  const app = express();
  const logger = getLogger();

  // エピソード画像の配信
  app.use(deps.settings.imageBasePath, express.static(deps.imagesDir));

  // ヘルスチェックエンドポイント
  app.get('/health', (_req, res) => {
    res.status(200).send('OK');
  });

  // 一覧（JSON）またはRSSフィード。毎回ディレクトリを読み直す
  app.get('/feed', async (req, res) => {
    try {
      const files = await deps.fileResolver.listAudioFiles();
      const episodes = await deps.metadataResolver.resolveAll(files);

      if (wantsRss(req)) {
        const images = await loadImageCatalog(deps.imagesDir);
        const feedXml = buildFeed(episodes, deps.settings, images);
        res.header('Content-Type', RSS_CONTENT_TYPE);
        res.send(feedXml);
        logger.debug({ count: episodes.length }, 'RSSフィードへのアクセス');
        return;
      }

      res.json(buildListing(episodes, deps.settings));
      logger.debug({ count: episodes.length }, 'エピソード一覧へのアクセス');
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'フィード生成エラー');
      res.status(500).send('フィード生成エラー');
    }
  });

  // 音声ファイルの配信
  app.get('/file/:filename', async (req, res) => {
    try {
      const filePath = await deps.fileResolver.resolveAudioFile(req.params.filename);
      if (!filePath) {
        res.status(404).send('Not Found');
        return;
      }
      res.sendFile(filePath, { headers: { 'Content-Type': 'audio/mpeg' } }, (error) => {
        if (error) {
          logger.warn({ filePath, error: errorMessage(error) }, '音声ファイルの送信に失敗しました');
          if (!res.headersSent) {
            res.status(500).end();
          }
        }
      });
    } catch (error) {
      logger.error({ error: errorMessage(error) }, '音声ファイルの解決エラー');
      res.status(500).send('音声ファイルの取得エラー');
    }
  });

  return app;
}

export function startServer(app: Express, port: number): Promise<Server> {
  const logger = getLogger();

  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info({ port }, `サーバーが起動しました: http://localhost:${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
