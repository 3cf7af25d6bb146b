export {
  buildFeed,
  buildFileUrl,
  buildImageUrl,
  buildStableGuid,
  sortEpisodes,
  stripEmptyItunesElements,
  RSSFeedBuilder,
  CustomElements,
} from './rss-feed.js';
export { buildListing, type ListingItem } from './listing.js';
export { ImageCatalog, loadImageCatalog, type ImageResolver } from './image-resolver.js';
export { createServer, startServer, type ServerDeps } from './server.js';
