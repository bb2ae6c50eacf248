import type { ContentStore } from './content-store.js';
import type { PostThumbsConfig } from './config.js';
import { HttpContentStore } from './http-content-store.js';
import { MemoryContentStore } from './memory-content-store.js';
import { logger } from './logger.js';

/**
 * Pick the content store for a configuration: the content API, or the
 * in-memory store in mock mode.
 */
export function createContentStore(config: PostThumbsConfig): ContentStore {
  if (config.useMock) {
    logger.verbose(`[STORE] Using mock mode${config.mockDataPath ? ` with data from ${config.mockDataPath}` : ''}`);
    return config.mockDataPath
      ? MemoryContentStore.loadMockData(config.mockDataPath)
      : new MemoryContentStore();
  }

  logger.verbose(`[STORE] Using content API: ${config.url}`);
  return new HttpContentStore({ url: config.url, apiKey: config.apiKey });
}
