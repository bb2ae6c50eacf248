// post-thumbs - assign featured images to content records from their attached images
//
// Programmatic use:
//
//   const store = new HttpContentStore({ url, apiKey });
//   const command = new ThumbnailCommand(store);
//   await command.set({ postType: 'post', amount: 100 });
//   await command.show('unset');
//   await command.cleanup();
//
// Any ContentStore implementation works; MemoryContentStore keeps everything in process.
export * from './lib/content-store.js';
export * from './lib/config.js';
export * from './lib/errors.js';
export { HttpContentStore, type HttpContentStoreOptions } from './lib/http-content-store.js';
export { MemoryContentStore, parseSeed, type MemoryRecord, type MemorySeed } from './lib/memory-content-store.js';
export { createContentStore } from './lib/store-factory.js';
export * from './scripts/thumbnail-command.js';
export { runCli, type CliDependencies } from './cli/run.js';
