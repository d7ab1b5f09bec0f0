/**
 * In-Memory Adapters for tests
 * Implement the output ports without external dependencies
 */
export { InMemoryJobRepositoryAdapter } from './in-memory-job-repository.adapter';
export { InMemoryEventPublisherAdapter } from './in-memory-event-publisher.adapter';
export { InMemoryCatalogAdapter, type RecordedCatalogAction } from './in-memory-catalog.adapter';
export { InMemoryDownloaderAdapter, type DownloaderBehavior } from './in-memory-downloader.adapter';
export { InMemoryJobPoolAdapter } from './in-memory-job-pool.adapter';
