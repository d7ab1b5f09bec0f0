/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export {
  type JobRepositoryPort,
  type JobStats,
  type JobPage,
  type PaginateQuery,
} from './job-repository.port';
export { type CatalogSourcePort, type CatalogItemInfo } from './catalog-source.port';
export { type CatalogActionsPort } from './catalog-actions.port';
export { type DownloaderPort, type DownloadRequest, type DownloadResult } from './downloader.port';
export { type JobPoolPort, type JobPoolStats, type PoolTaskOptions } from './job-pool.port';
export { type EventPublisherPort } from './event-publisher.port';
export {
  JOB_REPOSITORY_PORT,
  CATALOG_SOURCE_PORT,
  CATALOG_ACTIONS_PORT,
  DOWNLOADER_PORT,
  EVENT_PUBLISHER_PORT,
  JOB_POOL_PORT,
} from './injection-tokens';
