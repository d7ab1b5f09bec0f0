// Injection tokens for the output ports (string tokens, bound in InfrastructureModule)
export const JOB_REPOSITORY_PORT = 'JobRepositoryPort';
export const CATALOG_SOURCE_PORT = 'CatalogSourcePort';
export const CATALOG_ACTIONS_PORT = 'CatalogActionsPort';
export const DOWNLOADER_PORT = 'DownloaderPort';
export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';
export const JOB_POOL_PORT = 'JobPoolPort';
