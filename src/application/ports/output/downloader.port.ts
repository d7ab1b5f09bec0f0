export interface DownloadRequest {
  itemId: string;
  destination: string;
  /** Download every part of a multi-part item */
  batch: boolean;
  selectedParts?: readonly number[];
  nameTemplate?: string;
  signal: AbortSignal;
}

export interface DownloadResult {
  durationMs: number;
}

/**
 * Downloader Port (Driven Port)
 * Media download step; must stop promptly when the signal aborts
 */
export interface DownloaderPort {
  download(request: DownloadRequest): Promise<DownloadResult>;
}
