import { Injectable } from '@nestjs/common';
import {
  HealthIndicator,
  HealthIndicatorResult,
  HealthCheckError,
} from '@nestjs/terminus';
import { statfs } from 'fs/promises';

/**
 * Free space on the volume downloads are written to (relative destinations
 * resolve against the working directory).
 */
@Injectable()
export class DiskSpaceHealthIndicator extends HealthIndicator {
  private readonly minFreeSpacePercent = 10;

  constructor() {
    super();
  }

  async isHealthy(key: string, path: string = process.cwd()): Promise<HealthIndicatorResult> {
    let details: Record<string, number | string>;
    let freePercent: number;

    try {
      const stats = await statfs(path);
      const total = stats.blocks * stats.bsize;
      const free = stats.bavail * stats.bsize;
      freePercent = total > 0 ? (free / total) * 100 : 100;
      details = {
        path,
        totalBytes: total,
        usedBytes: total - stats.bfree * stats.bsize,
        freeBytes: free,
        freePercent: Number(freePercent.toFixed(1)),
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new HealthCheckError(
        'Disk space check failed',
        this.getStatus(key, false, { error: reason }),
      );
    }

    if (freePercent >= this.minFreeSpacePercent) {
      return this.getStatus(key, true, details);
    }

    throw new HealthCheckError(
      `Low disk space: ${freePercent.toFixed(1)}% free`,
      this.getStatus(key, false, details),
    );
  }
}
