import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { spawn } from 'child_process';
import { createInterface } from 'readline';
import { Readable } from 'stream';
import {
  DownloadRequest,
  DownloadResult,
  DownloaderPort,
} from '../../../application/ports/output/downloader.port';
import { AppConfig } from '../../../config/configuration';

export const SPAWN_PROCESS = 'SpawnProcess';

/**
 * The subset of ChildProcess the adapter relies on.
 */
export interface DownloadProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'error', listener: (error: Error) => void): this;
}

export type SpawnProcess = (command: string, args: readonly string[]) => DownloadProcess;

const spawnWithPipes: SpawnProcess = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

const SIGKILL_DELAY_MS = 5000;
const STDERR_TAIL_LINES = 5;

/**
 * Yutto Downloader Adapter
 * Runs one `yutto` process per download and maps its exit status
 */
@Injectable()
export class YuttoDownloaderAdapter implements DownloaderPort {
  private readonly logger = new Logger(YuttoDownloaderAdapter.name);
  private readonly bin: string;
  private readonly sessdata: string;
  private readonly videoBaseUrl: string;
  private readonly spawnProcess: SpawnProcess;

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    @Optional() @Inject(SPAWN_PROCESS) spawnProcess?: SpawnProcess,
  ) {
    this.bin = this.configService.get('downloader', { infer: true }).bin;
    const catalog = this.configService.get('catalog', { infer: true });
    this.sessdata = catalog.credentials.sessdata;
    this.videoBaseUrl = catalog.videoBaseUrl.replace(/\/+$/, '');
    this.spawnProcess = spawnProcess ?? spawnWithPipes;
  }

  buildArgs(request: Omit<DownloadRequest, 'signal'>): string[] {
    const args = [
      '-c',
      this.sessdata,
      '-d',
      request.destination,
      '--no-danmaku',
      '--no-subtitle',
      '--with-metadata',
      '--save-cover',
      '--no-color',
      '--no-progress',
    ];

    if (request.batch || request.selectedParts?.length) {
      args.push('--batch');
    }
    if (request.selectedParts?.length) {
      args.push('-p', request.selectedParts.join(','));
    }
    if (request.nameTemplate) {
      args.push('--subpath-template', request.nameTemplate);
    }

    args.push(`${this.videoBaseUrl}/${request.itemId}`);
    return args;
  }

  download(request: DownloadRequest): Promise<DownloadResult> {
    if (request.signal.aborted) {
      return Promise.reject(new Error(`Download of ${request.itemId} aborted before start`));
    }

    const startedAt = Date.now();
    const child = this.spawnProcess(this.bin, this.buildArgs(request));
    const stderrTail: string[] = [];
    let killTimer: NodeJS.Timeout | undefined;

    this.pipeLines(child.stdout, (line) => this.logger.debug(`[${request.itemId}] ${line}`));
    this.pipeLines(child.stderr, (line) => {
      stderrTail.push(line);
      if (stderrTail.length > STDERR_TAIL_LINES) stderrTail.shift();
    });

    const onAbort = () => {
      this.logger.warn(`Stopping download of ${request.itemId}`);
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), SIGKILL_DELAY_MS);
    };
    request.signal.addEventListener('abort', onAbort, { once: true });

    return new Promise<DownloadResult>((resolve, reject) => {
      child.once('error', (error) => {
        request.signal.removeEventListener('abort', onAbort);
        clearTimeout(killTimer);
        reject(new Error(`Failed to start ${this.bin}: ${error.message}`));
      });

      child.once('close', (code, signal) => {
        request.signal.removeEventListener('abort', onAbort);
        clearTimeout(killTimer);

        if (code === 0) {
          resolve({ durationMs: Date.now() - startedAt });
          return;
        }

        const reason = signal ? `was killed by ${signal}` : `exited with code ${code}`;
        const detail = stderrTail.length > 0 ? `: ${stderrTail.join(' | ')}` : '';
        reject(new Error(`${this.bin} ${reason}${detail}`));
      });
    });
  }

  private pipeLines(stream: Readable | null, onLine: (line: string) => void): void {
    if (!stream) return;
    const lines = createInterface({ input: stream });
    lines.on('line', (line) => {
      const trimmed = line.trim();
      if (trimmed) onLine(trimmed);
    });
  }
}
