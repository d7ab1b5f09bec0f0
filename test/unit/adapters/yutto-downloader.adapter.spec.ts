import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import {
  DownloadProcess,
  YuttoDownloaderAdapter,
} from '../../../src/infrastructure/adapters/downloader/yutto-downloader.adapter';
import { createTestConfig, createTestConfigService, delay } from '../helpers/mock-factories';

class FakeProcess extends EventEmitter implements DownloadProcess {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly signals: NodeJS.Signals[] = [];

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    return true;
  }

  async finish(code: number | null, signal: NodeJS.Signals | null = null, stderr: string[] = []) {
    for (const line of stderr) this.stderr.write(`${line}\n`);
    this.stdout.end();
    this.stderr.end();
    await delay(5);
    this.emit('close', code, signal);
  }
}

describe('YuttoDownloaderAdapter', () => {
  let adapter: YuttoDownloaderAdapter;
  let child: FakeProcess;
  let spawned: Array<{ command: string; args: readonly string[] }>;

  const request = (overrides: { signal?: AbortSignal; batch?: boolean } = {}) => ({
    itemId: 'BV1',
    destination: '/media/fav1',
    batch: false,
    signal: new AbortController().signal,
    ...overrides,
  });

  beforeEach(() => {
    spawned = [];
    child = new FakeProcess();
    const config = createTestConfig({ env: { DOWNLOADER_BIN: 'yutto-test' } });
    adapter = new YuttoDownloaderAdapter(createTestConfigService(config), (command, args) => {
      spawned.push({ command, args });
      return child;
    });
  });

  describe('buildArgs', () => {
    it('should build a single-part invocation', () => {
      expect(adapter.buildArgs({ itemId: 'BV1', destination: '/media/fav1', batch: false })).toEqual([
        '-c',
        'test-secret',
        '-d',
        '/media/fav1',
        '--no-danmaku',
        '--no-subtitle',
        '--with-metadata',
        '--save-cover',
        '--no-color',
        '--no-progress',
        'https://www.bilibili.com/video/BV1',
      ]);
    });

    it('should request selected parts in batch mode with a name template', () => {
      const args = adapter.buildArgs({
        itemId: 'BV1',
        destination: '/media',
        batch: false,
        selectedParts: [1, 3],
        nameTemplate: '{title}',
      });

      expect(args.slice(10)).toEqual([
        '--batch',
        '-p',
        '1,3',
        '--subpath-template',
        '{title}',
        'https://www.bilibili.com/video/BV1',
      ]);
    });

    it('should use batch mode for multi-part items', () => {
      expect(adapter.buildArgs({ itemId: 'BV1', destination: '/m', batch: true })).toContain('--batch');
    });
  });

  describe('download', () => {
    it('should resolve when the process exits cleanly', async () => {
      const result = adapter.download(request());
      await child.finish(0);

      await expect(result).resolves.toEqual({ durationMs: expect.any(Number) });
      expect(spawned[0].command).toBe('yutto-test');
    });

    it('should include the stderr tail in the failure', async () => {
      const result = adapter.download(request());
      await child.finish(1, null, ['1', '2', '3', '4', '5', '6']);

      await expect(result).rejects.toThrow('yutto-test exited with code 1: 2 | 3 | 4 | 5 | 6');
    });

    it('should report a spawn failure', async () => {
      const result = adapter.download(request());
      child.emit('error', new Error('ENOENT'));

      await expect(result).rejects.toThrow('Failed to start yutto-test: ENOENT');
    });

    it('should terminate the process on abort and escalate to SIGKILL', async () => {
      vi.useFakeTimers();
      try {
        const controller = new AbortController();
        const result = adapter.download(request({ signal: controller.signal }));
        const outcome = result.catch((error: unknown) => error);

        controller.abort();
        expect(child.signals).toEqual(['SIGTERM']);

        vi.advanceTimersByTime(5000);
        expect(child.signals).toEqual(['SIGTERM', 'SIGKILL']);

        child.emit('close', null, 'SIGKILL');
        const error = await outcome;
        expect(error).toBeInstanceOf(Error);
        expect(error).toHaveProperty('message', 'yutto-test was killed by SIGKILL');
      } finally {
        vi.useRealTimers();
      }
    });

    it('should not start when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(adapter.download(request({ signal: controller.signal }))).rejects.toThrow(
        'Download of BV1 aborted before start',
      );
      expect(spawned).toHaveLength(0);
    });
  });
});
