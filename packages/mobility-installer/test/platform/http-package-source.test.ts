/**
 * @fileoverview Tests for HttpPackageSource
 */
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { HttpPackageSource, packageFileName } from '../../src/platform/http-package-source.js';
import { DownloadError } from '../../src/errors.js';

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

/** A Response as fetch returns it, with the post-redirect URL set */
function responseAt(url: string, body: string | null, init?: ResponseInit): Response {
  const response = new Response(body, init);
  Object.defineProperty(response, 'url', { value: url });
  return response;
}

const LATEST = 'https://downloads.example.com/mobility/latest';
const PACKAGE = 'https://cdn.example.com/releases/pc-mobility-print-client-1.2.exe';

describe('packageFileName', () => {
  it('should use the last path segment', () => {
    expect(packageFileName(PACKAGE)).toBe('pc-mobility-print-client-1.2.exe');
  });

  it('should decode escaped characters', () => {
    expect(packageFileName('https://cdn.example.com/Mobility%20Setup.msi')).toBe('Mobility Setup.msi');
  });

  it('should fall back when the URL has no file name', () => {
    expect(packageFileName('https://cdn.example.com/download/latest')).toBe('mobility-print-client-setup.exe');
    expect(packageFileName('not a url')).toBe('mobility-print-client-setup.exe');
  });
});

describe('HttpPackageSource', () => {
  let fetchMock: Mock<FetchFn>;
  let source: HttpPackageSource;

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>();
    vi.stubGlobal('fetch', fetchMock);
    source = new HttpPackageSource({ timeoutMs: 1000 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('resolveLatest', () => {
    it('should follow redirects with a HEAD request', async () => {
      fetchMock.mockResolvedValue(responseAt(PACKAGE, null, { status: 200 }));

      await expect(source.resolveLatest(LATEST)).resolves.toBe(PACKAGE);
      expect(fetchMock).toHaveBeenCalledWith(LATEST, expect.objectContaining({ method: 'HEAD', redirect: 'follow' }));
    });

    it('should keep the original URL when there was no redirect', async () => {
      fetchMock.mockResolvedValue(new Response(null, { status: 200 }));
      await expect(source.resolveLatest(LATEST)).resolves.toBe(LATEST);
    });

    it('should raise DownloadError on an error status', async () => {
      fetchMock.mockResolvedValue(responseAt(LATEST, null, { status: 404, statusText: 'Not Found' }));

      const error = await source.resolveLatest(LATEST).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DownloadError);
      expect(error).toMatchObject({ message: `Download of ${LATEST} failed: HTTP 404 Not Found`, url: LATEST });
    });

    it('should raise DownloadError when the request fails', async () => {
      const cause = new TypeError('fetch failed');
      fetchMock.mockRejectedValue(cause);

      const error = await source.resolveLatest(LATEST).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DownloadError);
      expect(error).toMatchObject({ message: `Download of ${LATEST} failed: fetch failed`, cause });
    });

    it('should name the timeout when the request times out', async () => {
      fetchMock.mockRejectedValue(new DOMException('The operation was aborted due to timeout', 'TimeoutError'));

      await expect(source.resolveLatest(LATEST)).rejects.toThrow(
        `Download of ${LATEST} failed: request timed out after 1000ms`
      );
    });

    it('should pass the caller signal through', async () => {
      const controller = new AbortController();
      fetchMock.mockResolvedValue(responseAt(PACKAGE, null, { status: 200 }));

      await source.resolveLatest(LATEST, controller.signal);
      controller.abort();

      const signal = fetchMock.mock.calls[0]?.[1]?.signal;
      expect(signal?.aborted).toBe(true);
    });
  });

  describe('download', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'paperkit-download-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should save the body under the package file name', async () => {
      fetchMock.mockResolvedValue(responseAt(PACKAGE, 'MZ-installer-bytes', { status: 200 }));

      const downloaded = await source.download(PACKAGE, dir);

      const expectedPath = path.join(dir, 'pc-mobility-print-client-1.2.exe');
      expect(downloaded).toEqual({ path: expectedPath, url: PACKAGE, bytes: 18 });
      await expect(fs.readFile(expectedPath, 'utf-8')).resolves.toBe('MZ-installer-bytes');
      expect(fetchMock).toHaveBeenCalledWith(PACKAGE, expect.objectContaining({ method: 'GET' }));
    });

    it('should not write anything on an error status', async () => {
      fetchMock.mockResolvedValue(responseAt(PACKAGE, 'denied', { status: 403, statusText: 'Forbidden' }));

      await expect(source.download(PACKAGE, dir)).rejects.toBeInstanceOf(DownloadError);
      await expect(fs.readdir(dir)).resolves.toEqual([]);
    });

    it('should raise DownloadError when the directory is not writable', async () => {
      fetchMock.mockResolvedValue(responseAt(PACKAGE, 'MZ', { status: 200 }));

      await expect(source.download(PACKAGE, path.join(dir, 'missing'))).rejects.toBeInstanceOf(DownloadError);
    });
  });
});
