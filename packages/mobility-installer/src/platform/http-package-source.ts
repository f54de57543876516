/**
 * @fileoverview HTTP package source
 *
 * Resolves a stable download link to the package it currently redirects
 * to, and downloads packages into a directory.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { createLogger, errorMessage, type PaperkitLogger } from '@paperkit/core';
import { DownloadError } from '../errors.js';
import type { DownloadedPackage, PackageSource } from '../types.js';

const FALLBACK_FILE_NAME = 'mobility-print-client-setup.exe';

export interface HttpPackageSourceOptions {
  /** Timeout for each request, including reading the body */
  timeoutMs?: number;
  logger?: PaperkitLogger;
}

/**
 * Name to save a package under: the last path segment of its URL, when it
 * looks like a file name.
 */
export function packageFileName(url: string): string {
  let segment: string;
  try {
    segment = decodeURIComponent(path.posix.basename(new URL(url).pathname));
  } catch {
    return FALLBACK_FILE_NAME;
  }
  return /^[\w.() -]+\.[A-Za-z0-9]+$/.test(segment) ? segment : FALLBACK_FILE_NAME;
}

export class HttpPackageSource implements PackageSource {
  private readonly timeoutMs: number;
  private readonly logger: PaperkitLogger;

  constructor(options: HttpPackageSourceOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5 * 60_000;
    this.logger = options.logger ?? createLogger('package-source');
  }

  async resolveLatest(url: string, signal?: AbortSignal): Promise<string> {
    const response = await this.request(url, 'HEAD', signal);
    // response.url is the final location after redirects
    return response.url || url;
  }

  async download(url: string, directory: string, signal?: AbortSignal): Promise<DownloadedPackage> {
    const response = await this.request(url, 'GET', signal);
    const finalUrl = response.url || url;

    let body: Buffer;
    try {
      body = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw new DownloadError(url, `could not read response body: ${errorMessage(error)}`, { cause: error });
    }

    const target = path.join(directory, packageFileName(finalUrl));
    try {
      await fs.writeFile(target, body);
    } catch (error) {
      throw new DownloadError(url, `could not write ${target}: ${errorMessage(error)}`, { cause: error });
    }

    return { path: target, url: finalUrl, bytes: body.length };
  }

  private async request(url: string, method: 'HEAD' | 'GET', signal?: AbortSignal): Promise<Response> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    this.logger.debug('HTTP request starting', { url, method, timeoutMs: this.timeoutMs });

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        redirect: 'follow',
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new DownloadError(url, `request timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      throw new DownloadError(url, errorMessage(error), { cause: error });
    }

    this.logger.debug('HTTP response received', { url, method, status: response.status, finalUrl: response.url });
    if (!response.ok) {
      throw new DownloadError(url, `HTTP ${response.status} ${response.statusText}`.trim());
    }
    return response;
  }
}
