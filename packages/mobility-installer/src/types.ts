/**
 * @fileoverview Installer types
 */

import type { PaperkitLogger } from '@paperkit/core';

// =============================================================================
// States
// =============================================================================

export const INSTALL_STATES = [
  'NotInstalled',
  'AlreadyInstalled',
  'Installing',
  'InstalledNoQueues',
  'InstalledWithQueues',
] as const;

export type InstallState = (typeof INSTALL_STATES)[number];

// =============================================================================
// Local Machine
// =============================================================================

export type ServiceStatus = 'running' | 'stopped' | 'pending' | 'missing';

/**
 * What the installer needs from the operating system
 */
export interface Workstation {
  pathExists(path: string): Promise<boolean>;
  getServiceStatus(serviceName: string): Promise<ServiceStatus>;
  listPrinters(): Promise<string[]>;
  /** Run an installer package and resolve with its exit code; `signal` terminates it */
  runInstaller(file: string, args: string[], signal?: AbortSignal): Promise<number>;
  /** Hand a URI to its registered protocol handler */
  openUri(uri: string): Promise<void>;
  removeFile(path: string): Promise<void>;
}

export interface DownloadedPackage {
  path: string;
  url: string;
  bytes: number;
}

/**
 * Where installer packages come from
 */
export interface PackageSource {
  /** Follow redirects from a stable link to the current package location */
  resolveLatest(url: string, signal?: AbortSignal): Promise<string>;
  download(url: string, directory: string, signal?: AbortSignal): Promise<DownloadedPackage>;
}

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

// =============================================================================
// Configuration
// =============================================================================

export interface InstallerConfig {
  /** Opaque provisioning token passed to the client through the URI */
  token: string;
  packageUrl?: string;
  appPath: string;
  serviceName: string;
  printerMatch: string;
  uriTemplate: string;
  installerArgs: string[];
  pollIntervalMs: number;
  serviceTimeoutMs: number;
  queueTimeoutMs: number;
  /** Directory the package is downloaded into */
  downloadDir: string;
}

export interface InstallerDependencies {
  workstation: Workstation;
  packageSource: PackageSource;
  clock?: Clock;
  logger?: PaperkitLogger;
  onStateChange?: (state: InstallState) => void;
}

export interface InstallRunOptions {
  signal?: AbortSignal;
}

// =============================================================================
// Result
// =============================================================================

export interface InstallReport {
  state: 'InstalledWithQueues';
  /** Application and queues were present before the run */
  alreadyInstalled: boolean;
  /** A package was downloaded and installed during the run */
  installed: boolean;
  /** Matching print queue names */
  queues: string[];
  attempts: {
    service: number;
    queues: number;
  };
}
