/**
 * @fileoverview Installer configuration
 *
 * Turns loaded settings plus command-line overrides into the explicit
 * configuration a MobilityInstaller runs with.
 */

import * as os from 'os';
import { z } from 'zod';
import { ConfigError, type InstallerSettings } from '@paperkit/core';
import type { InstallerConfig } from './types.js';

export interface InstallerOverrides {
  packageUrl?: string;
  appPath?: string;
}

const packageUrlSchema = z.string().url();

export function buildInstallerConfig(
  token: string,
  settings: InstallerSettings,
  overrides: InstallerOverrides = {},
  downloadDir: string = os.tmpdir()
): InstallerConfig {
  const issues: string[] = [];

  if (token.trim() === '') {
    issues.push('token: must not be empty');
  }
  if (overrides.packageUrl !== undefined && !packageUrlSchema.safeParse(overrides.packageUrl).success) {
    issues.push(`package-url: not a valid URL: ${overrides.packageUrl}`);
  }
  if (overrides.appPath !== undefined && overrides.appPath.trim() === '') {
    issues.push('app-path: must not be empty');
  }
  if (issues.length > 0) {
    throw new ConfigError('Invalid installer options', issues);
  }

  return {
    token,
    packageUrl: overrides.packageUrl ?? settings.packageUrl,
    appPath: overrides.appPath ?? settings.appPath,
    serviceName: settings.serviceName,
    printerMatch: settings.printerMatch,
    uriTemplate: settings.uriTemplate,
    installerArgs: [...settings.installerArgs],
    pollIntervalMs: settings.pollIntervalMs,
    serviceTimeoutMs: settings.serviceTimeoutMs,
    queueTimeoutMs: settings.queueTimeoutMs,
    downloadDir,
  };
}
