/**
 * @fileoverview Default Settings
 *
 * Fallback values for every setting a user file or the environment leaves out.
 */

import type { PaperkitSettings } from './types.js';

const MINUTE_MS = 60_000;

/**
 * Complete default settings
 */
export const DEFAULT_SETTINGS: PaperkitSettings = {
  version: '0.1.0',
  logging: {
    level: 'info',
  },
  installer: {
    appPath: 'C:\\Program Files (x86)\\PaperCut Mobility Print Client\\PCMobilityPrintClient.exe',
    serviceName: 'PCMobilityPrintClient',
    printerMatch: 'Mobility',
    uriTemplate: 'mobilityprint://connect?token={token}',
    installerArgs: ['/VERYSILENT', '/SUPPRESSMSGBOXES', '/NORESTART'],
    pollIntervalMs: 5_000,
    serviceTimeoutMs: 10 * MINUTE_MS,
    queueTimeoutMs: 10 * MINUTE_MS,
    downloadTimeoutMs: 5 * MINUTE_MS,
  },
};
