/**
 * @fileoverview Settings schema
 *
 * Zod schema the merged settings (defaults, user file, environment) must satisfy.
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../logging/index.js';

const logLevelSchema = z.enum(LOG_LEVELS);

const durationSchema = z.number().int().positive();

export const installerSettingsSchema = z.object({
  /** Stable link that redirects to the newest client package */
  packageUrl: z.string().url().optional(),
  /** Client executable whose presence means the application is installed */
  appPath: z.string().min(1),
  /** Windows service the client registers */
  serviceName: z.string().min(1),
  /** Substring identifying the client's print queues */
  printerMatch: z.string().min(1),
  /** Provisioning URI; `{token}` is replaced with the URI-encoded token */
  uriTemplate: z.string().includes('{token}'),
  /** Arguments for an unattended install */
  installerArgs: z.array(z.string()),
  pollIntervalMs: durationSchema,
  serviceTimeoutMs: durationSchema,
  queueTimeoutMs: durationSchema,
  downloadTimeoutMs: durationSchema,
});

export const paperkitSettingsSchema = z.object({
  version: z.string(),
  logging: z.object({
    level: logLevelSchema,
  }),
  installer: installerSettingsSchema,
});
