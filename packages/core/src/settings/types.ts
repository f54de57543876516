/**
 * @fileoverview Settings types
 */

import type { z } from 'zod';
import type { paperkitSettingsSchema } from './schema.js';

export type PaperkitSettings = z.infer<typeof paperkitSettingsSchema>;

export type InstallerSettings = PaperkitSettings['installer'];

export type LoggingSettings = PaperkitSettings['logging'];

/**
 * Recursively optional version of a settings object, as found in a user file
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends readonly unknown[]
    ? T[P]
    : T[P] extends object
      ? DeepPartial<T[P]>
      : T[P];
};

export type UserSettings = DeepPartial<PaperkitSettings>;
