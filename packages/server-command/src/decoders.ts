/**
 * @fileoverview Result decoders
 *
 * Each remote method declares the shape of its result. Decoders check the
 * decoded XML-RPC value against a zod schema and hand it back unchanged;
 * they never coerce.
 */

import { z } from 'zod';
import { InvalidResponseError } from './errors.js';
import type { XmlRpcStruct, XmlRpcValue } from './types.js';

export type ResultDecoder<T> = (method: string, value: unknown) => T;

// =============================================================================
// Schemas
// =============================================================================

export const xmlRpcValueSchema: z.ZodType<XmlRpcValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.date(),
    z.instanceof(Buffer),
    z.array(xmlRpcValueSchema),
    z.record(xmlRpcValueSchema),
  ])
);

export const xmlRpcStructSchema: z.ZodType<XmlRpcStruct> = z.record(xmlRpcValueSchema);

export const taskStatusSchema = z
  .object({
    completed: z.boolean(),
    message: z.string(),
  })
  .passthrough();

export type TaskStatus = z.infer<typeof taskStatusSchema>;

// =============================================================================
// Decoders
// =============================================================================

export function decoderFor<T>(schema: z.ZodType<T>): ResultDecoder<T> {
  return (method, value) => {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new InvalidResponseError(
        method,
        result.error.errors.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
        )
      );
    }
    return result.data;
  };
}

/** Void operations: whatever the server sends back is discarded */
const none: ResultDecoder<void> = () => undefined;

export const decode = {
  none,
  string: decoderFor(z.string()),
  boolean: decoderFor(z.boolean()),
  number: decoderFor(z.number()),
  stringList: decoderFor(z.array(z.string())),
  struct: decoderFor(xmlRpcStructSchema),
  value: decoderFor(xmlRpcValueSchema),
  taskStatus: decoderFor(taskStatusSchema),
};
