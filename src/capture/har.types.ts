/**
 * HAR (HTTP Archive) shapes read by the capture parser.
 * Only the fields used are modelled; anything else in the file is ignored.
 */

import { z } from 'zod';

const nameValue = z.object({ name: z.string(), value: z.string() }).passthrough();

export const harPostDataSchema = z
  .object({
    mimeType: z.string().optional(),
    text: z.string().optional(),
    encoding: z.string().optional(),
    params: z
      .array(z.object({ name: z.string(), value: z.string().optional() }).passthrough())
      .optional(),
  })
  .passthrough();

export const harContentSchema = z
  .object({
    mimeType: z.string().optional(),
    text: z.string().optional(),
    encoding: z.string().optional(),
    size: z.number().optional(),
  })
  .passthrough();

export const harEntrySchema = z
  .object({
    startedDateTime: z.string().optional(),
    time: z.number().optional(),
    request: z
      .object({
        method: z.string().min(1),
        url: z.string().min(1),
        headers: z.array(nameValue).default([]),
        queryString: z.array(nameValue).optional(),
        postData: harPostDataSchema.optional(),
      })
      .passthrough(),
    response: z
      .object({
        status: z.number().int(),
        headers: z.array(nameValue).default([]),
        content: harContentSchema.optional(),
      })
      .passthrough(),
  })
  .passthrough();

/** Container level: anything with a log.entries array */
export const harContainerSchema = z
  .object({
    log: z
      .object({
        version: z.string().optional(),
        entries: z.array(z.unknown()),
      })
      .passthrough(),
  })
  .passthrough();

export type HarEntry = z.output<typeof harEntrySchema>;
export type HarPostData = z.output<typeof harPostDataSchema>;
export type HarContent = z.output<typeof harContentSchema>;
export type HarHeader = z.output<typeof nameValue>;
