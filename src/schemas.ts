/**
 * Response shapes of the Lobstr API. Only the fields the client reads are
 * declared; everything else passes through untouched.
 */
import { z } from 'zod';

const id = z.union([z.string(), z.number()]).transform(String);

export const squidSchema = z
  .object({
    id,
    name: z.string().nullish(),
    crawler: z.string().nullish(),
    created_at: z.string().nullish(),
  })
  .passthrough();

export const squidListSchema = z.object({ data: z.array(squidSchema).default([]) }).passthrough();

export const createdSchema = z.object({ id }).passthrough();

export const accountSchema = z
  .object({
    id,
    username: z.string().nullish(),
    type: z.string().nullish(),
  })
  .passthrough();

export const accountListSchema = z.object({ data: z.array(accountSchema).default([]) }).passthrough();

export const runStatsSchema = z
  .object({
    status: z.string().nullish(),
    is_done: z.boolean().nullish(),
    percent_done: z.union([z.number(), z.string()]).nullish(),
  })
  .passthrough();

export const resultRecordSchema = z.record(z.unknown());

/** `/results` answers with either a bare array or a paged envelope */
export const resultPageSchema = z.union([
  z.array(resultRecordSchema),
  z
    .object({
      data: z.array(resultRecordSchema),
      total_results: z.number().nullish(),
    })
    .passthrough(),
]);

export const downloadSchema = z.object({ s3: z.string().nullish() }).passthrough();

export type SquidPayload = z.infer<typeof squidSchema>;
export type AccountPayload = z.infer<typeof accountSchema>;
export type RunStatsPayload = z.infer<typeof runStatsSchema>;
