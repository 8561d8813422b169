import { z } from "zod";
import type { ReferenceData } from "./news.ts";

/**
 * Envelope shared by every Currents API response
 */
export const envelopeSchema = z.object({
  status: z.string().optional(),
}).passthrough();

export const newsEnvelopeSchema = envelopeSchema.extend({
  news: z.array(z.unknown()).default([]),
});

export type ReferenceSchema<K extends keyof ReferenceData> = z.ZodType<
  ReferenceData[K],
  z.ZodTypeDef,
  unknown
>;

export const languagesSchema: ReferenceSchema<"languages"> = z.record(z.string()).default({});
export const regionsSchema: ReferenceSchema<"regions"> = z.record(z.string()).default({});
export const categoriesSchema: ReferenceSchema<"categories"> = z.array(z.string()).default([]);
