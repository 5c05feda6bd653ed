import { z } from "zod";

export const extractorOptionsSchema = z
  .object({
    separator: z.string().nullable().default("\n"),
    ignoreNotFound: z.boolean().default(true),
  })
  .strict();

export const selectorMapSchema = z.record(z.string(), z.string());

export const extractionJobSchema = z
  .object({
    options: extractorOptionsSchema.optional(),
    selectors: selectorMapSchema.refine(
      (selectors) => Object.keys(selectors).length > 0,
      { message: "at least one selector is required" },
    ),
  })
  .strict();

export type ExtractorOptions = z.infer<typeof extractorOptionsSchema>;
export type ExtractorOptionsInput = z.input<typeof extractorOptionsSchema>;
export type ExtractionJob = z.infer<typeof extractionJobSchema>;
