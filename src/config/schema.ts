import { z } from "zod";

export const ConnectionSectionSchema = z.object({
  url: z.string({ required_error: "has no \"url\" setting" }),
  history: z.string().optional(),
});

/** Top-level keys are section (connection) names. */
export const ConfigFileSchema = z.record(z.string(), ConnectionSectionSchema);
