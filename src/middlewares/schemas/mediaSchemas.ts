/**
 * Media Validation Schemas
 * Zod schemas for info and download requests.
 */

import { z } from "zod";

const url = z
  .string({ required_error: "URL is required" })
  .trim()
  .min(1, "URL is required");

export const infoSchema = z.object({ url });

export type InfoBody = z.infer<typeof infoSchema>;

/** Resolution arrives as a number or a numeric string from form posts. */
const resolution = z.coerce
  .number({ invalid_type_error: "Resolution is required for video downloads" })
  .int("Resolution must be a whole number of pixels")
  .positive("Resolution must be positive");

export const downloadSchema = z.discriminatedUnion("type", [
  z.object({ url, type: z.literal("video"), resolution }),
  z.object({ url, type: z.literal("audio") }),
]);

export type DownloadBody = z.infer<typeof downloadSchema>;
