/**
 * Download Validation Schemas
 * Zod schemas for download submissions and video lookups.
 */

import { z } from "zod";

const videoUrl = z
  .string()
  .trim()
  .url("Provide a valid video URL")
  .regex(/^https?:\/\//i, "URL must use http or https");

/**
 * Schema for submitting a download.
 * At most one credential source per request.
 */
export const submitDownloadSchema = z
  .object({
    url: videoUrl,
    outputPath: z.string().trim().min(1, "outputPath cannot be empty").max(1024).optional(),
    format: z.string().trim().min(1, "format cannot be empty").max(512).optional(),
    cookies: z.string().min(1, "cookies cannot be empty").optional(),
    cookieFile: z.string().trim().min(1, "cookieFile cannot be empty").optional(),
    cookiesFromBrowser: z.string().trim().min(1, "cookiesFromBrowser cannot be empty").max(255).optional(),
  })
  .refine(
    (body) => [body.cookies, body.cookieFile, body.cookiesFromBrowser].filter((value) => value !== undefined).length <= 1,
    { message: "Provide at most one of cookies, cookieFile or cookiesFromBrowser", path: ["cookies"] }
  );

export type SubmitDownloadBody = z.infer<typeof submitDownloadSchema>;

/**
 * Schema for ?url= lookups (info, formats).
 */
export const videoQuerySchema = z.object({
  url: videoUrl,
});
