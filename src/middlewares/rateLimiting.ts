/**
 * Rate Limiting Middleware
 * Prevents API abuse by limiting request rates.
 */

import rateLimit from "express-rate-limit";

/**
 * General API rate limiter.
 * Limits: 600 requests per 15 minutes per IP (the UI polls task status).
 */
export const apiLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  limit: 600,
  message: { error: "Too many requests from this IP, please try again later." },
  standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
  legacyHeaders: false, // Disable `X-RateLimit-*` headers
});

/**
 * Strict rate limiter for operations that start work.
 * Limits: 60 requests per 15 minutes per IP.
 * Use for: Submitting downloads.
 */
export const strictLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  limit: 60,
  message: { error: "Too many download requests, please slow down." },
  standardHeaders: true,
  legacyHeaders: false,
});
