import rateLimit from 'express-rate-limit';

// Global limiter — applied to all routes.
// Broad safety net: 100 requests per minute per IP.
export const globalLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 100,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Too many requests, please try again later.' },
});

// Slack webhook limiter for button presses and message events.
// Slack sends bursts during active review — allow 30 per minute.
export const slackWebhookLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 30,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Slack webhook rate limit exceeded.' },
});

// Manual "generate now" commands.
// Every accepted trigger costs an LLM and an image call — cap at 5 per minute.
export const manualTriggerLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 5,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Generation trigger rate limit exceeded. Please wait before trying again.' },
});
