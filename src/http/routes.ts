/**
 * HTTP API routes for the verification service.
 * Thin adapter: bodies are checked with zod, then handed to the core.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import {
  DEFAULT_BATCH_CONCURRENCY,
  verifyEmail,
  verifyEmailBatch,
  VerifyDependencies,
} from '../services/emailVerificationService';
import { hashEmailForLogging, logger } from '../utils/logger';
import { metrics } from '../utils/metrics';
import { redisStore } from '../utils/redis';
import { config } from '../config/env';

const log = logger.child('http');

/**
 * Maximum number of emails allowed in one batch request
 */
export const MAX_BATCH_SIZE = 100;

const checkEmailBody = z.object({
  to_email: z.string().trim().min(1, 'Field "to_email" must not be empty'),
});

const batchBody = z.object({
  emails: z
    .array(z.string().trim().min(1, 'Items in "emails" must not be empty'))
    .min(1, 'Field "emails" cannot be empty')
    .max(MAX_BATCH_SIZE, `Maximum ${MAX_BATCH_SIZE} emails allowed per batch`),
});

function badRequest(res: Response, error: z.ZodError): Response {
  const message = error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return res.status(400).json({ success: false, error: 'Invalid request', message });
}

export function createRoutes(deps: VerifyDependencies): Router {
  const router = Router();

  /**
   * Health check endpoint
   * GET /health
   */
  router.get('/health', (_req: Request, res: Response) => {
    const redis = redisStore.status();
    const redisConnected = redis.ready;

    // Healthy while Redis is disabled, or enabled and connected
    const isHealthy = !config.redis.enabled || redisConnected;

    res.status(isHealthy ? 200 : 503).json({
      status: isHealthy ? 'ok' : 'degraded',
      service: 'mailprobe',
      timestamp: new Date().toISOString(),
      proxies: {
        poolSize: deps.config.proxies.size,
        rotation: deps.config.rotation.enabled ? deps.config.rotation.strategy : 'disabled',
      },
      redis: {
        enabled: config.redis.enabled,
        connected: redisConnected,
        error: redis.lastError,
        mode: redisConnected ? 'distributed' : 'in-memory-fallback',
      },
    });
  });

  /**
   * Basic metrics endpoint
   * GET /metrics/basic
   */
  router.get('/metrics/basic', (_req: Request, res: Response) => {
    res.json({
      ...metrics.getMetrics(),
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * Verify a single address
   * POST /v0/check_email  { "to_email": "someone@example.com" }
   */
  router.post('/v0/check_email', async (req: Request, res: Response) => {
    const startTime = Date.now();
    const parsed = checkEmailBody.safeParse(req.body);
    if (!parsed.success) {
      log.warn('POST /v0/check_email - Invalid request body');
      return badRequest(res, parsed.error);
    }

    const email = parsed.data.to_email;
    const emailHash = hashEmailForLogging(email);

    try {
      const result = await verifyEmail(email, deps);
      log.info(`POST /v0/check_email - Completed in ${Date.now() - startTime}ms`, {
        emailHash,
        verdict: result.verdict,
      });
      return res.json(result);
    } catch (error) {
      log.error(`POST /v0/check_email - Error after ${Date.now() - startTime}ms`, error);
      return res.status(500).json({
        success: false,
        error: 'Internal server error',
        message: 'An error occurred while verifying the email address',
      });
    }
  });

  /**
   * Verify up to MAX_BATCH_SIZE addresses
   * POST /v0/check_email/batch  { "emails": ["a@example.com", "b@example.com"] }
   */
  router.post('/v0/check_email/batch', async (req: Request, res: Response) => {
    const startTime = Date.now();
    const parsed = batchBody.safeParse(req.body);
    if (!parsed.success) {
      log.warn('POST /v0/check_email/batch - Invalid request body');
      return badRequest(res, parsed.error);
    }

    const { emails } = parsed.data;

    try {
      const results = await verifyEmailBatch(emails, deps, DEFAULT_BATCH_CONCURRENCY);
      const duration = Date.now() - startTime;
      log.info(`POST /v0/check_email/batch - Completed ${results.length} emails in ${duration}ms`, {
        count: results.length,
        avgTimePerEmail: Math.round(duration / results.length),
      });
      return res.json({ success: true, results });
    } catch (error) {
      log.error(`POST /v0/check_email/batch - Error after ${Date.now() - startTime}ms`, error);
      return res.status(500).json({
        success: false,
        error: 'Internal server error',
        message: 'An error occurred while verifying the email addresses',
      });
    }
  });

  return router;
}
