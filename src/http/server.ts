/**
 * Express application bootstrap.
 * Sets up HTTP server with routes and middleware.
 */

import express, { Application, NextFunction, Request, Response } from 'express';
import { config, validateConfig } from '../config/env';
import { loadVerifierConfigFromEnv } from '../config/verifierConfig';
import { createDefaultDependencies, VerifyDependencies } from '../services/emailVerificationService';
import { redisStore } from '../utils/redis';
import { logger } from '../utils/logger';
import { createRoutes } from './routes';

const log = logger.child('server');

/**
 * Create and configure Express application
 */
export function createApp(deps: VerifyDependencies): Application {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  // Request logging middleware
  app.use((req, _res, next) => {
    log.debug(`${req.method} ${req.path}`, { ip: req.ip });
    next();
  });

  app.use('/', createRoutes(deps));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Not Found',
      message: 'The requested endpoint does not exist',
    });
  });

  // Error handler; malformed JSON bodies arrive here from express.json()
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ success: false, error: 'Invalid request', message: 'Body is not valid JSON' });
      return;
    }

    log.error('Unhandled error in request', err);
    res.status(500).json({
      success: false,
      error: 'Internal Server Error',
      message: config.nodeEnv === 'development' ? err.message : 'An error occurred',
    });
  });

  return app;
}

/**
 * Start the HTTP server. Configuration is validated and the verifier
 * configuration (with its shared proxy rotator) is built once here.
 */
export function startServer(): void {
  try {
    validateConfig();
    const verifierConfig = loadVerifierConfigFromEnv();
    log.info('Configuration validated successfully');

    if (config.redis.enabled) {
      // Opens the connection; the MX cache falls back to memory until it is ready
      redisStore.open();
    }

    const app = createApp(createDefaultDependencies(verifierConfig));

    app.listen(config.port, () => {
      log.info('mailprobe verification service started', {
        port: config.port,
        env: config.nodeEnv,
        helloName: config.smtp.helloName,
        proxies: verifierConfig.proxies.size,
      });
      log.info(`Health check available at: http://localhost:${config.port}/health`);
    });
  } catch (error) {
    log.error('Failed to start server', error);
    process.exit(1);
  }
}

// Start server if this file is executed directly
if (require.main === module) {
  startServer();
}
