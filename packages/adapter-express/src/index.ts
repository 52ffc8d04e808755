import type { Request, RequestHandler, Router } from 'express';
import express from 'express';

import type { RawBody, WebhookRouter } from '@taskhook/core-webhooks';

/**
 * Express request with rawBody captured.
 */
export interface RawBodyRequest extends Request {
  rawBody?: Buffer;
}

export interface RawBodyOptions {
  /** Largest accepted body. @default '1mb' */
  limit?: string | number;
}

/**
 * Capture the body as a Buffer whatever its content type. Signatures are
 * computed over these exact bytes, and payloads that are not JSON must still
 * reach the router so it can answer with its own 400.
 */
export function rawBodyMiddleware(options: RawBodyOptions = {}): RequestHandler {
  return express.raw({
    type: () => true,
    limit: options.limit ?? '1mb',
    verify: (req: RawBodyRequest, _res, buf) => {
      req.rawBody = buf;
    }
  });
}

function rawBodyOf(req: RawBodyRequest): RawBody {
  if (req.rawBody) {
    return req.rawBody;
  }
  return Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
}

export function createExpressWebhookHandler(router: WebhookRouter): RequestHandler<{ provider: string }> {
  return async (req, res, next) => {
    try {
      const result = await router.handle({
        provider: req.params.provider,
        headers: req.headers,
        rawBody: rawBodyOf(req)
      });

      for (const [key, value] of Object.entries(result.headers)) {
        res.setHeader(key, value);
      }

      res.status(result.status).json(result.body);
    } catch (error) {
      next(error);
    }
  };
}

/**
 * `POST /:provider` and `GET /health`, meant to be mounted under `/webhooks`.
 */
export function createWebhookRoutes(router: WebhookRouter, options: RawBodyOptions = {}): Router {
  const routes = express.Router();
  routes.get('/health', (_req, res) => {
    res.json(router.health());
  });
  routes.post('/:provider', rawBodyMiddleware(options), createExpressWebhookHandler(router));
  return routes;
}
