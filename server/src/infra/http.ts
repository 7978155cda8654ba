/**
 * HTTP layer in front of the product orchestrator.
 *
 * Every route parses its input with a zod schema, calls the orchestrator and
 * answers with the envelope `{ ok: boolean, data?, error? }`. Catalog errors
 * come back as values and are mapped to a status code here; schema failures
 * and malformed JSON reach the error middleware at the bottom.
 */
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import http from 'http';
import { ZodError } from 'zod';

import type { ProductOrchestrator } from '../app/orchestrator/index.js';
import { map } from '../app/orchestrator/index.js';
import {
  OptionParamsSchema,
  OptionRequestSchema,
  ProductAddSchema,
  ProductListQuerySchema,
  ProductParamsSchema,
  ProductUpdateSchema,
} from '../app/schemas.js';
import type { CatalogErrorKind, Result } from '../domain/errors.js';
import { toProductSummaryWithCategory } from '../domain/product.js';
import { logger } from '../logger.js';

const ERROR_STATUS: Record<CatalogErrorKind, number> = {
  NotFound: 404,
  AlreadyExists: 409,
  EmptyOptions: 400,
  InvalidSortDirection: 400,
  InvalidSortField: 400,
  CategoryNotFound: 404,
  OptionNotFound: 404,
  OptionAlreadyExists: 409,
};

/** The 4xx status an error carries as `status` or `statusCode`, if any. */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status !== 'number' || !Number.isInteger(status)) return null;
  return status >= 400 && status < 500 ? status : null;
}

/** Write a result; a successful `undefined` becomes 204. */
function reply<T>(res: Response, result: Result<T>, status = 200) {
  if (!result.ok) {
    res.status(ERROR_STATUS[result.error.kind]).json({ ok: false, error: result.error.code });
    return;
  }
  if (result.data === undefined) {
    res.status(204).end();
    return;
  }
  res.status(status).json({ ok: true, data: result.data });
}

/**
 * Build and return both the Express app and its underlying Node HTTP server.
 */
export function createHttpApp(orch: ProductOrchestrator) {
  const app = express();
  app.use(cors());
  app.use(express.json());

  // Simple endpoint used by clients/tests to verify the server is reachable.
  app.get('/healthz', (_req, res) => res.json({ ok: true }));

  // Connectivity probe used by automation scripts to detect the deployed version.
  app.get('/connectivity', (_req, res) => {
    res.json({
      ok: true,
      service: 'gift_catalog_server',
      version: process.env['npm_package_version'] ?? 'dev',
    });
  });

  app.get('/api/categories', (_req, res) => {
    res.json({ ok: true, data: orch.listCategories() });
  });

  app.get('/api/products', (req, res) => {
    const { sort, categoryId } = ProductListQuerySchema.parse(req.query);
    reply(res, orch.getAllProducts(sort, categoryId ?? null));
  });

  app.get('/api/products/:id', (req, res) => {
    const { id } = ProductParamsSchema.parse(req.params);
    reply(res, map(orch.getProductById(id), toProductSummaryWithCategory));
  });

  app.post('/api/products', (req, res) => {
    const body = ProductAddSchema.parse(req.body);
    reply(res, orch.addProduct(body), 201);
  });

  app.put('/api/products/:id', (req, res) => {
    const { id } = ProductParamsSchema.parse(req.params);
    const body = ProductUpdateSchema.parse(req.body);
    reply(res, orch.updateProductById(id, body));
  });

  app.delete('/api/products/:id', (req, res) => {
    const { id } = ProductParamsSchema.parse(req.params);
    reply(res, orch.deleteProduct(id));
  });

  app.get('/api/products/:id/options', (req, res) => {
    const { id } = ProductParamsSchema.parse(req.params);
    reply(res, orch.getOptionsByProductId(id));
  });

  app.post('/api/products/:id/options', (req, res) => {
    const { id } = ProductParamsSchema.parse(req.params);
    const body = OptionRequestSchema.parse(req.body);
    reply(res, orch.addProductOption(id, body), 201);
  });

  app.put('/api/products/:id/options/:optionId', (req, res) => {
    const { id, optionId } = OptionParamsSchema.parse(req.params);
    const body = OptionRequestSchema.parse(req.body);
    reply(res, orch.updateProductOptionById(id, optionId, body));
  });

  app.delete('/api/products/:id/options/:optionId', (req, res) => {
    const { id, optionId } = OptionParamsSchema.parse(req.params);
    reply(res, orch.deleteProductOption(id, optionId));
  });

  // Express recognises error middleware by its four parameters.
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      res.status(400).json({ ok: false, error: 'invalid_payload', issues: err.issues });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ ok: false, error: 'invalid_payload' });
      return;
    }
    // Body parser refusals carry their own 4xx status.
    const status = clientErrorStatus(err);
    if (status !== null) {
      res.status(status).json({ ok: false, error: 'invalid_payload' });
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ event: 'http.error', method: req.method, path: req.path, message });
    res.status(500).json({ ok: false, error: 'internal_error' });
  });

  const httpServer = http.createServer(app);
  return { app, httpServer };
}
