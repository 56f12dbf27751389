// node/src/routes/products.ts — read-only catalog browsing
import express, { type Request, type Response } from 'express';
import { requireApiKey } from '@/middleware/api-key';
import type { PipelineContainer } from '@/services/pipeline-deps';
import { productToRecord } from '@/services/providers/catalog/catalog-provider';
import { createErrorResponse, sendError } from '@/utils/errorResponse';
import { CatalogUnavailableError } from '@/utils/errors';
import { productQuerySchema } from './validation';

export function createProductsRouter({ config, catalog }: PipelineContainer) {
  const router = express.Router();
  router.use(requireApiKey(config.apiKey));

  router.get('/', async (req: Request, res: Response) => {
    try {
      if (!catalog) throw new CatalogUnavailableError('Product catalog is not loaded');
      const filters = productQuerySchema.parse(req.query);
      const products = await catalog.search(filters);
      res.json(products.map(productToRecord));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/:id', async (req: Request, res: Response) => {
    try {
      if (!catalog) throw new CatalogUnavailableError('Product catalog is not loaded');
      const product = await catalog.get(req.params.id);
      if (!product) {
        res.status(404).json(createErrorResponse('not_found', 'Product not found'));
        return;
      }
      res.json(productToRecord(product));
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
