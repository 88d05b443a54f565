import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../lib/errors';
import { CallSchema } from '../lib/schemas';
import { FunctionRegistry } from '../functions/registry';

const ParamsBodySchema = z.record(z.unknown());

/**
 * Function discovery and invocation routes
 */
export function createFunctionRoutes(registry: FunctionRegistry): Router {
  const router = Router();

  /**
   * GET /functions
   * List supported functions with their parameter schema
   *
   * Returns: { functions: [{ name, title, description, parameters, annotations }] }
   */
  router.get('/functions', (_req: Request, res: Response) => {
    res.json({ functions: registry.listFunctions() });
  });

  /**
   * POST /call
   * Invoke a function by name
   *
   * Body: { name: string, params?: object }
   * Returns: { result }
   */
  router.post('/call', asyncHandler(async (req: Request, res: Response) => {
    // Validate request body with Zod
    const input = CallSchema.parse(req.body);
    const result = await registry.call(input.name, input.params);

    res.json({ result });
  }));

  /**
   * POST /functions/:name
   * Invoke a function with the request body as its params
   *
   * Returns: { result }
   */
  router.post('/functions/:name', asyncHandler(async (req: Request, res: Response) => {
    const params = ParamsBodySchema.parse(req.body ?? {});
    const result = await registry.call(req.params.name, params);

    res.json({ result });
  }));

  return router;
}
