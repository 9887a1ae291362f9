import { Request, Response, NextFunction } from 'express';
import { AnyZodObject, ZodError, z } from 'zod';
import { validationErrorResponse } from '../utils/response-factory';

const requestParts = (req: Request) => ({
  body: req.body,
  params: req.params,
  query: req.query,
});

/**
 * Validation middleware factory
 *
 * Checks body, params and query against a Zod schema before the controller runs.
 *
 * ```typescript
 * router.post('/', validate(createSaleSchema), saleController.createSale);
 * ```
 */
export const validate = (schema: AnyZodObject) => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await schema.parseAsync(requestParts(req));
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        res.status(400).json(validationErrorResponse(error));
        return;
      }
      next(error);
    }
  };
};

/**
 * Typed view of a request already checked by `validate`, with the schema's
 * transforms applied (e.g. receipt numbers coerced to integers)
 */
export function parseRequest<S extends AnyZodObject>(schema: S, req: Request): z.infer<S> {
  return schema.parse(requestParts(req));
}
