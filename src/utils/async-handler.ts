import { Request, Response, NextFunction, RequestHandler } from 'express';

export type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Async handler wrapper
 *
 * Forwards a rejected handler promise to the Express error middleware
 *
 * Usage:
 * ```typescript
 * getReceipt = asyncHandler(async (req, res) => {
 *   const receipt = await this.receiptService.getReceipt(receiptNo);
 *   res.json(createSuccessResponse(receipt));
 * });
 * ```
 */
export const asyncHandler = (fn: AsyncRequestHandler): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};
