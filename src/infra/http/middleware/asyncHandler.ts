import type { RequestHandler } from 'express';

type HandlerArgs = Parameters<RequestHandler>;

/**
 * Wrap an async Express handler so it returns void (no-misused-promises)
 * and forwards rejections to next().
 */
export function asyncHandler(
  fn: (req: HandlerArgs[0], res: HandlerArgs[1], next: HandlerArgs[2]) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
