import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Accepts the key from the `x-api-key` header or an `apiKey` query parameter.
 */
export function createApiKeyValidator(apiKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers['x-api-key'];
    const provided = typeof header === 'string' ? header : req.query.apiKey;

    if (!apiKey) {
      console.error('[API] API_KEY is not configured');
      res.status(500).json({
        error: 'Internal Server Error',
        message: 'API key not configured',
      });
      return;
    }

    if (typeof provided !== 'string' || provided !== apiKey) {
      res.status(403).json({
        error: 'Forbidden',
        message: 'Invalid or missing API key',
      });
      return;
    }

    next();
  };
}
