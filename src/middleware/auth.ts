import { Request, Response, NextFunction } from 'express';

/**
 * `x-api-key` check for the admin API. With no keys configured every request
 * is refused, so an unconfigured deployment never exposes the admin routes.
 */
export function apiKeyAuth(keys: string[]) {
  const validKeys = new Set(keys);

  return (req: Request, res: Response, next: NextFunction) => {
    const apiKey = req.get('x-api-key');

    if (!apiKey) {
      return res.status(401).json({ success: false, error: 'Missing API key' });
    }

    if (validKeys.size === 0 || !validKeys.has(apiKey)) {
      return res.status(403).json({ success: false, error: 'Invalid API key' });
    }

    next();
  };
}
