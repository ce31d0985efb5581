import type { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Hosting rewrites forward `/api/{env}/{resource}/...` unchanged.
 * Drop everything up to and including the resource segment so routes
 * can be declared relative to the resource.
 */
export function stripPathPrefix(resourceName: string): RequestHandler {
  const segment = `/${resourceName}`;
  return (req: Request, _res: Response, next: NextFunction): void => {
    const index = req.url.indexOf(segment);
    if (index !== -1) {
      const rest = req.url.slice(index + segment.length);
      if (rest === '' || rest.startsWith('/') || rest.startsWith('?')) {
        req.url = rest.startsWith('/') ? rest : `/${rest}`;
      }
    }
    next();
  };
}
