import type { RequestHandler } from 'express';

/**
 * Strip the routing prefix Hosting rewrites add in front of a function's
 * routes, so `/api/dev/health-report/report` and `/health-report/report`
 * both reach the `/report` route.
 */
export function stripPathPrefix(resourceName: string): RequestHandler {
  const prefix = new RegExp(`^(?:/api/(?:dev|prod))?/${resourceName}(?=/|\\?|$)`);

  return (req, _res, next): void => {
    const stripped = req.url.replace(prefix, '');
    req.url = stripped.startsWith('/') ? stripped : `/${stripped}`;
    next();
  };
}
