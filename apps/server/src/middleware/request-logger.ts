import type { RequestHandler } from 'express';
import * as out from '../output.js';

/** Log one line per finished request */
export function requestLogger(): RequestHandler {
  return (req, res, next) => {
    const started = performance.now();
    res.on('finish', () => {
      out.request(req.method, req.originalUrl, res.statusCode, performance.now() - started);
    });
    next();
  };
}
