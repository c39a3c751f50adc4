import { Router } from 'express';
import type { HealthResponse } from '../responses.js';
import { methodNotAllowed } from '../middleware/error-handler.js';

export function createHealthRouter(): Router {
  const router = Router();

  router.route('/')
    .get((_req, res) => {
      const body: HealthResponse = { message: 'Healthy' };
      res.json(body);
    })
    .all(methodNotAllowed('GET'));

  return router;
}
