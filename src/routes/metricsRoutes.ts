import { Router, type NextFunction, type Request, type Response } from 'express';
import register from '../metrics/metrics.js';

const router = Router();

router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.set('Content-Type', register.contentType);
    res.send(await register.metrics());
  } catch (error) {
    next(error);
  }
});

export default router;
