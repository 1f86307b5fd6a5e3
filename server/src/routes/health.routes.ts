import express, { type Request, type Response } from 'express';
import { healthCheckController } from '../controllers/health.controller';
import { requestIdOf, send } from './request';

const router = express.Router();

router.get('/', async (req: Request, res: Response) => {
  send(res, await healthCheckController(requestIdOf(req)));
});

export default router;
