import express, { type NextFunction, type Request, type Response } from 'express';
import { deletePhotoController, refreshPhotoController, uploadPhotoController } from '../controllers/photo.controller';
import { createUserController, deleteUserController, lookupUserController } from '../controllers/user.controller';
import { identityOf, queryString, send } from './request';

const router = express.Router();

router.post('/', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const body: unknown = req.body;
    send(res, await createUserController(identityOf(req), body));
  } catch (error) {
    next(error);
  }
});

router.get('/by-nickname/:nickname', async (req: Request, res: Response, next: NextFunction) => {
  try {
    send(res, await lookupUserController(identityOf(req), req.params['nickname']));
  } catch (error) {
    next(error);
  }
});

router.delete('/:userId', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const body: unknown = req.body;
    const bodyReason =
      typeof body === 'object' && body !== null && 'reason' in body && typeof body.reason === 'string'
        ? body.reason
        : undefined;

    const result = await deleteUserController(identityOf(req), {
      userId: req.params['userId'],
      confirm: queryString(req, 'confirm'),
      reason: queryString(req, 'reason') ?? bodyReason,
    });
    send(res, result);
  } catch (error) {
    next(error);
  }
});

router.post('/:userId/photo', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const body: unknown = req.body;
    const result = await uploadPhotoController(identityOf(req), {
      userId: req.params['userId'],
      ...(Buffer.isBuffer(body) ? { raw: body } : { body }),
    });
    send(res, result);
  } catch (error) {
    next(error);
  }
});

router.delete('/:userId/photo', async (req: Request, res: Response, next: NextFunction) => {
  try {
    send(res, await deletePhotoController(identityOf(req), req.params['userId']));
  } catch (error) {
    next(error);
  }
});

router.get('/:userId/photo/refresh', async (req: Request, res: Response, next: NextFunction) => {
  try {
    send(res, await refreshPhotoController(identityOf(req), req.params['userId']));
  } catch (error) {
    next(error);
  }
});

export default router;
