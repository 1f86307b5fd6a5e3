import express, { type NextFunction, type Request, type Response } from 'express';
import { validateNicknameController } from '../controllers/user.controller';
import { identityOf, send } from './request';

const router = express.Router();

router.get('/:nickname/validate', async (req: Request, res: Response, next: NextFunction) => {
  try {
    send(res, await validateNicknameController(identityOf(req), req.params['nickname']));
  } catch (error) {
    next(error);
  }
});

export default router;
