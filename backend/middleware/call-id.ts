import type { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

declare global {
  namespace Express {
    interface Request {
      callId?: string;
    }
  }
}

export function callId(req: Request, _: Response, next: NextFunction) {
  req.callId = uuid().slice(0, 5);
  next()
}
