// node/src/routes/abort.ts — cancels pipeline work when the client goes away
import type { Response } from 'express';

export function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}
