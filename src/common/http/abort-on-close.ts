import { Response } from 'express';

/**
 * A signal that aborts when the client disconnects before the response is
 * written, so long report computations stop holding the caller's slot.
 */
export function abortOnClose(res: Response): AbortSignal {
  const controller = new AbortController();
  res.once('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}
