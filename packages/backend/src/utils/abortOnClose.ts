import type { Response } from "express";

/** A signal that fires if the client disconnects before the response is written. */
export function abortOnClientClose(res: Response, reason: string): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      controller.abort(new Error(reason));
    }
  });
  return controller.signal;
}
