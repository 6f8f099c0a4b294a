import { Request, Response } from "express";

const CALLBACK_PARAMS = ["callback", "jscallback", "jsonp", "jsoncallback"] as const;

/**
 * JSONP callback requested in the query, reduced to identifier characters
 */
export function callbackName(query: Request["query"]): string | undefined {
  for (const param of CALLBACK_PARAMS) {
    const value = query[param];
    if (typeof value !== "string") continue;

    const name = value.replace(/[^a-zA-Z0-9_$.]/g, "");
    if (name) return name;
  }
  return undefined;
}

/**
 * Send a JSON body, wrapped as `callback(body)` when a callback is requested
 */
export function sendJsonOrJsonp(req: Request, res: Response, body: unknown): void {
  const callback = callbackName(req.query);
  if (!callback) {
    res.status(200).json(body);
    return;
  }

  res
    .status(200)
    .type("text/javascript")
    .send(`${callback}(${JSON.stringify(body)})`);
}
