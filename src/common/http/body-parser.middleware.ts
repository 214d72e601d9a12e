import { json, type RequestHandler, urlencoded } from "express";

export const AUTH_HANDLER_PREFIX = "/auth/api/";

/**
 * JSON and form body parsing for every route except the better-auth handler,
 * which reads the request stream itself.
 */
export function createBodyParser(excludedPrefix = AUTH_HANDLER_PREFIX): RequestHandler {
  const parseJson = json();
  const parseForm = urlencoded({ extended: true });

  return (req, res, next) => {
    if (req.path.startsWith(excludedPrefix)) {
      next();
      return;
    }

    parseJson(req, res, (error?: unknown) => {
      if (error) {
        next(error);
        return;
      }
      parseForm(req, res, next);
    });
  };
}
