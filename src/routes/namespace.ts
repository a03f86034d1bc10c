import { Router } from 'express';
import type { Request, Response } from 'express';
import type { QueryResolver } from '../services/QueryResolver.js';
import { BadRequestError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { err } from '../utils/result.js';

function rawQuery(url: string): string | undefined {
  const index = url.indexOf('?');
  return index === -1 ? undefined : url.slice(index + 1);
}

/** Undefined when the path holds a malformed escape sequence. */
function decodePath(path: string): string | undefined {
  try {
    return decodeURIComponent(path);
  } catch {
    return undefined;
  }
}

/** `GET <osc path>[?ATTRIBUTE]` for every path not claimed by a service route. */
export function createNamespaceRouter(resolver: QueryResolver): Router {
  const router = Router();

  router.get('*', (req: Request, res: Response) => {
    const path = decodePath(req.path);
    const result =
      path === undefined
        ? err(new BadRequestError(`'${req.path}' is not a valid URL path`))
        : resolver.queryRaw(path, rawQuery(req.originalUrl));

    if (result.ok) {
      res.json(result.value);
      return;
    }

    const { error } = result;
    logger.debug('Namespace query rejected', { path: req.path, code: error.code });
    if (error.httpStatus === 204) {
      res.status(204).end();
      return;
    }
    res.status(error.httpStatus).json(error.toJSON());
  });

  return router;
}
