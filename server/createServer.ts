import express, { type NextFunction, type Request, type Response } from 'express';
import type { CapacityMode } from '../src/types/activity';
import { createActivityRegistry } from './registry/ActivityRegistry';
import { createActivitiesRouter } from './routes/activities';
import type { ActivityStorage } from './storage/MemoryStorage';
import { createLogger } from './utils/log';

export interface ServerDeps {
  storage: ActivityStorage;
  capacityMode?: CapacityMode;
}

const log = createLogger('server');

/** Express が付与する 4xx（パラメータのデコード失敗等）。それ以外は null */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function createServer(deps: ServerDeps) {
  const app = express();
  const registry = createActivityRegistry({
    storage: deps.storage,
    capacityMode: deps.capacityMode,
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ ok: true, activities: deps.storage.getActivityNames().length });
  });

  app.use('/activities', createActivitiesRouter({ registry }));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ detail: 'Not Found' });
  });

  // 4 引数で Express のエラーハンドラとして登録される
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(err);
    if (status !== null) {
      log.debug(`${req.method} ${req.originalUrl} rejected`, status);
      res.status(status).json({ detail: 'Bad Request' });
      return;
    }
    log.error(`${req.method} ${req.originalUrl} failed`, err);
    res.status(500).json({ detail: 'Internal Server Error' });
  });

  return app;
}
