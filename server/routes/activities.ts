/**
 * 活動 API（GET activities, POST signup, DELETE unregister）
 * 失敗時のレスポンスは { detail, code }
 */

import { Router, type Request, type Response } from 'express';
import type { RegistrationErrorCode, RegistrationResult } from '../../src/types/activity';
import type { ActivityRegistry } from '../registry/ActivityRegistry';

export interface ActivitiesDeps {
  registry: ActivityRegistry;
}

const STATUS_BY_CODE: Record<RegistrationErrorCode, number> = {
  not_found: 404,
  conflict: 400,
  capacity: 400,
};

function normalizeText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

/** email クエリを取り出す。空なら 400 を返して null */
function requireEmail(req: Request, res: Response): string | null {
  const email = normalizeText(req.query.email);
  if (!email) {
    res.status(400).json({ detail: 'email query parameter is required', code: 'invalid' });
    return null;
  }
  return email;
}

function respond(res: Response, result: RegistrationResult): void {
  if (!result.success) {
    res.status(STATUS_BY_CODE[result.error.code]).json({
      detail: result.error.message,
      code: result.error.code,
    });
    return;
  }
  res.json({ message: result.message });
}

export function createActivitiesRouter(deps: ActivitiesDeps): Router {
  const router = Router();
  const { registry } = deps;

  // GET /activities
  router.get('/', (_req: Request, res: Response) => {
    res.json(registry.listActivities());
  });

  // POST /activities/:name/signup?email=
  router.post('/:name/signup', (req: Request, res: Response) => {
    const email = requireEmail(req, res);
    if (!email) return;
    respond(res, registry.signUp(req.params.name, email));
  });

  // DELETE /activities/:name/unregister?email=
  router.delete('/:name/unregister', (req: Request, res: Response) => {
    const email = requireEmail(req, res);
    if (!email) return;
    respond(res, registry.unregister(req.params.name, email));
  });

  return router;
}
