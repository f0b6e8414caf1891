import { Router, type Request, type Response } from 'express';
import { validateSettingsInput } from '../../domain/schemas.js';
import { successResponse } from '../middleware/error-handler.js';
import { listFields } from '../../services/schema-registry/index.js';
import type { SettingsLoader } from '../../services/settings-loader/index.js';
import { validateSnapshot } from '../../services/validation/index.js';
import { renderSettingsReport, renderValidationReport, toDisplayRecord } from '../../services/report/index.js';
import { sendInvalidBody } from './shared.js';

export function createSettingsRouter(loader: SettingsLoader): Router {
  const router = Router();

  router.get('/settings/fields', (_req: Request, res: Response) => {
    res.json(successResponse(listFields()));
  });

  router.post('/settings/validate', (req: Request, res: Response) => {
    const parsed = validateSettingsInput.safeParse(req.body);
    if (!parsed.success) return sendInvalidBody(res, parsed.error);

    const { env, useCache } = parsed.data;
    const result = useCache === false ? validateSnapshot(env) : loader.load(env);

    if (result.ok) {
      res.json(successResponse({
        valid: true,
        settings: toDisplayRecord(result.value),
        report: renderSettingsReport(result.value),
      }));
      return;
    }

    res.json(successResponse({
      valid: false,
      errors: result.error.errors,
      report: renderValidationReport(result.error),
    }));
  });

  router.post('/settings/cache/invalidate', (_req: Request, res: Response) => {
    const evicted = loader.size;
    loader.invalidate();
    res.json(successResponse({ invalidated: true, evicted }));
  });

  return router;
}
