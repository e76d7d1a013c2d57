import { Router, Request, Response } from 'express';
import { getConfig, updateAnalysisOptions, type AnalysisSettings } from '../config.js';

const router = Router();

const SETTING_KEYS: (keyof AnalysisSettings)[] = ['hexDumpBytes', 'minStringLength'];

export type SettingsUpdate =
  | { ok: true; updates: Partial<AnalysisSettings> }
  | { ok: false; error: string };

/**
 * Validate a settings body: every given key must be a positive integer.
 */
export function parseSettingsUpdate(body: unknown): SettingsUpdate {
  if (!body || typeof body !== 'object') {
    return { ok: false, error: 'Body must be a JSON object' };
  }

  const updates: Partial<AnalysisSettings> = {};
  for (const key of SETTING_KEYS) {
    if (!(key in body)) continue;
    const value: unknown = Reflect.get(body, key);
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      return { ok: false, error: `${key} must be a positive integer` };
    }
    updates[key] = value;
  }
  return { ok: true, updates };
}

/**
 * GET /api/settings
 * Current analysis options.
 */
router.get('/', (_req: Request, res: Response) => {
  res.json(getConfig().analysis);
});

/**
 * PUT /api/settings
 * Body: { hexDumpBytes?: number, minStringLength?: number }
 */
router.put('/', (req: Request, res: Response) => {
  const parsed = parseSettingsUpdate(req.body);
  if (!parsed.ok) {
    return res.status(400).json({ error: parsed.error });
  }

  updateAnalysisOptions(parsed.updates);
  res.json(getConfig().analysis);
});

export default router;
