import { Router, Request, Response, NextFunction } from 'express';
import { analyzeCrashLog, type CrashReport } from '@dumplens/parser';
import { getConfig } from '../config.js';
import { analyzeUpload, findUpload, readLogBody } from '../analysis-service.js';
import { reportStore } from '../store.js';

const router = Router();

function describeReport(report: CrashReport): string {
  if (!report.payload.found) return 'no crashpad payload';
  return `${report.formatDescription} via ${report.decoding.strategy}, ${report.findings.keywordHits.length} keyword hit(s)`;
}

/**
 * POST /api/analyze
 * Analyze pasted log text.
 * Body: text/plain log, or { log: string }
 */
router.post('/', (req: Request, res: Response) => {
  const log = readLogBody(req.body);
  if (!log || !log.trim()) {
    return res.status(400).json({ error: 'Request body must contain log text' });
  }

  const report = analyzeCrashLog(log, getConfig().analysis);
  console.log(`[Analyze] pasted log (${log.length} chars): ${describeReport(report)}`);
  res.json(report);
});

/**
 * GET /api/analyze/:id
 * Analyze an uploaded log file or bugreport.zip. Reports are cached per upload.
 */
router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
  const id = String(req.params.id);

  const config = getConfig();
  const cached = reportStore.get(id, config.analysis);
  if (cached) return res.json(cached);

  const filePath = findUpload(config.uploadDir, id);
  if (!filePath) {
    return res.status(404).json({ error: `Upload ${id} not found` });
  }

  try {
    const report = await analyzeUpload(filePath, config.analysis);
    reportStore.set(id, report, config.analysis);
    console.log(`[Analyze] upload ${id}: ${describeReport(report)}`);
    res.json(report);
  } catch (err) {
    next(err);
  }
});

export default router;
