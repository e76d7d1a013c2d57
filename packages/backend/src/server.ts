import express from 'express';
import cors from 'cors';
import { getConfig } from './config.js';
import uploadRouter from './routes/upload.js';
import analyzeRouter from './routes/analyze.js';
import settingsRouter from './routes/settings.js';

const config = getConfig();
const app = express();

// Middleware
app.use(cors());
app.use(express.json({ limit: config.maxTextSize }));
app.use(express.text({ limit: config.maxTextSize }));

// Health check
app.get('/api/health', (_req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

// Routes
app.use('/api/upload', uploadRouter);
app.use('/api/analyze', analyzeRouter);
app.use('/api/settings', settingsRouter);

// Error handler
app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
  console.error('[Server Error]', err.message);
  res.status(500).json({ error: err.message });
});

// Start
app.listen(config.port, () => {
  console.log(`[dumplens] Backend running on http://localhost:${config.port}`);
  console.log(`[dumplens] Upload dir: ${config.uploadDir}`);
  console.log(`[dumplens] Hex dump bytes: ${config.analysis.hexDumpBytes}, min string length: ${config.analysis.minStringLength}`);
});

export default app;
