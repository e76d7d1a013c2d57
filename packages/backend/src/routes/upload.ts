import { Router, Request, Response } from 'express';
import multer from 'multer';
import path from 'node:path';
import fs from 'node:fs';
import crypto from 'node:crypto';
import { getConfig } from '../config.js';
import { ACCEPTED_EXTENSIONS, isAcceptedFile } from '../analysis-service.js';

const router = Router();

function getUpload() {
  const config = getConfig();
  fs.mkdirSync(config.uploadDir, { recursive: true });

  const storage = multer.diskStorage({
    destination: config.uploadDir,
    filename: (_req, file, cb) => {
      const id = crypto.randomUUID();
      const ext = path.extname(file.originalname).toLowerCase() || '.log';
      cb(null, `${id}${ext}`);
    },
  });

  return multer({
    storage,
    limits: { fileSize: config.maxFileSize },
    fileFilter: (_req, file, cb) => {
      // Files without an extension are stored as .log
      if (!path.extname(file.originalname) || isAcceptedFile(file.originalname)) {
        cb(null, true);
      } else {
        cb(new Error(`Only ${ACCEPTED_EXTENSIONS.join(', ')} files are accepted`));
      }
    },
  });
}

/**
 * POST /api/upload
 * Upload a captured log file or a bugreport.zip.
 * Returns { id, filename, size }.
 */
router.post('/', (req: Request, res: Response) => {
  const upload = getUpload();
  upload.single('file')(req, res, (err: unknown) => {
    if (err) {
      const message = err instanceof Error ? err.message : String(err);
      return res.status(400).json({ error: message });
    }

    if (!req.file) {
      return res.status(400).json({ error: 'No file uploaded' });
    }

    const id = path.basename(req.file.filename, path.extname(req.file.filename));
    console.log(`[Upload] ${req.file.originalname} stored as ${id} (${req.file.size} bytes)`);

    res.json({
      id,
      filename: req.file.originalname,
      size: req.file.size,
    });
  });
});

export default router;
