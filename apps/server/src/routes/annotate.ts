import { Router } from 'express';
import multer from 'multer';
import { ExtractionError, InferenceError, describeError } from '../errors';
import { normalizeDocument } from '../services/aggregator';
import type { ArtifactWriter } from '../services/artifacts';
import { annotateSingle, type PipelineDeps } from '../services/pipeline';

export interface AnnotateDeps extends Pick<PipelineDeps, 'segmenter' | 'extractor'> {
  renderer: Pick<ArtifactWriter, 'renderOverlay'>;
}

// Multer for file uploads
const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: 10 * 1024 * 1024 } // 10MB
});

// POST /api/annotate
// Body: multipart/form-data with an image file
// Returns: { document, annotated_image } where document is the COCO document of that one image

export function createAnnotateRouter(deps: AnnotateDeps): Router {
  const router = Router();

  router.post('/annotate', upload.single('image'), async (req, res) => {
    const file = req.file;
    if (!file) {
      res.status(400).json({ error: 'No image provided' });
      return;
    }
    console.log(`[ANNOTATE] Processing ${file.size} byte image (${file.mimetype})`);

    try {
      const { document, labelMap } = await annotateSingle(file.buffer, file.originalname, deps);
      const overlay = await deps.renderer.renderOverlay(file.buffer, labelMap);
      console.log(`[ANNOTATE] ${document.annotations.length} polygons`);
      res.json({
        document: normalizeDocument(document),
        annotated_image: overlay.toString('base64'),
      });
    } catch (error) {
      console.error('[ANNOTATE] Error:', error);
      const status = error instanceof ExtractionError ? 422 : 500;
      res.status(status).json({
        error: error instanceof InferenceError ? 'Inference failed' : 'Annotation failed',
        message: describeError(error),
      });
    }
  });

  // GET /api/health
  router.get('/health', (_, res) => {
    res.json({ ok: true });
  });

  return router;
}
