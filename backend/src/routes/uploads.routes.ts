import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import path from 'path';
import { z } from 'zod';

import { MAPPING_TARGETS } from '@src/common/constants/CanonicalSchema';
import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';
import Paths from '@src/common/constants/Paths';
import { RouteError } from '@src/common/util/route-errors';
import type { AppServices } from '@src/config/services';
import { ownerIdOf } from '@src/services/authService';
import { isLeaseLive } from '@src/services/pipelineOrchestrator';
import { parseSpreadsheet, SUPPORTED_EXTENSIONS } from '@src/services/spreadsheetParser';
import type { RecordProgress } from '@src/types/pipeline';


/******************************************************************************
                                Validation
******************************************************************************/

const booleanFlag = z.preprocess(
  (value) => (value === 'true' ? true : value === 'false' ? false : value),
  z.boolean().optional(),
);

const cell = z.union([z.string(), z.number(), z.boolean(), z.null()])
  .transform((value) => (value === null ? '' : String(value)));

const JsonUploadSchema = z.object({
  filename: z.string().min(1).default('upload.json'),
  rows: z.array(z.array(cell)).min(1),
  hasHeaderRow: booleanFlag,
});

const FileUploadSchema = z.object({
  hasHeaderRow: booleanFlag,
});

const MappingSchema = z.object({
  assignments: z.array(z.object({
    columnIndex: z.number().int().min(0),
    field: z.enum(MAPPING_TARGETS),
  })),
  refreshPolicy: z.enum(['prefer_cache', 'force_refresh']).default('prefer_cache'),
  tags: z.array(z.string()).default([]),
});


/******************************************************************************
                                 Helpers
******************************************************************************/

function ownerOf(req: Request): string {
  if (!req.tokenPayload) {
    throw new RouteError(HttpStatusCodes.UNAUTHORIZED, 'Not authenticated');
  }
  return ownerIdOf(req.tokenPayload);
}

function toResultView(progress: RecordProgress) {
  return {
    rowNumber: progress.rowNumber,
    result: progress.result ?? null,
    fullname: progress.record?.fullname ?? null,
    propertyStreet: progress.record?.property.street ?? null,
    enrichmentSource: progress.enrichment?.source ?? null,
    contact: progress.result === 'matched_litigator' ? null : progress.enrichment?.contact ?? null,
    litigatorType: progress.litigator?.litigatorType ?? null,
    litigatorMatchedOn: progress.litigator?.matchedOn ?? null,
    duplicateOfRow: progress.duplicateOfRow ?? null,
    tagStatus: progress.tagStatus ?? null,
    failure: progress.failure ?? null,
    issue: progress.issue ?? null,
  };
}


/******************************************************************************
                                  Routes
******************************************************************************/

export default function uploadsRouter(
  { uploads, orchestrator, decisions }: AppServices,
  maxUploadBytes: number,
): Router {
  const router = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes },
    fileFilter: (_req, file, cb) => {
      const extension = path.extname(file.originalname).toLowerCase();
      if (SUPPORTED_EXTENSIONS.some((supported) => supported === extension)) {
        cb(null, true);
      } else {
        cb(new RouteError(
          HttpStatusCodes.UNPROCESSABLE_ENTITY,
          `Unsupported file type "${extension}". Upload one of: ${SUPPORTED_EXTENSIONS.join(', ')}`,
        ));
      }
    },
  });

  /**
   * POST /api/uploads
   * Multipart `file` (CSV/XLS/XLSX) or JSON `{ filename, rows, hasHeaderRow }`.
   * Returns the batch and the proposed column mapping.
   */
  router.post(Paths.Uploads.Create, upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ownerId = ownerOf(req);

      let rows: string[][];
      let originalName: string;
      let hasHeaderRow: boolean | undefined;
      if (req.file) {
        rows = parseSpreadsheet(req.file.buffer, req.file.originalname);
        originalName = req.file.originalname;
        hasHeaderRow = FileUploadSchema.parse(req.body ?? {}).hasHeaderRow;
      } else {
        const body = JsonUploadSchema.safeParse(req.body);
        if (!body.success) {
          res.status(HttpStatusCodes.BAD_REQUEST).json({ error: 'Provide a file or rows', details: body.error.flatten() });
          return;
        }
        rows = body.data.rows;
        originalName = body.data.filename;
        hasHeaderRow = body.data.hasHeaderRow;
      }

      const proposal = await uploads.createBatch({ ownerId, originalName, rows, hasHeaderRow });
      res.status(HttpStatusCodes.CREATED).json(proposal);
    } catch (error) {
      next(error);
    }
  });

  /**
   * PUT /api/uploads/:uploadId/mapping
   * Confirm the column mapping and start processing in the background.
   */
  router.put(Paths.Uploads.Mapping, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = MappingSchema.safeParse(req.body);
      if (!body.success) {
        res.status(HttpStatusCodes.BAD_REQUEST).json({ error: 'Invalid mapping', details: body.error.flatten() });
        return;
      }

      const batch = await uploads.confirmMapping(ownerOf(req), req.params.uploadId, body.data);
      orchestrator.start(batch.id);
      res.status(HttpStatusCodes.ACCEPTED).json({ batch });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/uploads/:uploadId/process
   * Resume a batch that stopped (outage, cancel, crash).
   */
  router.post(Paths.Uploads.Process, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const batch = await uploads.getOwnedBatch(ownerOf(req), req.params.uploadId);
      if (batch.status === 'mapping') {
        res.status(HttpStatusCodes.CONFLICT).json({ error: 'Confirm the column mapping first' });
        return;
      }

      orchestrator.start(batch.id);
      res.status(HttpStatusCodes.ACCEPTED).json(await orchestrator.progress(batch.id));
    } catch (error) {
      next(error);
    }
  });

  /** POST /api/uploads/:uploadId/cancel */
  router.post(Paths.Uploads.Cancel, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const batch = await uploads.getOwnedBatch(ownerOf(req), req.params.uploadId);
      res.status(HttpStatusCodes.ACCEPTED).json(await orchestrator.cancel(batch.id));
    } catch (error) {
      next(error);
    }
  });

  /** GET /api/uploads/:uploadId - status and counts */
  router.get(Paths.Uploads.Get, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const batch = await uploads.getOwnedBatch(ownerOf(req), req.params.uploadId);
      const progress = await orchestrator.progress(batch.id);
      res.json({ batch, progress, running: orchestrator.isRunning(batch.id) || isLeaseLive(batch, new Date()) });
    } catch (error) {
      next(error);
    }
  });

  /** GET /api/uploads/:uploadId/results - per-row outcome */
  router.get(Paths.Uploads.Results, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const results = await uploads.listResults(ownerOf(req), req.params.uploadId);
      res.json({ results: results.map(toResultView) });
    } catch (error) {
      next(error);
    }
  });

  /** DELETE /api/uploads/:uploadId - purge batch, raw rows and progress */
  router.delete(Paths.Uploads.Delete, async (req: Request, res: Response, next: NextFunction) => {
    try {
      await uploads.purge(ownerOf(req), req.params.uploadId);
      decisions.forgetBatch(req.params.uploadId);
      res.status(HttpStatusCodes.NO_CONTENT).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
