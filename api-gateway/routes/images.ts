import { Router, Request, Response } from 'express';
import { Services } from '../../bootstrap/serviceSelector';
import { asyncHandler } from '../errors/errorHandler';
import { parseRequest } from '../errors/validationErrors';
import { requireOwner } from '../auth/middleware';
import { ConflictError, ValidationError } from '../../engine/records/errors';
import { validateRecordId } from '../../engine/validation/validators';
import { RecordQuery } from '../../engine/query/queryEngine';
import {
  ListQuery,
  confirmUploadBody,
  deleteQuery,
  initiateUploadBody,
  listQuery,
  readAccessQuery,
  updateMetadataBody,
} from './schemas';

function recordIdParam(req: Request): string {
  const result = validateRecordId(req.params.id);
  if (!result.ok) {
    throw new ValidationError([result.rejection]);
  }
  return result.value;
}

/**
 * Aborted when the client disconnects before the response is written.
 */
function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

function toRecordQuery(query: ListQuery, ownerId: string | undefined): RecordQuery {
  return {
    ownerId,
    tags: query.tags,
    contentType: query.contentType,
    startTime: query.startTime,
    endTime: query.endTime,
    minSize: query.minSize,
    maxSize: query.maxSize,
    status: query.status,
    limit: query.limit,
    cursor: query.cursor,
  };
}

export function createImageRoutes({ coordinator, queryEngine }: Services): Router {
  const router = Router();

  /**
   * POST /images
   *
   * Phase one of an upload. The client PUTs the bytes to `upload.url` with
   * `upload.headers`, then calls POST /images/:id/confirm.
   */
  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const ownerId = requireOwner(req);
      const body = parseRequest(initiateUploadBody, req.body, 'initiate upload body');

      const result = await coordinator.initiateUpload({ ownerId, ...body }, { signal: requestSignal(res) });

      res.status(201).json({
        recordId: result.recordId,
        objectRef: result.objectRef,
        upload: result.writeCredential,
      });
    }),
  );

  /**
   * GET /images
   *
   * The caller's own records (default), or with `mine=false` the active
   * records of every owner.
   */
  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const ownerId = requireOwner(req);
      const query = parseRequest(listQuery, req.query, 'list query');
      const result = await queryEngine.search(toRecordQuery(query, query.mine === false ? undefined : ownerId));
      res.status(200).json(result);
    }),
  );

  /**
   * GET /images/public
   *
   * Active records across all owners.
   */
  router.get(
    '/public',
    asyncHandler(async (req, res) => {
      requireOwner(req);
      const query = parseRequest(listQuery, req.query, 'list query');
      const result = await queryEngine.search(toRecordQuery(query, undefined));
      res.status(200).json(result);
    }),
  );

  router.post(
    '/:id/confirm',
    asyncHandler(async (req, res) => {
      const ownerId = requireOwner(req);
      const recordId = recordIdParam(req);
      const body = parseRequest(confirmUploadBody, req.body, 'confirm body');

      const record = await coordinator.confirmUpload({ recordId, ownerId, ...body }, { signal: requestSignal(res) });
      res.status(200).json(record);
    }),
  );

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const record = await coordinator.getRecord(recordIdParam(req), requireOwner(req));
      res.status(200).json(record);
    }),
  );

  router.patch(
    '/:id',
    asyncHandler(async (req, res) => {
      const ownerId = requireOwner(req);
      const recordId = recordIdParam(req);
      const body = parseRequest(updateMetadataBody, req.body, 'update body');

      const record = await coordinator.updateMetadata({ recordId, ownerId, ...body }, { signal: requestSignal(res) });
      res.status(200).json(record);
    }),
  );

  router.get(
    '/:id/download',
    asyncHandler(async (req, res) => {
      const ownerId = requireOwner(req);
      const recordId = recordIdParam(req);
      const { ttlSeconds } = parseRequest(readAccessQuery, req.query, 'download query');

      const credential = await coordinator.generateReadAccess(recordId, ownerId, ttlSeconds);
      res.status(200).json(credential);
    }),
  );

  /**
   * DELETE /images/:id[?hard=true]
   *
   * Deleting an already soft-deleted record is a no-op success.
   */
  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      const ownerId = requireOwner(req);
      const recordId = recordIdParam(req);
      const { hard } = parseRequest(deleteQuery, req.query, 'delete query');

      try {
        await coordinator.deleteRecord({ recordId, ownerId, hard }, { signal: requestSignal(res) });
      } catch (error) {
        if (!(error instanceof ConflictError) || hard) throw error;
        const current = await coordinator.getRecord(recordId, ownerId);
        if (current.status !== 'deleted') throw error;
      }
      res.status(204).end();
    }),
  );

  return router;
}
