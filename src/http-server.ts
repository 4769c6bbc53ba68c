import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import { ZodError } from 'zod';
import {
  SearchDocumentsArgsSchema,
  ReplaceOccurrenceArgsSchema,
  ReplaceOccurrencesArgsSchema,
  ValidateDirectoryArgsSchema,
} from './tools/schemas.js';
import type { ReplaceManager } from './replace-manager.js';
import type { OpenedDocument } from './tools/docx/container.js';
import { DocxErrorCode, errorMessage, isDocxError } from './tools/docx/errors.js';
import { APP_NAME } from './config.js';
import { VERSION } from './version.js';
import { logger } from './utils/logger.js';

/**
 * Status code for an error thrown while serving a request. Bad input and a
 * missing search root are the caller's fault; everything else is ours.
 */
export function httpStatusFor(error: unknown): number {
  if (error instanceof ZodError) return 400;
  if (isDocxError(error, DocxErrorCode.INVALID_REQUEST) || isDocxError(error, DocxErrorCode.NOT_FOUND)) return 400;
  return 500;
}

export function httpErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
  }
  return errorMessage(error);
}

type Route = (req: Request, res: Response) => Promise<void>;

function route(name: string, handler: Route) {
  return (req: Request, res: Response): void => {
    handler(req, res).catch((error: unknown) => {
      const status = httpStatusFor(error);
      const message = httpErrorMessage(error);
      if (status >= 500) {
        logger.error(`${name} failed: ${message}`);
      } else {
        logger.debug(`${name} rejected: ${message}`);
      }
      res.status(status).json({ success: false, error: message });
    });
  };
}

/**
 * JSON API over one ReplaceManager, for a browser front end.
 */
export function createHttpApp<D extends OpenedDocument>(manager: ReplaceManager<D>): Express {
  const app = express();

  app.use(cors({ origin: '*' }));
  app.use(express.json({ limit: '5mb' }));

  app.get('/health', (_req, res) => {
    res.json({ name: APP_NAME, version: VERSION, status: 'ready' });
  });

  app.post('/api/search', route('search', async (req, res) => {
    const args = SearchDocumentsArgsSchema.parse(req.body);
    const summary = await manager.searchAll(args.directory, args.searchTerm, {
      contextChars: args.contextChars,
      caseSensitive: args.caseSensitive,
    });
    res.json({ success: true, ...summary });
  }));

  app.get('/api/results', route('results', async (_req, res) => {
    const snapshot = manager.currentResults();
    if (!snapshot) {
      res.status(404).json({ success: false, error: 'No search results available' });
      return;
    }
    res.json({ success: true, ...snapshot });
  }));

  app.post('/api/replace', route('replace', async (req, res) => {
    const args = ReplaceOccurrenceArgsSchema.parse(req.body);
    res.json(await manager.replaceOne(args.occurrenceId, args.newText));
  }));

  app.post('/api/replace_all', route('replace_all', async (req, res) => {
    const args = ReplaceOccurrencesArgsSchema.parse(req.body);
    // The request stream closes once the body is read; only an unfinished
    // response means the client went away.
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });
    const result = await manager.replaceMany(args.replacements, { signal: controller.signal });
    res.json({ success: result.failures.length === 0, ...result });
  }));

  app.post('/api/validate_directory', route('validate_directory', async (req, res) => {
    const args = ValidateDirectoryArgsSchema.parse(req.body);
    res.json(await manager.validateDirectory(args.directory));
  }));

  return app;
}
