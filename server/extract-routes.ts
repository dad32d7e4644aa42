import express from 'express';
import { z } from 'zod';
import type { ErrorKind } from '../src/exceptions.js';
import type { ExtractionService } from '../src/extraction/service.js';
import type { ExtractionResult } from '../src/extraction/views.js';
import { createLogger } from '../src/logging-config.js';

const logger = createLogger('structura.server');

const STATUS_BY_KIND: Partial<Record<ErrorKind, number>> = {
  NotFound: 404,
  Unauthenticated: 401,
  Forbidden: 403,
  InvalidInput: 400,
  Cancelled: 499,
};

export const statusForKind = (kind: ErrorKind) => STATUS_BY_KIND[kind] ?? 500;

export interface HttpReply {
  status: number;
  body: Record<string, unknown>;
}

export interface ReplyOptions {
  /** Include stack traces in error bodies. */
  verboseErrors?: boolean;
}

export const toHttpReply = (result: ExtractionResult, options: ReplyOptions = {}): HttpReply => {
  if (result.success) {
    return { status: 200, body: { success: true, data: result.data } };
  }
  const error =
    options.verboseErrors && result.error.stack
      ? `${result.message}\n\n${result.error.stack}`
      : result.message;
  return {
    status: statusForKind(result.kind),
    body: {
      success: false,
      error,
      kind: result.kind,
      ...(result.violations ? { violations: result.violations } : {}),
    },
  };
};

const ExtractBodySchema = z.object({
  url: z.string({ required_error: 'url is required' }),
  domain: z.string({ required_error: 'domain is required' }),
  schema_version: z.string().optional(),
  api_key: z.string().optional(),
});

const FileBodySchema = z.object({
  filename: z.string({ required_error: 'filename is required' }),
  content: z.string({ required_error: 'content is required' }),
  encoding: z.enum(['utf8', 'base64']).default('utf8'),
  domain: z.string({ required_error: 'domain is required' }),
  schema_version: z.string().optional(),
  api_key: z.string().optional(),
});

const badRequest = (error: z.ZodError): HttpReply => ({
  status: 400,
  body: {
    success: false,
    error: error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; '),
    kind: 'InvalidInput',
  },
});

// The body key wins over the header.
const apiKeyFrom = (bodyKey: string | undefined, headerKey: string | undefined) =>
  bodyKey || headerKey || undefined;

export async function handleExtract(
  service: ExtractionService,
  body: unknown,
  headerApiKey: string | undefined,
  signal?: AbortSignal,
  options: ReplyOptions = {}
): Promise<HttpReply> {
  const parsed = ExtractBodySchema.safeParse(body ?? {});
  if (!parsed.success) {
    return badRequest(parsed.error);
  }
  const result = await service.extract(
    {
      url: parsed.data.url,
      domain: parsed.data.domain,
      schemaVersion: parsed.data.schema_version,
      apiKey: apiKeyFrom(parsed.data.api_key, headerApiKey),
    },
    { signal }
  );
  return toHttpReply(result, options);
}

export async function handleFileExtract(
  service: ExtractionService,
  body: unknown,
  headerApiKey: string | undefined,
  signal?: AbortSignal,
  options: ReplyOptions = {}
): Promise<HttpReply> {
  const parsed = FileBodySchema.safeParse(body ?? {});
  if (!parsed.success) {
    return badRequest(parsed.error);
  }
  const { filename, content, encoding } = parsed.data;
  const result = await service.extractFromFile(
    {
      filename,
      content: encoding === 'base64' ? Buffer.from(content, 'base64') : content,
      domain: parsed.data.domain,
      schemaVersion: parsed.data.schema_version,
      apiKey: apiKeyFrom(parsed.data.api_key, headerApiKey),
    },
    { signal }
  );
  return toHttpReply(result, options);
}

type Handler = typeof handleExtract;

/**
 * Abort the run when the client goes away before the reply is written.
 */
const route =
  (service: ExtractionService, handler: Handler, options: ReplyOptions): express.RequestHandler =>
  (req, res, next) => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        logger.info(`Client disconnected from ${req.method} ${req.path}; cancelling`);
        controller.abort();
      }
    });

    handler(service, req.body, req.get('x-api-key'), controller.signal, options)
      .then((reply) => {
        if (!res.headersSent && !res.destroyed) {
          res.status(reply.status).json(reply.body);
        }
      })
      .catch(next);
  };

export function createExtractRouter(
  service: ExtractionService,
  options: ReplyOptions = {}
): express.Router {
  const router = express.Router();
  router.post('/extract', route(service, handleExtract, options));
  router.post('/extract/file', route(service, handleFileExtract, options));
  return router;
}
