/**
 * Compare API
 *
 * HTTP surface for quote extraction, tabular parsing, ranking and the
 * glossary. Collaborators are injected so tests can swap the PDF reader and
 * narrator for in-process fakes.
 */

import express, { Request, Response, NextFunction, RequestHandler } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  isQuoteCompareError,
  parseCompareRequest,
  parseExtractRequest,
  parseParseRequest,
  createQuoteRecord,
  rank,
  toRankedTable,
  toMarkdownTable,
  explainRanking,
  parseTabularFile,
  PdfIngestionPipeline,
  FIELD_RULES,
  DEFAULT_PROFILE,
  type DocumentReader,
  type Narrator,
  type LocalGlossary,
  type CompareResponse,
  type ErrorEnvelope,
  type FamilyProfile,
  type SourceDocument,
} from '@quote-compare/shared';

export interface AppDependencies {
  reader: DocumentReader;
  narrator: Narrator | null;
  glossary: LocalGlossary;
}

const SERVICE_NAME = 'compare-api';
const MAX_GLOSSARY_HITS = 10;

function correlationIdOf(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : getCorrelationId();
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const envelope: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: correlationIdOf(res),
    },
  };
  res.status(status).json(envelope);
}

/**
 * Forward rejections from async handlers to the error middleware.
 */
function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

/**
 * Status an upstream middleware (body parser) attached to its error, if any.
 */
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

function decodeBase64(content: string): Buffer {
  return Buffer.from(content, 'base64');
}

function parseHitCount(value: unknown): number {
  const parsed = typeof value === 'string' ? parseInt(value, 10) : NaN;
  if (!Number.isFinite(parsed) || parsed < 1) return 2;
  return Math.min(parsed, MAX_GLOSSARY_HITS);
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  const pipeline = new PdfIngestionPipeline(deps.reader);

  // Middleware
  app.use(express.json({ limit: '25mb' }));

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.header('x-correlation-id') || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const routePath: unknown = req.route?.path;
      const path = typeof routePath === 'string' ? routePath : req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: SERVICE_NAME,
      narrator: deps.narrator ? deps.narrator.name : null,
      field_rules: FIELD_RULES.length,
      glossary_entries: deps.glossary.size,
      timestamp: new Date().toISOString(),
    });
  });

  // Metrics endpoint
  app.get(
    '/metrics',
    asyncHandler(async (req: Request, res: Response) => {
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    })
  );

  /**
   * POST /quotes/extract
   * PDF quote documents (base64) -> quotes plus one outcome per document
   */
  app.post(
    '/quotes/extract',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseExtractRequest(req.body);
      const documents: SourceDocument[] = body.documents.map((doc) => ({
        name: doc.name,
        content: decodeBase64(doc.content_base64),
      }));

      const report = await pipeline.ingestDocuments(documents);
      res.json(report);
    })
  );

  /**
   * POST /quotes/parse
   * One CSV, XLSX or JSON file (base64) -> quotes
   */
  app.post(
    '/quotes/parse',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseParseRequest(req.body);
      const quotes = await parseTabularFile(body.filename, decodeBase64(body.content_base64));
      res.json({ quotes });
    })
  );

  /**
   * POST /compare
   * Rank quotes and explain the result
   */
  app.post(
    '/compare',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseCompareRequest(req.body);

      const quotes = body.quotes.map((input, index) => createQuoteRecord(input, index));
      const ranked = rank(
        quotes,
        body.expected_claims ?? config.defaultExpectedClaims,
        body.avg_claim_amount ?? config.defaultAvgClaimAmount,
        {
          cost: body.weights?.cost ?? config.defaultWeightCost,
          coverage: body.weights?.coverage ?? config.defaultWeightCoverage,
          network: body.weights?.network ?? config.defaultWeightNetwork,
        }
      );

      const table = toRankedTable(ranked);
      const profile: FamilyProfile = { ...DEFAULT_PROFILE, ...body.profile };
      const explanation = await explainRanking(table, body.question ?? '', profile, deps.narrator);

      const response: CompareResponse = {
        ranked: table,
        markdown: toMarkdownTable(table),
        explanation: explanation.text,
        explanation_source: explanation.source,
      };
      res.json(response);
    })
  );

  /**
   * GET /glossary?q=...&k=2
   */
  app.get('/glossary', (req: Request, res: Response) => {
    const query = typeof req.query.q === 'string' ? req.query.q : '';
    const k = parseHitCount(req.query.k);

    res.json({
      query,
      answer: deps.glossary.answer(query, k),
      hits: deps.glossary.retrieve(query, k),
    });
  });

  app.use((req: Request, res: Response) => {
    sendError(res, 404, 'not_found', `No route for ${req.method} ${req.path}`);
  });

  // Error handler
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isQuoteCompareError(error)) {
      if (error.statusCode >= 500) {
        logger.error('Request failed', error, { path: req.path });
      }
      sendError(res, error.statusCode, error.code, error.message);
      return;
    }

    const clientStatus = clientErrorStatus(error);
    if (clientStatus !== undefined) {
      sendError(
        res,
        clientStatus,
        'invalid_request',
        error instanceof Error ? error.message : 'Invalid request'
      );
      return;
    }

    logger.error('Unhandled error', error, { path: req.path });
    sendError(res, 500, 'internal_error', 'Internal server error');
  });

  return app;
}
