#!/usr/bin/env node

/**
 * REST API server for mecab-lattice
 * Exposes constrained parsing over HTTP
 */

import { createServer, type IncomingHttpHeaders, type IncomingMessage, type ServerResponse } from 'http';
import { config } from 'dotenv';
import {
  ConstraintError,
  ConstructionError,
  EncodingError,
  ParseError,
  Tagger,
  envFlag,
  errorMessage,
  optionsFromValues,
  setDebug,
  type FeaturePair,
  type MecabNodeJson,
  type MecabOptions,
  type ParseRequest
} from '@mecab-lattice/core';

// Parse environment variables
config();

const PORT = parseInt(process.env.PORT || '3000', 10);
const MAX_JSON_BODY_SIZE = 1 * 1024 * 1024; // 1 MiB

export class JsonBodyError extends Error {
  status: number;

  constructor(message: string, status = 400) {
    super(message);
    this.name = 'JsonBodyError';
    this.status = status;
  }
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

export interface ApiContext {
  /** Shared tagger for requests without their own options */
  tagger: Tagger;
  /** Opens a one-off tagger for requests that carry options */
  open?: (options: string | MecabOptions) => Tagger;
}

export interface JsonBodySource extends AsyncIterable<Buffer | string> {
  headers: IncomingHttpHeaders;
  destroy(): void;
}

export interface ParseResponse {
  text: string;
  result?: string;
  nodes?: MecabNodeJson[];
}

/**
 * Parse JSON body from request
 */
export async function parseJsonBody(req: JsonBodySource): Promise<unknown> {
  const contentLengthHeader = req.headers['content-length'];
  if (contentLengthHeader) {
    const contentLength = Number(contentLengthHeader);
    if (Number.isFinite(contentLength) && contentLength > MAX_JSON_BODY_SIZE) {
      throw new JsonBodyError('Payload too large', 413);
    }
  }

  const chunks: Buffer[] = [];
  let received = 0;
  for await (const chunk of req) {
    const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    received += buffer.length;
    if (received > MAX_JSON_BODY_SIZE) {
      req.destroy();
      throw new JsonBodyError('Payload too large', 413);
    }
    chunks.push(buffer);
  }

  const body = Buffer.concat(chunks).toString('utf-8');
  if (!body) {
    throw new JsonBodyError('Empty body');
  }
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new JsonBodyError(`Invalid JSON: ${errorMessage(error)}`);
  }
}

/**
 * HTTP status for an error raised while handling a request
 */
export function statusFor(error: unknown): number {
  if (error instanceof JsonBodyError) return error.status;
  if (error instanceof ConstraintError || error instanceof EncodingError) return 400;
  if (error instanceof ParseError) return 422;
  if (error instanceof ConstructionError) return 503;
  return 500;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readFeatures(value: unknown): FeaturePair[] {
  if (!Array.isArray(value)) {
    throw new ConstraintError('features must be an array of [morpheme, feature] pairs');
  }
  return value.map((pair: unknown, index): FeaturePair => {
    if (Array.isArray(pair) && pair.length === 2) {
      const [morpheme, feature]: unknown[] = pair;
      if (typeof morpheme === 'string' && typeof feature === 'string') {
        return [morpheme, feature];
      }
    }
    throw new ConstraintError(`features[${index}] must be a [morpheme, feature] pair of strings`);
  });
}

function readOptions(value: unknown): string | MecabOptions | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  if (isRecord(value)) return optionsFromValues(value);
  throw new ConstraintError('options must be a MeCab option string or object');
}

function toParseRequest(body: Record<string, unknown>): ParseRequest {
  const request: ParseRequest = {};
  const { boundary, anyBoundary, features } = body;

  if (boundary !== undefined) {
    if (typeof boundary !== 'string') {
      throw new ConstraintError('boundary must be a regular expression string');
    }
    if (anyBoundary !== undefined && typeof anyBoundary !== 'boolean') {
      throw new ConstraintError('anyBoundary must be a boolean');
    }
    request.boundaryConstraints = { pattern: boundary, anyBoundary: anyBoundary ?? true };
  }
  if (features !== undefined) {
    request.featureConstraints = readFeatures(features);
  }
  return request;
}

function runParse(tagger: Tagger, text: string, request: ParseRequest, nodes: boolean): ParseResponse {
  if (nodes) {
    return { text, nodes: [...tagger.parse(text, { ...request, asNodes: true })].map((node) => node.toJSON()) };
  }
  return { text, result: tagger.parse(text, { ...request, asNodes: false }) };
}

/**
 * POST /parse body handler: { text, options?, boundary?, anyBoundary?, features?, nodes? }
 */
export function handleParseRequest(context: ApiContext, body: unknown): ApiResponse {
  if (!isRecord(body)) {
    return { status: 400, body: { error: 'Body must be a JSON object' } };
  }
  const { text, nodes } = body;
  if (typeof text !== 'string' || !text) {
    return { status: 400, body: { error: 'Missing required field: text' } };
  }

  try {
    const request = toParseRequest(body);
    const options = readOptions(body.options);
    const wantNodes = nodes === true;

    if (options === undefined) {
      return { status: 200, body: runParse(context.tagger, text, request, wantNodes) };
    }

    const tagger = (context.open ?? ((opts: string | MecabOptions) => Tagger.open(opts)))(options);
    try {
      return { status: 200, body: runParse(tagger, text, request, wantNodes) };
    } finally {
      tagger.close();
    }
  } catch (error) {
    return { status: statusFor(error), body: { error: errorMessage(error) } };
  }
}

/**
 * GET /info: MeCab version, charset and dictionaries
 */
export function handleInfoRequest(context: ApiContext): ApiResponse {
  const { tagger } = context;
  return {
    status: 200,
    body: {
      version: tagger.version,
      charset: tagger.charset,
      options: tagger.optionsString,
      dictionaries: tagger.dictionaries.map((dictionary) => ({
        filepath: dictionary.filepath,
        charset: dictionary.charset,
        size: dictionary.size,
        type: dictionary.type,
        version: dictionary.version
      }))
    }
  };
}

/**
 * Route a request to its handler; the body is only read for POST routes
 */
export async function routeRequest(
  context: ApiContext,
  method: string,
  pathname: string,
  readBody: () => Promise<unknown>
): Promise<ApiResponse> {
  try {
    if (method === 'OPTIONS') {
      return { status: 204, body: null };
    }

    // Health check endpoint
    if (pathname === '/health' && method === 'GET') {
      return { status: 200, body: { status: 'ok', timestamp: new Date().toISOString() } };
    }

    if (pathname === '/info' && method === 'GET') {
      return handleInfoRequest(context);
    }

    if (pathname === '/parse' && method === 'POST') {
      return handleParseRequest(context, await readBody());
    }

    // API documentation endpoint
    if (pathname === '/api' && method === 'GET') {
      return {
        status: 200,
        body: {
          name: 'mecab-lattice REST API',
          version: '0.1.0',
          endpoints: {
            'GET /health': 'Health check',
            'GET /info': 'MeCab version and dictionaries',
            'POST /parse':
              'Parse text (body: {text: string, options?: string | object, boundary?: string, anyBoundary?: boolean, features?: [string, string][], nodes?: boolean})'
          },
          examples: {
            boundary: {
              url: '/parse',
              body: { text: 'にわにはにわにわとりがいる。', boundary: 'にわ|はにわにわとり' }
            },
            features: {
              url: '/parse',
              body: { text: 'とりがいる', features: [['とり', '名詞,一般']], nodes: true }
            }
          }
        }
      };
    }

    return { status: 404, body: { error: 'Not found' } };
  } catch (error) {
    return { status: statusFor(error), body: { error: errorMessage(error) } };
  }
}

/**
 * Send JSON response
 */
function sendJson(res: ServerResponse, data: unknown, status = 200, requestId?: string): void {
  if (data === null) {
    res.writeHead(status);
    res.end();
    return;
  }
  const json = JSON.stringify(data);
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(json);
  if (requestId) {
    console.log(`[${requestId}] Response sent: ${json.length} bytes, status ${status}`);
  }
}

/**
 * Main request handler
 */
export function createRequestHandler(context: ApiContext): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
  return async (req, res) => {
    const requestId = Math.random().toString(36).substring(7);
    const startTime = Date.now();
    const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);

    console.log(`[${requestId}] START ${req.method} ${url.pathname}`);

    // CORS headers
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    const response = await routeRequest(context, req.method ?? 'GET', url.pathname, () => parseJsonBody(req));
    if (response.status >= 500) {
      console.error(`[${requestId}] Request error:`, response.body);
    }
    sendJson(res, response.body, response.status, requestId);
    console.log(`[${requestId}] END ${url.pathname} - ${Date.now() - startTime}ms`);
  };
}

/**
 * Start the server
 */
async function main(): Promise<void> {
  if (envFlag(process.env.MECAB_LATTICE_DEBUG)) {
    setDebug(true);
  }

  // Add global error handlers
  process.on('unhandledRejection', (reason) => {
    console.error('UNHANDLED REJECTION:', reason);
  });

  const tagger = Tagger.open(process.env.MECAB_OPTIONS || null);
  console.log(`MeCab ${tagger.version} loaded from ${tagger.libraryPath} (${tagger.charset})`);

  const handler = createRequestHandler({ tagger });
  const server = createServer((req, res) => {
    handler(req, res).catch((error) => {
      console.error('Unhandled request failure:', error);
      if (!res.headersSent) sendJson(res, { error: 'Internal server error' }, 500);
    });
  });

  // Bind to 0.0.0.0 to allow external connections
  server.listen(PORT, '0.0.0.0', () => {
    console.log(`mecab-lattice API server listening on http://0.0.0.0:${PORT}`);
    console.log(`Health check: http://0.0.0.0:${PORT}/health`);
    console.log(`API docs: http://0.0.0.0:${PORT}/api`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down gracefully...`);
    server.close(() => {
      tagger.close();
      console.log('Server closed');
      process.exit(0);
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// Run server if this is the entry point
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(`FATAL: ${errorMessage(error)}`);
    process.exit(2);
  });
}
