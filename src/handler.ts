/**
 * Main Lambda handler for the Telegram Message Archiver HTTP API
 *
 * Entry point for API Gateway (HTTP API) requests:
 * - `GET /health` - liveness probe
 * - `POST /process-messages` - archive the chats listed in the uploaded file
 *
 * @module handler
 */

import { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from 'aws-lambda';
import { DateWindow, HealthResponse } from './types';
import { parseDateWindow } from './telegram/date-filter';
import { createTelegramSessionGateway } from './telegram/session-gateway';
import { createArchiveWriter } from './archive/archive-writer';
import { Orchestrator, createOrchestrator } from './archive/batch-orchestrator';
import { parseIdentifierList } from './archive/identifier-list';
import { formatSummaryLine, summarize } from './archive/result-aggregator';
import { getServiceName, loadStorageConfig, loadTelegramConfig } from './config/config';
import {
  ConfigurationError,
  InvalidRequestError,
  getHttpStatusForError,
  handleError,
  toError,
} from './errors/error-handler';

// ============================================================================
// Lambda Cold Start Optimization
// The Telegram session is opened once per container and reused across invocations
// ============================================================================

/** Cached orchestrator, shared by every invocation in this container */
let cachedOrchestrator: Promise<Orchestrator> | null = null;

/**
 * Reset cached instances (for testing purposes)
 * @internal
 */
export function resetCachedInstances(): void {
  cachedOrchestrator = null;
}

/**
 * Build the orchestrator from environment configuration
 *
 * The Lambda cannot log in interactively, so a saved session is required.
 */
async function initializeOrchestrator(): Promise<Orchestrator> {
  const telegramConfig = loadTelegramConfig();
  if (!telegramConfig.session) {
    throw new ConfigurationError('TELEGRAM_SESSION is not set', 'TELEGRAM_SESSION');
  }
  const storageConfig = loadStorageConfig();

  const gateway = createTelegramSessionGateway(telegramConfig);
  await gateway.open();
  return createOrchestrator(gateway, createArchiveWriter(storageConfig));
}

/**
 * Get or create the orchestrator (singleton pattern for Lambda reuse)
 *
 * A failed initialization is not cached, so the next request retries it.
 */
export function getOrchestrator(): Promise<Orchestrator> {
  if (!cachedOrchestrator) {
    cachedOrchestrator = initializeOrchestrator().catch((error: unknown) => {
      cachedOrchestrator = null;
      throw error;
    });
  }
  return cachedOrchestrator;
}

// ============================================================================
// Request Parsing
// ============================================================================

/**
 * Headers added to every response
 */
const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
  'Access-Control-Allow-Headers': '*',
};

/**
 * Identifiers and window of one archive request
 */
export interface RunRequest {
  identifiers: string[];
  window: DateWindow;
}

/**
 * Decode the raw request body
 */
function decodeBody(event: APIGatewayProxyEventV2): string {
  if (!event.body) {
    return '';
  }
  return event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf-8') : event.body;
}

/**
 * Pull the uploaded file out of a multipart/form-data body
 *
 * The part named `file` wins; otherwise the first part carrying a filename.
 *
 * @throws InvalidRequestError if the boundary or a file part is missing
 */
export function extractUploadedFile(body: string, contentType: string): string {
  const boundaryMatch = /boundary=(?:"([^"]+)"|([^;]+))/i.exec(contentType);
  const boundary = boundaryMatch?.[1] ?? boundaryMatch?.[2];
  if (!boundary) {
    throw new InvalidRequestError('Multipart body has no boundary.');
  }

  const parts = body
    .split(`--${boundary.trim()}`)
    .map((part) => {
      const separator = /\r?\n\r?\n/.exec(part);
      if (!separator) {
        return null;
      }
      return {
        headers: part.slice(0, separator.index),
        content: part.slice(separator.index + separator[0].length).replace(/\r?\n$/, ''),
      };
    })
    .filter((part): part is { headers: string; content: string } => part !== null);

  const filePart =
    parts.find((part) => /name="file"/i.test(part.headers)) ??
    parts.find((part) => /filename="/i.test(part.headers));
  if (!filePart) {
    throw new InvalidRequestError('Multipart body has no file part.');
  }
  return filePart.content;
}

/**
 * Turn an API Gateway event into a run request
 *
 * @throws InvalidDateWindowError if from_date / to_date are malformed
 * @throws InvalidRequestError if no identifier file was uploaded
 */
export function parseRunRequest(event: APIGatewayProxyEventV2): RunRequest {
  const query = event.queryStringParameters ?? {};
  const window = parseDateWindow({ from: query.from_date, to: query.to_date });

  const body = decodeBody(event);
  if (body.trim() === '') {
    throw new InvalidRequestError('An identifier file is required.');
  }

  const contentType = event.headers?.['content-type'] ?? event.headers?.['Content-Type'] ?? '';
  const fileText = /^multipart\/form-data/i.test(contentType)
    ? extractUploadedFile(body, contentType)
    : body;

  return { identifiers: parseIdentifierList(fileText), window };
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Dependencies of the HTTP handler
 */
export interface ApiHandlerDependencies {
  getOrchestrator: () => Promise<Orchestrator>;
  getServiceName: () => string;
}

function jsonResponse(statusCode: number, body: unknown): APIGatewayProxyStructuredResultV2 {
  return {
    statusCode,
    headers: { ...CORS_HEADERS, 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

/**
 * Archive the chats listed in the request
 */
async function handleProcessMessages(
  event: APIGatewayProxyEventV2,
  dependencies: ApiHandlerDependencies
): Promise<APIGatewayProxyStructuredResultV2> {
  const { identifiers, window } = parseRunRequest(event);
  const orchestrator = await dependencies.getOrchestrator();

  const outcomes = await orchestrator.run(identifiers, window);
  console.log(formatSummaryLine(outcomes));
  return jsonResponse(200, summarize(outcomes));
}

/**
 * Create the API Gateway handler over the given dependencies
 */
export function createApiHandler(
  dependencies: ApiHandlerDependencies
): (event: APIGatewayProxyEventV2) => Promise<APIGatewayProxyStructuredResultV2> {
  return async (event) => {
    const method = event.requestContext.http.method.toUpperCase();
    const path = event.rawPath.replace(/\/+$/, '') || '/';
    console.log('Received request:', method, path);

    try {
      if (method === 'OPTIONS') {
        return { statusCode: 204, headers: CORS_HEADERS };
      }
      if (method === 'GET' && path === '/health') {
        const health: HealthResponse = { status: 'healthy', service: dependencies.getServiceName() };
        return jsonResponse(200, health);
      }
      if (method === 'POST' && path === '/process-messages') {
        return await handleProcessMessages(event, dependencies);
      }
      return jsonResponse(404, { error: 'Not found' });
    } catch (error) {
      const errorResponse = handleError(toError(error));
      return jsonResponse(getHttpStatusForError(error), { error: errorResponse.userMessage });
    }
  };
}

/**
 * Lambda handler function for API Gateway HTTP API requests
 */
export const handler = createApiHandler({ getOrchestrator, getServiceName: () => getServiceName() });
