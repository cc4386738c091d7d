import { randomUUID } from 'crypto';
import { NextResponse } from 'next/server';
import { appLogger } from './logger';
import { redactMeta } from './redact';
import { describeError, installGlobalErrorHooks } from './bootstrap-errors';

type Handler = (request: Request) => Promise<Response> | Response;

interface WithLoggingOptions {
  routeId: string;
}

export interface ApiRequestLogContext {
  reqId: string;
  routeId: string;
  clientIp?: string;
  userAgent?: string;
}

const requestContexts = new WeakMap<Request, ApiRequestLogContext>();

export function getRequestLogContext(request: Request): ApiRequestLogContext | undefined {
  return requestContexts.get(request);
}

function extractClientIp(request: Request): string | undefined {
  const forwarded = request.headers.get('x-forwarded-for');
  if (forwarded) {
    const [first] = forwarded.split(',');
    if (first) {
      return first.trim();
    }
  }
  return request.headers.get('x-real-ip')?.trim() || undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function buildJsonSummary(data: unknown): Record<string, unknown> | undefined {
  if (!isRecord(data)) {
    return undefined;
  }
  const result: Record<string, unknown> = {};
  if (typeof data.ok === 'boolean') {
    result.ok = data.ok;
  }
  if (typeof data.written === 'boolean') {
    result.written = data.written;
  }
  if (isRecord(data.report)) {
    if (typeof data.report.isComplete === 'boolean') {
      result.complete = data.report.isComplete;
    }
    if (typeof data.report.isFresh === 'boolean') {
      result.fresh = data.report.isFresh;
    }
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

async function extractResponseDetails(response: Response): Promise<{
  bytes?: number;
  summary?: Record<string, unknown>;
}> {
  try {
    const clone = response.clone();
    const text = await clone.text();
    const bytes = Buffer.byteLength(text);
    const contentType = clone.headers.get('content-type') ?? '';
    if (!contentType.includes('application/json')) {
      return { bytes };
    }
    try {
      return { bytes, summary: buildJsonSummary(JSON.parse(text)) };
    } catch {
      return { bytes };
    }
  } catch {
    return {};
  }
}

export function withApiLogging(handler: Handler, options: WithLoggingOptions): Handler {
  return async (request: Request) => {
    installGlobalErrorHooks('server');

    const reqId = request.headers.get('x-request-id') ?? randomUUID();
    const startedAt = Date.now();
    const url = new URL(request.url);
    const clientIp = extractClientIp(request);
    const userAgent = request.headers.get('user-agent') ?? undefined;
    requestContexts.set(request, { reqId, routeId: options.routeId, clientIp, userAgent });

    appLogger.info(
      'access_request',
      redactMeta({
        channel: 'server',
        reqId,
        method: request.method,
        path: url.pathname,
        route: options.routeId,
        ip: clientIp,
        ua: userAgent,
      }),
    );

    try {
      const response = await handler(request);
      response.headers.set('X-Request-Id', reqId);
      const { bytes, summary } = await extractResponseDetails(response);
      appLogger.info(
        'access_response',
        redactMeta({
          channel: 'server',
          reqId,
          route: options.routeId,
          status: response.status,
          duration_ms: Date.now() - startedAt,
          method: request.method,
          response_bytes: bytes,
          ...summary,
        }),
      );
      return response;
    } catch (error) {
      const { message, stack } = describeError(error);
      appLogger.error('access_error', message, {
        channel: 'server',
        reqId,
        route: options.routeId,
        status: 500,
        duration_ms: Date.now() - startedAt,
        stack,
      });
      const errorResponse = NextResponse.json({ ok: false, message: 'internal error' }, { status: 500 });
      errorResponse.headers.set('X-Request-Id', reqId);
      return errorResponse;
    }
  };
}
