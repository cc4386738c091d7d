import { NextResponse } from 'next/server';
import type { ZodError } from 'zod';
import { ConfigurationError, StoreAccessError, StoreValueError } from '../errors';
import { appLogger } from '../log/logger';

export function badRequest(error: ZodError): NextResponse {
  return NextResponse.json({ ok: false, error: error.flatten() }, { status: 400 });
}

export async function readJson(request: Request): Promise<{ ok: true; body: unknown } | { ok: false }> {
  try {
    return { ok: true, body: await request.json() };
  } catch {
    return { ok: false };
  }
}

export function invalidJson(): NextResponse {
  return NextResponse.json({ ok: false, error: 'request body must be JSON' }, { status: 400 });
}

/** Maps store, value and configuration failures to JSON errors; anything else is rethrown. */
export function storeErrorResponse(routeId: string, error: unknown): NextResponse {
  if (error instanceof StoreAccessError) {
    appLogger.warn(`${routeId}_store_error`, error.message, { operation: error.operation, status: error.status });
    return NextResponse.json({ ok: false, error: error.message }, { status: error.status });
  }
  if (error instanceof StoreValueError) {
    appLogger.warn(`${routeId}_value_rejected`, error.message, { key: error.key });
    return NextResponse.json({ ok: false, error: error.message }, { status: error.status });
  }
  if (error instanceof ConfigurationError) {
    appLogger.error(`${routeId}_config_error`, error.message, { variable: error.variable });
    return NextResponse.json({ ok: false, error: error.message }, { status: 500 });
  }
  throw error;
}
