import { NextResponse } from 'next/server';
import { loadSettings } from '../../../../lib/config/env';
import { cookieInputSchema } from '../../../../lib/cookie/schema';
import { evaluateRaw } from '../../../../lib/cookie/service';
import { badRequest, invalidJson, readJson, storeErrorResponse } from '../../../../lib/api/responses';
import { withApiLogging } from '../../../../lib/log/with-api-logging';

export const runtime = 'nodejs';

async function postHandler(request: Request) {
  const json = await readJson(request);
  if (!json.ok) {
    return invalidJson();
  }
  const parsed = cookieInputSchema.safeParse(json.body);
  if (!parsed.success) {
    return badRequest(parsed.error);
  }
  try {
    const report = evaluateRaw(parsed.data.cookie, loadSettings());
    return NextResponse.json({ ok: true, report });
  } catch (error) {
    return storeErrorResponse('cookie_validate', error);
  }
}

export const POST = withApiLogging(postHandler, { routeId: 'cookie_validate' });
