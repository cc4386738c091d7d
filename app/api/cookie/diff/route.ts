import { NextResponse } from 'next/server';
import { loadSettings } from '../../../../lib/config/env';
import { cookieInputSchema } from '../../../../lib/cookie/schema';
import { diffAgainstStore, openStore } from '../../../../lib/cookie/service';
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
    const settings = loadSettings();
    const diff = await diffAgainstStore(openStore(settings), settings, parsed.data.cookie);
    return NextResponse.json({ ok: true, diff });
  } catch (error) {
    return storeErrorResponse('cookie_diff', error);
  }
}

export const POST = withApiLogging(postHandler, { routeId: 'cookie_diff' });
