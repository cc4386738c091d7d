import { NextResponse } from 'next/server';
import { loadSettings } from '../../../../lib/config/env';
import { evaluate } from '../../../../lib/cookie/evaluate';
import { loadStoredCookie, openStore } from '../../../../lib/cookie/service';
import { storeErrorResponse } from '../../../../lib/api/responses';
import { withApiLogging } from '../../../../lib/log/with-api-logging';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

async function getHandler() {
  try {
    const settings = loadSettings();
    const store = openStore(settings);
    const stored = await loadStoredCookie(store, settings.storeKey);
    if (!stored) {
      return NextResponse.json(
        { ok: false, error: `No ${settings.storeKey} entry in store`, location: store.location },
        { status: 404 },
      );
    }
    const report = evaluate(stored, new Date(), settings.freshnessHours);
    return NextResponse.json({ ok: true, report, location: store.location });
  } catch (error) {
    return storeErrorResponse('cookie_status', error);
  }
}

export const GET = withApiLogging(getHandler, { routeId: 'cookie_status' });
