import { NextResponse } from 'next/server';
import { loadSettings } from '../../../../lib/config/env';
import { cookieUpdateSchema } from '../../../../lib/cookie/schema';
import { openStore, updateStoredCookie } from '../../../../lib/cookie/service';
import { badRequest, invalidJson, readJson, storeErrorResponse } from '../../../../lib/api/responses';
import { appLogger } from '../../../../lib/log/logger';
import { getRequestLogContext, withApiLogging } from '../../../../lib/log/with-api-logging';

export const runtime = 'nodejs';

async function postHandler(request: Request) {
  const json = await readJson(request);
  if (!json.ok) {
    return invalidJson();
  }
  const parsed = cookieUpdateSchema.safeParse(json.body);
  if (!parsed.success) {
    return badRequest(parsed.error);
  }

  const reqId = getRequestLogContext(request)?.reqId;
  try {
    const settings = loadSettings();
    const outcome = await updateStoredCookie(openStore(settings), settings, parsed.data.cookie, {
      force: parsed.data.force,
      backup: parsed.data.backup,
    });
    if (outcome.status === 'incomplete') {
      appLogger.info('cookie_update_result', {
        reqId,
        status: 'incomplete',
        missing: outcome.report.missingRequired,
      });
      return NextResponse.json(
        { ok: false, error: 'cookie is missing required fields', report: outcome.report },
        { status: 422 },
      );
    }
    appLogger.info('cookie_update_result', {
      reqId,
      status: outcome.status,
      backupPath: outcome.result.backupPath,
      pruned: outcome.result.pruned,
    });
    return NextResponse.json({
      ok: true,
      written: outcome.result.written,
      backupPath: outcome.result.backupPath,
      report: outcome.report,
    });
  } catch (error) {
    return storeErrorResponse('cookie_update', error);
  }
}

export const POST = withApiLogging(postHandler, { routeId: 'cookie_update' });
