import type { CookieIdentity, CookieSet, HealthGrade, StatusReport } from '../types/cookie';
import {
  DEFAULT_FRESHNESS_HOURS,
  IDENTITY_FIELDS,
  RECOMMENDED_FIELDS,
  REQUIRED_FIELDS,
  SESSION_FIELD,
  TOKEN_FIELD,
} from './fields';

const MS_PER_HOUR = 3_600_000;

/**
 * A field counts as present only when its key exists and its value is not
 * blank. `unb=` is therefore reported as missing.
 */
export function hasField(set: CookieSet, name: string): boolean {
  const value = set.fields[name];
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * The H5 token is `<token>_<epoch millis>`; the second segment is when it
 * was issued.
 */
export function tokenIssuedAt(set: CookieSet): Date | undefined {
  const token = set.fields[TOKEN_FIELD];
  if (!token) {
    return undefined;
  }
  const [, stamp] = token.split('_');
  if (!stamp || !/^\d+$/.test(stamp)) {
    return undefined;
  }
  const issued = new Date(Number(stamp));
  return Number.isNaN(issued.getTime()) ? undefined : issued;
}

function findIdentity(set: CookieSet): CookieIdentity | undefined {
  for (const field of IDENTITY_FIELDS) {
    if (hasField(set, field)) {
      return { field, value: set.fields[field] };
    }
  }
  return undefined;
}

interface HealthInput {
  isComplete: boolean;
  missingRequired: string[];
  isFresh: boolean;
  ageHours?: number;
  hasToken: boolean;
  hasSession: boolean;
}

export function computeHealthScore(input: HealthInput): number {
  let score = input.isComplete ? 40 : Math.max(0, 40 - input.missingRequired.length * 10);

  if (input.isFresh) {
    score += 30;
  } else if (input.ageHours !== undefined) {
    if (input.ageHours < 48) {
      score += 20;
    } else if (input.ageHours < 72) {
      score += 10;
    }
  }

  if (input.hasToken) {
    score += 15;
  }
  if (input.hasSession) {
    score += 15;
  }
  return Math.min(100, score);
}

export function gradeHealth(score: number): HealthGrade {
  if (score >= 80) {
    return 'good';
  }
  if (score >= 60) {
    return 'fair';
  }
  return 'poor';
}

/**
 * Pure status computation. Unknown age is reported as stale.
 */
export function evaluate(
  set: CookieSet,
  now: Date,
  freshnessThresholdHours: number = DEFAULT_FRESHNESS_HOURS,
): StatusReport {
  const missingRequired = REQUIRED_FIELDS.filter((field) => !hasField(set, field));
  const missingRecommended = RECOMMENDED_FIELDS.filter((field) => !hasField(set, field));
  const ageMs = set.observedAt ? now.getTime() - set.observedAt.getTime() : Number.NaN;
  const ageHours = Number.isNaN(ageMs) ? undefined : ageMs / MS_PER_HOUR;
  // strictly below the threshold: exactly 24h old is stale
  const isFresh = ageHours !== undefined && ageHours < freshnessThresholdHours;
  const isComplete = missingRequired.length === 0;
  const hasToken = hasField(set, TOKEN_FIELD);
  const hasSession = hasField(set, SESSION_FIELD);
  const healthScore = computeHealthScore({
    isComplete,
    missingRequired,
    isFresh,
    ageHours,
    hasToken,
    hasSession,
  });

  const report: StatusReport = {
    fieldCount: Object.keys(set.fields).length,
    isComplete,
    missingRequired,
    missingRecommended,
    isFresh,
    hasToken,
    hasSession,
    healthScore,
    healthGrade: gradeHealth(healthScore),
    evaluatedAt: Number.isNaN(now.getTime()) ? '' : now.toISOString(),
  };
  if (ageHours !== undefined) {
    report.ageHours = ageHours;
  }
  const identity = findIdentity(set);
  if (identity) {
    report.identity = identity;
  }
  return report;
}
