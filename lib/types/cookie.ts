export type CookieFields = Readonly<Record<string, string>>;

export interface CookieSet {
  readonly fields: CookieFields;
  readonly observedAt?: Date;
  /** Raw input the set was built from. Diagnostics only. */
  readonly sourceRaw: string;
}

export type HealthGrade = 'good' | 'fair' | 'poor';

export interface CookieIdentity {
  field: string;
  value: string;
}

export interface StatusReport {
  fieldCount: number;
  isComplete: boolean;
  missingRequired: string[];
  missingRecommended: string[];
  isFresh: boolean;
  ageHours?: number;
  identity?: CookieIdentity;
  hasToken: boolean;
  hasSession: boolean;
  healthScore: number;
  healthGrade: HealthGrade;
  evaluatedAt: string;
}

export interface CookieDiff {
  unchanged: boolean;
  added: string[];
  removed: string[];
  changed: string[];
  text: string;
}
