export const REQUIRED_FIELDS = ['unb', '_m_h5_tk', 'cookie2', 'cna', 'sgcookie'] as const;

export const RECOMMENDED_FIELDS = ['x', 't', 'tracknick', 'XSRF-TOKEN'] as const;

// Checked in order; the first one present is shown as the account identity.
export const IDENTITY_FIELDS = ['unb', 'tracknick'] as const;

// Previewed by `validate`.
export const KEY_FIELDS = ['unb', '_m_h5_tk', 'cookie2', 'cna'] as const;

export const TOKEN_FIELD = '_m_h5_tk';
export const SESSION_FIELD = 'cookie2';

export const DEFAULT_FRESHNESS_HOURS = 24;

/** Every field name the redactor masks in free text. */
export function sensitiveFieldNames(): string[] {
  return [...REQUIRED_FIELDS, ...RECOMMENDED_FIELDS];
}
