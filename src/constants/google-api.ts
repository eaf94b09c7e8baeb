/**
 * Google API Constants
 *
 * Centralized collection of Google OAuth endpoints and Workspace scopes.
 */

// ============================================================================
// Workspace OAuth Scopes
// ============================================================================

const SCOPE_PREFIX = 'https://www.googleapis.com/auth/';

/**
 * Read/write access to spreadsheets
 */
export const SHEETS_SCOPE = `${SCOPE_PREFIX}spreadsheets`;

/**
 * Read/write access to documents
 */
export const DOCS_SCOPE = `${SCOPE_PREFIX}documents`;

/**
 * Full Drive access (folders, uploads, downloads, metadata)
 */
export const DRIVE_SCOPE = `${SCOPE_PREFIX}drive`;

/**
 * Read/write access to presentations
 */
export const SLIDES_SCOPE = `${SCOPE_PREFIX}presentations`;

export const CALENDAR_SCOPE = `${SCOPE_PREFIX}calendar`;

export const CHAT_SCOPE = `${SCOPE_PREFIX}chat.messages`;

// ============================================================================
// Google OAuth Endpoints
// ============================================================================

/**
 * Token revocation endpoint, used on sign-out
 */
export const GOOGLE_REVOKE_URL = 'https://oauth2.googleapis.com/revoke';

/**
 * Google account permissions page
 * Users can manually revoke app access here
 */
export const GOOGLE_PERMISSIONS_URL = 'https://myaccount.google.com/permissions';

/**
 * Access token lifetime assumed when the token endpoint omits expires_in
 */
export const DEFAULT_TOKEN_LIFETIME_MS = 3600 * 1000;
