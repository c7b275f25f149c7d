/**
 * Admin Authentication Configuration
 */

/** Key required in X-API-Key for admin routes (empty = admin routes are open) */
export const ADMIN_API_KEY = process.env.ADMIN_API_KEY || '';

/** Route prefixes that require the admin key */
export const ADMIN_PREFIXES: string[] = ['/v1/admin'];
