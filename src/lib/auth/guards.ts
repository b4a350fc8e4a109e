/**
 * Access guards for admin routes
 */

import { NextResponse } from 'next/server';
import { isProduction, loadSettings } from '../../config/settings';

/**
 * Require ADMIN_API_TOKEN for protected routes
 * Returns error response if unauthorized, null if authorized
 */
export function requireAdminToken(authHeader: string | null): NextResponse | null {
  const settings = loadSettings();
  const adminToken = settings.ADMIN_API_TOKEN;

  // In production, token is required
  if (isProduction(settings) && !adminToken) {
    return NextResponse.json(
      { error: 'ADMIN_API_TOKEN not configured' },
      { status: 500 }
    );
  }

  if (adminToken && authHeader !== `Bearer ${adminToken}`) {
    return NextResponse.json(
      { error: 'Unauthorized' },
      { status: 401 }
    );
  }

  return null;
}
