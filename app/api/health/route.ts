/**
 * Health check endpoint
 * GET /api/health
 */

import { NextResponse } from 'next/server';
import { initializeDatabase } from '@/src/lib/db/index';

export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    const db = await initializeDatabase();
    await db.query('SELECT 1');
    return NextResponse.json({
      status: 'healthy',
      database: db.driver,
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV || 'development',
    });
  } catch (error) {
    return NextResponse.json(
      {
        status: 'unhealthy',
        error: error instanceof Error ? error.message : 'Unknown error',
      },
      { status: 503 }
    );
  }
}
