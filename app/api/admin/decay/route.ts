/**
 * POST /api/admin/decay
 * Runs the decay sweep over all profiles. Requires the admin bearer token.
 */

import { NextRequest, NextResponse } from "next/server";
import { requireAdminToken } from "@/src/lib/auth/guards";
import { errorResponse } from "@/src/lib/api/responses";
import { getPersonalizationService } from "@/src/lib/personalization/context";

export const dynamic = "force-dynamic";

export async function POST(request: NextRequest) {
  try {
    const unauthorized = requireAdminToken(request.headers.get("authorization"));
    if (unauthorized) return unauthorized;

    const service = await getPersonalizationService();
    const report = await service.decayProfiles();

    return NextResponse.json({ success: true, report });
  } catch (error) {
    return errorResponse(error, "[DECAY] Sweep failed");
  }
}
