/**
 * Shared error-to-response mapping for route handlers
 */

import { NextResponse } from "next/server";
import { z } from "zod";
import { ProfileStoreUnavailableError, UnknownArticleError } from "../errors";
import { logger } from "../logger";

export function errorResponse(error: unknown, context: string): NextResponse {
  if (error instanceof z.ZodError) {
    return NextResponse.json(
      {
        success: false,
        error: "Invalid request",
        details: error.issues,
      },
      { status: 400 }
    );
  }

  if (error instanceof SyntaxError) {
    return NextResponse.json({ success: false, error: "Request body is not valid JSON" }, { status: 400 });
  }

  if (error instanceof UnknownArticleError) {
    return NextResponse.json({ success: false, error: error.message }, { status: 404 });
  }

  if (error instanceof ProfileStoreUnavailableError) {
    logger.error(`${context}: profile store unavailable`, error);
    return NextResponse.json(
      { success: false, error: "Profile store unavailable" },
      { status: 503 }
    );
  }

  logger.error(context, error);
  return NextResponse.json(
    {
      success: false,
      error: error instanceof Error ? error.message : "Unknown error",
    },
    { status: 500 }
  );
}

export const UserIdSchema = z.string().trim().min(1).max(128);
