/**
 * GET /api/health
 *
 * Liveness probe. Returns HTTP 200 while the service is running.
 * No authentication required and no vault access.
 */

import { NextResponse } from "next/server";

export async function GET(): Promise<NextResponse> {
  return NextResponse.json({ status: "ok", service: "linkweave" });
}
