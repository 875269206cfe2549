/**
 * POST /api/spell/v1/check
 *
 * Example:
 *   curl -X POST http://localhost:3000/api/spell/v1/check \
 *     -H 'Content-Type: application/json' \
 *     -d '{"text":"I woud like an aple.","maxSuggestions":3}'
 */

import { NextResponse } from "next/server";
import { getSharedCorrector } from "@/lib/spell/bridge";
import { findMisspellings } from "@/lib/spell/check-text";

const MAX_SUGGESTIONS_LIMIT = 20;

function badRequest(reason: string) {
  return NextResponse.json({ error: reason }, {
    status: 400,
    headers: { "Cache-Control": "no-store" }
  });
}

function readMaxSuggestions(value: unknown): number | null {
  if (value === undefined) return 5;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) return null;
  return Math.min(value, MAX_SUGGESTIONS_LIMIT);
}

export async function POST(req: Request) {
  try {
    const contentType = req.headers.get("content-type") || "";
    if (!contentType.includes("application/json")) {
      return badRequest("Expected application/json body");
    }

    const body: unknown = await req.json().catch(() => null);
    if (!body || typeof body !== "object") {
      return badRequest("Invalid JSON body");
    }

    const text = "text" in body && typeof body.text === "string" ? body.text : "";
    if (!text.trim()) {
      return badRequest("Field 'text' is required and must be a non-empty string");
    }

    const maxSuggestions = readMaxSuggestions("maxSuggestions" in body ? body.maxSuggestions : undefined);
    if (maxSuggestions === null) {
      return badRequest("Field 'maxSuggestions' must be a positive integer");
    }

    const corrector = await getSharedCorrector();
    const matches = findMisspellings(corrector, text, { maxSuggestions });

    return NextResponse.json({ matches }, {
      status: 200,
      headers: { "Cache-Control": "no-store" },
    });
  } catch (err: unknown) {
    const message = err instanceof Error && err.message ? err.message : "Unexpected error";
    console.warn("[spell] check failed:", message);
    return NextResponse.json({ error: message }, {
      status: 500,
      headers: { "Cache-Control": "no-store" },
    });
  }
}
