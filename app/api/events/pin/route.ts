import { NextRequest, NextResponse } from "next/server";
import { errorMessage } from "@/lib/errors";
import { getEventStore } from "@/lib/storage/db";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

/** POST { id, pinned }: pin or unpin a stored event. */
export async function POST(req: NextRequest) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return NextResponse.json({ error: "Body must be JSON" }, { status: 400 });
  }
  if (
    body == null ||
    typeof body !== "object" ||
    !("id" in body) ||
    !("pinned" in body) ||
    typeof body.id !== "number" ||
    typeof body.pinned !== "boolean"
  ) {
    return NextResponse.json({ error: "Expected { id: number, pinned: boolean }" }, { status: 400 });
  }

  try {
    const updated = getEventStore().setPinned(body.id, body.pinned);
    if (!updated) {
      return NextResponse.json({ error: `Event ${body.id} not found` }, { status: 404 });
    }
    return NextResponse.json({ ok: true, id: body.id, pinned: body.pinned });
  } catch (e) {
    console.error("POST /api/events/pin error:", e);
    return NextResponse.json({ error: errorMessage(e) }, { status: 500 });
  }
}
