import { NextResponse } from "next/server";
import { describeOperators } from "@/lib/operators/registry";
import { toErrorResponse } from "@/lib/http-errors";

export async function GET() {
  try {
    return NextResponse.json({ operators: describeOperators() });
  } catch (error) {
    console.error("[api/operators] Error:", error);
    const { status, body } = toErrorResponse(error);
    return NextResponse.json(body, { status });
  }
}
