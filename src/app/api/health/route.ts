import { getPlayRuntime } from "@/lib/server/runtime";
import { handleHealth, notConfiguredResponse } from "@/lib/server/playRoutes";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  const lookup = getPlayRuntime();
  if (!lookup.ok) {
    return notConfiguredResponse(lookup.error);
  }

  return handleHealth(lookup.runtime);
}
