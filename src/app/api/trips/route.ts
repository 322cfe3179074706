import { NextRequest } from "next/server";
import { ok, handleApiError, parseJsonBody, parseSearchParams } from "@/lib/api-response";
import { requireAuthContext } from "@/lib/auth-helpers";
import {
  listSavedTrips,
  listTripsQuerySchema,
  saveTrip,
  saveTripSchema,
} from "@/lib/trips/repository";

export async function GET(request: NextRequest) {
  try {
    const { supabase } = await requireAuthContext();
    const { limit } = parseSearchParams(request.nextUrl.searchParams, listTripsQuerySchema);
    const trips = await listSavedTrips(supabase, { limit });

    return ok({ trips });
  } catch (error) {
    return handleApiError(error);
  }
}

export async function POST(request: NextRequest) {
  try {
    const { supabase, user } = await requireAuthContext();
    const input = await parseJsonBody(request, saveTripSchema);
    const trip = await saveTrip(supabase, user.id, input);

    return ok({ trip }, { status: 201 });
  } catch (error) {
    return handleApiError(error);
  }
}
