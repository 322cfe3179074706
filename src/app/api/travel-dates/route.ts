import { NextRequest } from "next/server";
import { z } from "zod";
import { ok, handleApiError, parseJsonBody } from "@/lib/api-response";
import { getDefaultCatalog } from "@/lib/catalog";
import { MAX_TRIP_DURATION_DAYS } from "@/lib/planner/preferences";
import { describeBestMonths, optimizeTravelDates, resolveBestMonths } from "@/lib/seasons";

const travelDatesSchema = z.object({
  destination: z.string().trim().min(1),
  durationDays: z.number().int().min(1).max(MAX_TRIP_DURATION_DAYS),
  earliestStart: z.string(),
  latestStart: z.string(),
  maxResults: z.number().int().min(1).max(10).default(3),
});

export async function POST(request: NextRequest) {
  try {
    const { destination: name, ...query } = await parseJsonBody(request, travelDatesSchema);
    const destination = getDefaultCatalog().getDestinationByName(name);
    const suggestions = optimizeTravelDates({ destination, ...query });
    const bestMonths = resolveBestMonths(destination);

    return ok({
      destination: destination.name,
      bestMonths,
      bestTimeToVisit: describeBestMonths(bestMonths),
      suggestions,
    });
  } catch (error) {
    return handleApiError(error);
  }
}
