import { NextRequest } from "next/server";
import { z } from "zod";
import { ok, handleApiError, parseSearchParams } from "@/lib/api-response";
import { getDefaultCatalog } from "@/lib/catalog";
import {
  destinationFilterSchema,
  filterDestinations,
  summarizeDestination,
} from "@/lib/destinations/filter";

function splitList(value: string | string[]) {
  return (Array.isArray(value) ? value : [value])
    .flatMap((entry) => entry.split(","))
    .map((entry) => entry.trim())
    .filter(Boolean);
}

const listParam = z.union([z.string(), z.array(z.string())]).transform(splitList);
const numberParam = z.string().trim().min(1).transform(Number);

// ?region=Europe,Asia&interest=Shopping&maxCostLevel=3&month=5
const destinationsQuerySchema = z
  .object({
    query: z.string().optional(),
    region: listParam.optional(),
    climate: listParam.optional(),
    interest: listParam.optional(),
    maxCostLevel: numberParam.optional(),
    maxDailyCost: numberParam.optional(),
    month: numberParam.optional(),
  })
  .transform((query) => ({
    query: query.query,
    regions: query.region,
    climates: query.climate,
    interests: query.interest,
    maxCostLevel: query.maxCostLevel,
    maxDailyCost: query.maxDailyCost,
    travelMonth: query.month,
  }))
  .pipe(destinationFilterSchema);

export async function GET(request: NextRequest) {
  try {
    const criteria = parseSearchParams(request.nextUrl.searchParams, destinationsQuerySchema);
    const catalog = getDefaultCatalog();
    const destinations = filterDestinations(catalog, criteria).map((destination) =>
      summarizeDestination(destination)
    );

    return ok({
      destinations,
      total: destinations.length,
      regions: catalog.listRegions(),
    });
  } catch (error) {
    return handleApiError(error);
  }
}
