import { NextRequest } from "next/server";
import { z } from "zod";
import { ok, handleApiError, parseJsonBody } from "@/lib/api-response";
import { getDefaultCatalog } from "@/lib/catalog";
import { isIsoDate } from "@/lib/format";
import { generatePackingList } from "@/lib/packing";
import { ACTIVITY_CATEGORIES } from "@/types/travel";

const isoDate = z.string().refine(isIsoDate, "Use the YYYY-MM-DD format");

const packingListSchema = z.object({
  destination: z.string().trim().min(1),
  startDate: isoDate,
  endDate: isoDate,
  activities: z.array(z.enum(ACTIVITY_CATEGORIES)).default([]),
  travelers: z.number().int().min(1).max(20).optional(),
});

export async function POST(request: NextRequest) {
  try {
    const { destination, ...rest } = await parseJsonBody(request, packingListSchema);
    const match = getDefaultCatalog().getDestinationByName(destination);
    const packingList = generatePackingList({ destination: match, ...rest });

    return ok({ packingList });
  } catch (error) {
    return handleApiError(error);
  }
}
