import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { ApiErrorResponse } from "@/lib/api-response";
import { diffInDays, formatShortDate } from "@/lib/format";
import { tripPreferencesSchema } from "@/lib/planner/preferences";
import type { Database, Json, Tables } from "@/types/database";

type SavedTripRow = Tables<"saved_trips">;

export const jsonValueSchema: z.ZodType<Json> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ])
);

const itinerarySnapshotSchema = z
  .object({
    destination: z.object({ name: z.string().min(1) }).passthrough(),
    trip: z
      .object({
        origin: z.string(),
        startDate: z.string(),
        endDate: z.string(),
        budget: z.number().positive(),
      })
      .passthrough(),
    dailyPlans: z.array(jsonValueSchema).min(1),
  })
  .passthrough();

function matchesDestinationName(requested: string, resolved: string) {
  const needle = requested.trim().toLowerCase();
  const fullName = resolved.toLowerCase();
  return needle === fullName || needle === fullName.split(",")[0].trim();
}

export const saveTripSchema = z
  .object({
    title: z.string().trim().min(1).max(120).optional(),
    preferences: tripPreferencesSchema,
    itinerary: itinerarySnapshotSchema,
  })
  .superRefine(({ preferences, itinerary }, ctx) => {
    if (!(diffInDays(preferences.startDate, preferences.endDate) >= 1)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["preferences", "endDate"],
        message: "End date must be after start date",
      });
    }
    if (!matchesDestinationName(preferences.destination, itinerary.destination.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["itinerary", "destination", "name"],
        message: "Itinerary is for a different destination",
      });
    }
  });

export type SaveTripInput = z.infer<typeof saveTripSchema>;

export const listTripsQuerySchema = z.object({
  limit: z
    .string()
    .transform((value) => Number.parseInt(value, 10))
    .pipe(z.number().int().min(1).max(50))
    .optional(),
});

export interface SavedTripSummary {
  id: string;
  title: string;
  origin: string;
  destination: string;
  startDate: string;
  endDate: string;
  budget: number;
  createdAt: string;
  updatedAt: string;
}

export interface SavedTrip extends SavedTripSummary {
  preferences: Json;
  itinerary: Json;
}

const SUMMARY_COLUMNS =
  "id, title, origin, destination, start_date, end_date, budget, created_at, updated_at";

export const DEFAULT_TRIP_LIST_LIMIT = 20;

export function defaultTripTitle(destination: string, startDate: string, endDate: string) {
  const city = destination.split(",")[0].trim();
  return `${city} trip, ${formatShortDate(startDate)} - ${formatShortDate(endDate)}`;
}

export async function listSavedTrips(
  supabase: SupabaseClient<Database>,
  options: { limit?: number } = {}
): Promise<SavedTripSummary[]> {
  const { data, error } = await supabase
    .from("saved_trips")
    .select(SUMMARY_COLUMNS)
    .order("created_at", { ascending: false })
    .limit(options.limit ?? DEFAULT_TRIP_LIST_LIMIT);

  if (error) {
    throw new ApiErrorResponse("Could not load saved trips.", 500, "db_query_error", error);
  }
  return (data ?? []).map(toSummary);
}

export async function saveTrip(
  supabase: SupabaseClient<Database>,
  userId: string,
  input: SaveTripInput
): Promise<SavedTrip> {
  const { preferences } = input;
  const insertPayload: Database["public"]["Tables"]["saved_trips"]["Insert"] = {
    user_id: userId,
    title: input.title ?? defaultTripTitle(input.itinerary.destination.name, preferences.startDate, preferences.endDate),
    origin: preferences.origin,
    destination: input.itinerary.destination.name,
    start_date: preferences.startDate,
    end_date: preferences.endDate,
    budget: preferences.budget.toFixed(2),
    preferences: jsonValueSchema.parse(JSON.parse(JSON.stringify(preferences))),
    itinerary: jsonValueSchema.parse(JSON.parse(JSON.stringify(input.itinerary))),
  };

  const { data, error } = await supabase
    .from("saved_trips")
    .insert(insertPayload)
    .select("*")
    .single();

  if (error || !data) {
    throw new ApiErrorResponse("Could not save the trip.", 500, "trip_insert_failed", error);
  }
  return toSavedTrip(data);
}

export async function getSavedTrip(
  supabase: SupabaseClient<Database>,
  tripId: string
): Promise<SavedTrip> {
  const { data, error } = await supabase
    .from("saved_trips")
    .select("*")
    .eq("id", tripId)
    .maybeSingle();

  if (error) {
    throw new ApiErrorResponse("Could not load the trip.", 500, "trip_query_failed", error);
  }
  if (!data) {
    throw new ApiErrorResponse("Trip not found.", 404, "trip_not_found");
  }
  return toSavedTrip(data);
}

export async function deleteSavedTrip(supabase: SupabaseClient<Database>, tripId: string) {
  const { data, error } = await supabase
    .from("saved_trips")
    .delete()
    .eq("id", tripId)
    .select("id");

  if (error) {
    throw new ApiErrorResponse("Could not delete the trip.", 500, "trip_delete_failed", error);
  }
  if (!data || data.length === 0) {
    throw new ApiErrorResponse("Trip not found.", 404, "trip_not_found");
  }
  return { id: tripId };
}

function toSummary(
  row: Pick<
    SavedTripRow,
    "id" | "title" | "origin" | "destination" | "start_date" | "end_date" | "budget" | "created_at" | "updated_at"
  >
): SavedTripSummary {
  return {
    id: row.id,
    title: row.title,
    origin: row.origin,
    destination: row.destination,
    startDate: row.start_date,
    endDate: row.end_date,
    budget: Number(row.budget),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toSavedTrip(row: SavedTripRow): SavedTrip {
  return {
    ...toSummary(row),
    preferences: row.preferences,
    itinerary: row.itinerary,
  };
}
