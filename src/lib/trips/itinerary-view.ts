import { z } from "zod";
import { ACTIVITY_CATEGORIES } from "@/types/travel";

const activitySlotSchema = z.object({
  activityId: z.number().nullable(),
  name: z.string().nullable(),
  category: z.enum(ACTIVITY_CATEGORIES).nullable(),
  description: z.string(),
  cost: z.number(),
});

/**
 * The parts of a stored itinerary the saved-trip page renders. Older or
 * hand-edited rows that do not match are shown without the day plan.
 */
export const storedItineraryViewSchema = z.object({
  overview: z.string(),
  dailyPlans: z.array(
    z.object({
      day: z.number().int(),
      date: z.string(),
      title: z.string(),
      morning: activitySlotSchema,
      afternoon: activitySlotSchema,
      evening: activitySlotSchema,
      totalCost: z.number(),
    })
  ),
  budgetBreakdown: z.object({
    transportation: z.number(),
    accommodation: z.number(),
    activities: z.number(),
    food: z.number(),
    miscellaneous: z.number(),
  }),
});

export type StoredItineraryView = z.infer<typeof storedItineraryViewSchema>;
