import { z } from "zod";
import packingRulesData from "@/data/packing-rules.json";
import { PlanningError } from "@/lib/errors";
import { diffInDays } from "@/lib/format";
import { seasonOf } from "@/lib/seasons";
import {
  ACTIVITY_CATEGORIES,
  type ActivityCategory,
  type Destination,
  type Season,
} from "@/types/travel";

const packingItemSchema = z.object({
  name: z.string().min(1),
  quantity: z.number().int().positive().optional(),
  reason: z.string(),
});

const itemList = z.array(packingItemSchema);

const packingRulesSchema = z.object({
  maxClothingSets: z.number().int().positive(),
  essentials: itemList,
  clothingPerNight: itemList,
  clothingFixed: itemList,
  climate: z.object({ temperate: itemList, mediterranean: itemList, tropical: itemList }),
  season: z.object({ spring: itemList, summer: itemList, fall: itemList, winter: itemList }),
  activities: z.record(z.enum(ACTIVITY_CATEGORIES), itemList),
  health: itemList,
});

export type PackingItem = z.infer<typeof packingItemSchema>;
export type PackingRules = z.infer<typeof packingRulesSchema>;

export type PackingSectionTitle =
  | "Documents & Essentials"
  | "Clothing"
  | "Climate & Season"
  | "Activities"
  | "Health & Toiletries";

export interface PackingSection {
  title: PackingSectionTitle;
  items: PackingItem[];
}

export interface PackingList {
  destination: string;
  nights: number;
  season: Season;
  sections: PackingSection[];
  tips: string[];
}

export interface PackingListRequest {
  destination: Pick<
    Destination,
    "name" | "climate" | "hemisphere" | "currency" | "languages" | "localTransportation"
  >;
  startDate: string;
  endDate: string;
  activities: ActivityCategory[];
  travelers?: number;
}

let defaultRules: PackingRules | null = null;

export function getDefaultPackingRules() {
  if (!defaultRules) {
    defaultRules = packingRulesSchema.parse(packingRulesData);
  }
  return defaultRules;
}

export function parsePackingRules(raw: unknown) {
  return packingRulesSchema.parse(raw);
}

export function generatePackingList(
  request: PackingListRequest,
  rules: PackingRules = getDefaultPackingRules()
): PackingList {
  const { destination, startDate, endDate } = request;
  const nights = diffInDays(startDate, endDate);
  if (!Number.isFinite(nights) || nights < 0) {
    throw new PlanningError("invalid_dates", "End date must not be before start date");
  }

  const season = seasonOf(startDate, destination.hemisphere);
  const sets = Math.min(nights + 1, rules.maxClothingSets);
  const seen = new Set<string>();

  const take = (items: PackingItem[]) =>
    items.filter((item) => {
      const key = item.name.toLowerCase();
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });

  const sections: PackingSection[] = [
    { title: "Documents & Essentials", items: take(rules.essentials) },
    {
      title: "Clothing",
      items: take([
        ...rules.clothingPerNight.map((item) => ({ ...item, quantity: sets })),
        ...rules.clothingFixed,
      ]),
    },
    {
      title: "Climate & Season",
      items: take([...rules.climate[destination.climate], ...rules.season[season]]),
    },
    {
      title: "Activities",
      items: take(request.activities.flatMap((category) => rules.activities[category] ?? [])),
    },
    { title: "Health & Toiletries", items: take(rules.health) },
  ];

  const tips = [
    `Carry some cash in ${destination.currency}`,
    `Local languages: ${destination.languages.join(", ")}`,
    `Getting around: ${destination.localTransportation.join(", ")}`,
  ];
  if (nights + 1 > rules.maxClothingSets) {
    tips.push(
      `Plan a laundry stop: clothing is packed for ${rules.maxClothingSets} days, your trip is ${nights + 1}.`
    );
  }
  const travelers = request.travelers ?? 1;
  if (travelers > 1) {
    tips.push(`Quantities are per person; pack for ${travelers} travelers.`);
  }

  return {
    destination: destination.name,
    nights,
    season,
    sections: sections.filter((section) => section.items.length > 0),
    tips,
  };
}
