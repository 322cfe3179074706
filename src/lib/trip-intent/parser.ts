import { z } from "zod";
import aliasData from "@/data/destination-aliases.json";
import { getDefaultCatalog, type TravelCatalog } from "@/lib/catalog";
import { addDays, diffInDays, isIsoDate, toIsoDate } from "@/lib/format";
import {
  ACTIVITY_CATEGORIES,
  type ActivityCategory,
  type TripPreferences,
} from "@/types/travel";
import type {
  TripIntentBudget,
  TripIntentDateRange,
  TripIntentDraft,
  TripIntentFieldKey,
  TripIntentSource,
  TripIntentTravelParty,
} from "@/types/trip-intent";

const destinationAliases = z.record(z.string(), z.array(z.string())).parse(aliasData);

const preferenceKeywords: Array<{ category: ActivityCategory; keywords: RegExp[] }> = [
  {
    category: "Cultural & Historical",
    keywords: [/\bmuseums?\b/, /\bhistor(?:y|ic|ical)\b/, /\bcultur(?:e|al)\b/, /\bart\b/, /\bgaller(?:y|ies)\b/, /\btemples?\b/, /\barchitecture\b/],
  },
  {
    category: "Outdoor & Adventure",
    keywords: [/\bhik(?:e|es|ing)\b/, /\boutdoors?\b/, /\badventur(?:e|es|ous)\b/, /\bnature\b/, /\bbeach(?:es)?\b/, /\bsurf(?:ing)?\b/, /\bmountains?\b/, /\bdiving\b/],
  },
  {
    category: "Food & Culinary",
    keywords: [/\bfood(?:ie)?\b/, /\bcuisine\b/, /\beat(?:ing)?\b/, /\brestaurants?\b/, /\bculinary\b/, /\bcooking\b/, /\bwine\b/],
  },
  {
    category: "Relaxation & Wellness",
    keywords: [/\brelax(?:ing|ation)?\b/, /\bspas?\b/, /\bwellness\b/, /\byoga\b/, /\bmassages?\b/, /\bchill\b/],
  },
  {
    category: "Shopping",
    keywords: [/\bshop(?:s|ping)?\b/, /\bmarkets?\b/, /\bboutiques?\b/, /\bsouvenirs?\b/],
  },
  {
    category: "Entertainment",
    keywords: [/\bnightlife\b/, /\bbars?\b/, /\bclubs?\b/, /\bshows?\b/, /\bconcerts?\b/, /\btheat(?:er|re)s?\b/, /\blive music\b/],
  },
  {
    category: "Sightseeing",
    keywords: [/\bsightseeing\b/, /\blandmarks?\b/, /\bsights\b/, /\btours?\b/, /\bviews?\b/, /\bphotography\b/],
  },
];

const currencySymbols: Record<string, string> = {
  $: "USD",
  "€": "EUR",
  "£": "GBP",
  "¥": "JPY",
};

const currencyWords: Record<string, string> = {
  usd: "USD",
  dollar: "USD",
  dollars: "USD",
  bucks: "USD",
  eur: "EUR",
  euro: "EUR",
  euros: "EUR",
  gbp: "GBP",
  pound: "GBP",
  pounds: "GBP",
  jpy: "JPY",
  yen: "JPY",
};

const numberWords: Record<string, number> = {
  a: 1,
  an: 1,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
};

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];
const monthWord =
  "(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)";
const countWord = "(\\d+|one|two|three|four|five|six|seven|eight|nine|ten|eleven|twelve)";
const amountPattern = "(\\d{1,3}(?:,\\d{3})+(?:\\.\\d+)?|\\d+(?:\\.\\d+)?)";
const currencyWordPattern = "(usd|dollars?|bucks|eur|euros?|gbp|pounds?|jpy|yen)";

const isoDateRegex = /\b(\d{4})-(\d{2})-(\d{2})\b/g;
const monthDayRegex = new RegExp(
  `\\b${monthWord}\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?\\b(?:,?\\s+(\\d{4})\\b)?`,
  "gi"
);
const dayMonthRegex = new RegExp(
  `\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+(?:of\\s+)?${monthWord}\\b\\.?(?:,?\\s+(\\d{4})\\b)?`,
  "gi"
);
const durationRegex = new RegExp(
  `\\b(\\d+|a|an|one|two|three|four|five|six|seven|eight|nine|ten|eleven|twelve)[\\s-]+(day|night|week)s?\\b`,
  "i"
);
const budgetKeywordRegex = new RegExp(
  `\\b(?:budget|spend(?:ing)?)\\b(?:\\s+(?:of|is|around|about|roughly|under|up\\s+to|max(?:imum)?))*\\s*[:~]?\\s*([$€£¥])?\\s*${amountPattern}\\s*(k\\b)?\\s*${currencyWordPattern}?\\b`,
  "i"
);
const budgetSymbolRegex = new RegExp(`([$€£¥])\\s*${amountPattern}\\s*(k\\b)?`, "i");
const budgetCurrencyRegex = new RegExp(
  `${amountPattern}\\s*(k\\b)?\\s*${currencyWordPattern}\\b`,
  "i"
);
const originRegex =
  /\b(?:from|leaving|departing(?:\s+from)?)\s+([A-Za-z][A-Za-z.'-]*(?:\s+[A-Za-z][A-Za-z.'-]*){0,3}?)(?=\s*(?:$|[,;!?]|\.(?:\s|$))|\s+(?:to|on|in|for|and|with|next|this|around|between|budget)\b)/gi;
const destinationFragmentRegex =
  /\b(?:to|in|visit(?:ing)?|explor(?:e|ing))\s+([A-Z][\w'-]*(?:\s+[A-Z][\w'-]*)*)/g;
const notPlaceWords = new RegExp(
  `^(?:${monthWord}|monday|tuesday|wednesday|thursday|friday|saturday|sunday|i|today|tomorrow|the|next|this)$`,
  "i"
);

const fieldWeights: Record<TripIntentFieldKey, number> = {
  destination: 0.25,
  date: 0.2,
  budget: 0.2,
  travelers: 0.2,
  preferences: 0.15,
};

export interface ParseTripIntentOptions {
  source?: TripIntentSource;
  /** Reference point for dates written without a year. */
  now?: Date;
  catalog?: TravelCatalog;
}

export function parseTripIntent(rawInput: string, options?: ParseTripIntentOptions): TripIntentDraft {
  const normalized = rawInput?.trim() ?? "";
  if (!normalized) {
    throw new Error("Cannot parse an empty trip description.");
  }

  const now = options?.now ?? new Date();
  const catalog = options?.catalog ?? getDefaultCatalog();
  const cleaned = normalized.replace(/\s+/g, " ");

  const origin = extractOrigin(cleaned);
  const withoutOrigin = origin
    ? `${cleaned.slice(0, origin.start)}${" ".repeat(origin.value.length)}${cleaned.slice(origin.start + origin.value.length)}`
    : cleaned;

  const { destinations, unmatchedDestinations } = extractDestinations(withoutOrigin, catalog);
  const dateRange = extractDateRange(cleaned, now);
  const budget = extractBudget(cleaned);
  const travelParty = extractTravelParty(cleaned);
  const lower = cleaned.toLowerCase();
  const preferences = extractPreferences(lower);

  const fieldConfidences: Record<TripIntentFieldKey, number> = {
    destination: destinations.length > 0 ? 0.85 : unmatchedDestinations.length > 0 ? 0.4 : 0,
    date:
      dateRange?.startDate || dateRange?.endDate || dateRange?.durationDays
        ? computeDateConfidence(dateRange)
        : 0,
    budget: budget ? 0.8 : 0,
    travelers:
      travelParty?.total || travelParty?.hasKids ? computeTravelerConfidence(travelParty) : 0,
    preferences: preferences.length > 0 ? Math.min(0.6 + preferences.length * 0.08, 0.9) : 0,
  };

  const fieldKeys: TripIntentFieldKey[] = ["destination", "date", "budget", "travelers", "preferences"];
  const confidence = fieldKeys.reduce(
    (sum, key) => sum + fieldConfidences[key] * fieldWeights[key],
    0
  );

  return {
    id: generateDraftId(),
    source: options?.source ?? "text",
    rawInput: cleaned,
    destinations,
    unmatchedDestinations,
    origin: origin?.value,
    dateRange,
    budget,
    travelParty,
    preferences,
    transportation: extractTransportation(lower),
    accommodation: extractAccommodation(lower),
    confidence: Number(confidence.toFixed(3)),
    fieldConfidences,
    createdAt: now.toISOString(),
  };
}

/**
 * Fills trip preferences from a parsed draft, keeping `defaults` for
 * anything the text did not mention.
 */
export function intentToPreferences(draft: TripIntentDraft, defaults: TripPreferences): TripPreferences {
  const startDate = draft.dateRange?.startDate ?? defaults.startDate;
  let endDate = draft.dateRange?.endDate ?? defaults.endDate;
  if (!draft.dateRange?.endDate && draft.dateRange?.durationDays && isIsoDate(startDate)) {
    endDate = addDays(startDate, draft.dateRange.durationDays);
  }

  return {
    ...defaults,
    origin: draft.origin ?? defaults.origin,
    destination: draft.destinations[0] ?? defaults.destination,
    startDate,
    endDate,
    budget: draft.budget?.amount ?? defaults.budget,
    travelers: draft.travelParty?.total ?? defaults.travelers,
    transportation: draft.transportation ?? defaults.transportation,
    accommodation: draft.accommodation ?? defaults.accommodation,
    activities: draft.preferences.length > 0 ? draft.preferences : defaults.activities,
  };
}

export function collectMissingFields(intent: {
  destinations: string[];
  dateRange?: { startDate?: string; endDate?: string; durationDays?: number | null };
  budget?: { amount?: number | null };
  travelParty?: { total?: number | null };
  preferences: string[];
}): TripIntentFieldKey[] {
  const missing: TripIntentFieldKey[] = [];
  if (!intent.destinations.length) {
    missing.push("destination");
  }
  if (
    !intent.dateRange?.startDate &&
    !intent.dateRange?.endDate &&
    !intent.dateRange?.durationDays
  ) {
    missing.push("date");
  }
  if (!intent.budget?.amount) {
    missing.push("budget");
  }
  if (!intent.travelParty?.total) {
    missing.push("travelers");
  }
  if (!intent.preferences.length) {
    missing.push("preferences");
  }
  return missing;
}

function extractOrigin(text: string) {
  for (const match of text.matchAll(originRegex)) {
    const value = match[1].replace(/\.$/, "");
    const firstWord = value.split(" ")[0];
    if (notPlaceWords.test(firstWord)) {
      continue;
    }
    return {
      value,
      start: (match.index ?? 0) + match[0].length - match[1].length,
    };
  }
  return undefined;
}

function extractDestinations(text: string, catalog: TravelCatalog) {
  const lower = text.toLowerCase();
  const aliasIndex = new Map<string, string>();
  for (const name of catalog.listDestinationNames()) {
    const aliases = [name, name.split(",")[0], ...(destinationAliases[name] ?? [])];
    for (const alias of aliases) {
      aliasIndex.set(alias.trim().toLowerCase(), name);
    }
  }

  const found = new Map<string, number>();
  const remember = (name: string, position: number) => {
    const existing = found.get(name);
    if (existing === undefined || position < existing) {
      found.set(name, position);
    }
  };

  for (const [alias, name] of aliasIndex) {
    const position = lower.search(new RegExp(`(?<![a-z])${escapeRegExp(alias)}(?![a-z])`));
    if (position !== -1) {
      remember(name, position);
    }
  }

  const unmatched: string[] = [];
  for (const match of text.matchAll(destinationFragmentRegex)) {
    const fragment = match[1].trim();
    if (notPlaceWords.test(fragment.split(" ")[0])) {
      continue;
    }
    const name = aliasIndex.get(fragment.toLowerCase()) ?? catalog.findDestination(fragment)?.name;
    if (name) {
      remember(name, match.index ?? 0);
    } else if (!unmatched.includes(fragment)) {
      unmatched.push(fragment);
    }
  }

  const destinations = [...found.entries()]
    .sort((a, b) => a[1] - b[1])
    .map(([name]) => name);
  return { destinations, unmatchedDestinations: unmatched };
}

interface DateMention {
  index: number;
  end: number;
  year?: number;
  month: number;
  day: number;
}

function extractDateRange(text: string, now: Date): TripIntentDateRange | undefined {
  const mentions: DateMention[] = [];

  for (const match of text.matchAll(isoDateRegex)) {
    mentions.push({
      index: match.index ?? 0,
      end: (match.index ?? 0) + match[0].length,
      year: Number(match[1]),
      month: Number(match[2]),
      day: Number(match[3]),
    });
  }
  for (const match of text.matchAll(monthDayRegex)) {
    mentions.push({
      index: match.index ?? 0,
      end: (match.index ?? 0) + match[0].length,
      month: monthNumber(match[1]),
      day: Number(match[2]),
      year: match[3] ? Number(match[3]) : undefined,
    });
  }
  for (const match of text.matchAll(dayMonthRegex)) {
    mentions.push({
      index: match.index ?? 0,
      end: (match.index ?? 0) + match[0].length,
      day: Number(match[1]),
      month: monthNumber(match[2]),
      year: match[3] ? Number(match[3]) : undefined,
    });
  }

  mentions.sort((a, b) => a.index - b.index);

  const today = toIsoDate(now);
  const dates: string[] = [];
  let lastEnd = -1;
  for (const mention of mentions) {
    if (mention.index < lastEnd) continue;
    lastEnd = mention.end;

    const previous = dates[dates.length - 1];
    const resolved = resolveMentionDate(mention, previous, today, now.getUTCFullYear());
    if (resolved) {
      dates.push(resolved);
    }
  }

  const durationDays = extractDuration(text);

  if (dates.length === 0 && !durationDays) {
    return undefined;
  }

  if (dates.length >= 2) {
    const [startDate, endDate] = normalizeDateOrder(dates[0], dates[1]);
    return {
      startDate,
      endDate,
      durationDays: durationDays ?? diffInDays(startDate, endDate),
      text: `${startDate} - ${endDate}`,
    };
  }

  if (dates.length === 1) {
    return {
      startDate: dates[0],
      endDate: durationDays ? addDays(dates[0], durationDays) : undefined,
      durationDays,
      text: durationDays ? `${dates[0]}, ${durationDays} days` : dates[0],
    };
  }

  return {
    durationDays,
    text: `${durationDays} days`,
  };
}

function resolveMentionDate(
  mention: DateMention,
  previous: string | undefined,
  today: string,
  currentYear: number
) {
  if (mention.year !== undefined) {
    return toValidIsoDate(mention.year, mention.month, mention.day);
  }

  const baseYear = previous ? Number(previous.slice(0, 4)) : currentYear;
  const floor = previous ?? today;
  const candidate = toValidIsoDate(baseYear, mention.month, mention.day);
  if (candidate && candidate < floor) {
    return toValidIsoDate(baseYear + 1, mention.month, mention.day);
  }
  return candidate;
}

function extractDuration(text: string) {
  const match = durationRegex.exec(text);
  if (!match) return undefined;
  const count = toCount(match[1]);
  if (!count) return undefined;
  return match[2].toLowerCase() === "week" ? count * 7 : count;
}

function extractBudget(text: string): TripIntentBudget | undefined {
  const keywordMatch = budgetKeywordRegex.exec(text);
  if (keywordMatch) {
    return buildBudget(keywordMatch[0], keywordMatch[2], keywordMatch[3], keywordMatch[1] ?? keywordMatch[4]);
  }

  const symbolMatch = budgetSymbolRegex.exec(text);
  if (symbolMatch) {
    return buildBudget(symbolMatch[0], symbolMatch[2], symbolMatch[3], symbolMatch[1]);
  }

  const currencyMatch = budgetCurrencyRegex.exec(text);
  if (currencyMatch) {
    return buildBudget(currencyMatch[0], currencyMatch[1], currencyMatch[2], currencyMatch[3]);
  }

  return undefined;
}

function buildBudget(
  matched: string,
  amountRaw: string,
  thousands: string | undefined,
  currencyRaw: string | undefined
): TripIntentBudget | undefined {
  const baseAmount = Number(amountRaw.replace(/,/g, ""));
  if (Number.isNaN(baseAmount) || baseAmount <= 0) {
    return undefined;
  }
  const amount = thousands ? baseAmount * 1000 : baseAmount;
  return {
    amount: Math.round(amount * 100) / 100,
    currency: resolveCurrency(currencyRaw),
    text: matched.trim(),
  };
}

function extractTravelParty(text: string): TripIntentTravelParty | undefined {
  const result: TripIntentTravelParty = {};

  const familyMatch = new RegExp(`\\bfamily of ${countWord}\\b`, "i").exec(text);
  if (familyMatch) {
    result.total = toCount(familyMatch[1]);
    result.hasKids = (result.total ?? 0) >= 3;
  }

  const adultsMatch = new RegExp(
    `\\b${countWord}\\s+adults?\\b(?:\\s*(?:and|&|,|\\+)\\s*${countWord}\\s+(?:kids?|children|child)\\b)?`,
    "i"
  ).exec(text);
  if (adultsMatch) {
    result.adults = toCount(adultsMatch[1]);
    if (adultsMatch[2]) {
      result.kids = toCount(adultsMatch[2]);
    }
    result.total = (result.adults ?? 0) + (result.kids ?? 0);
    result.hasKids = (result.kids ?? 0) > 0;
  }

  const kidsMatch = new RegExp(`\\b${countWord}\\s+(?:kids?|children|child)\\b`, "i").exec(text);
  if (kidsMatch && result.kids === undefined) {
    result.kids = toCount(kidsMatch[1]);
    result.hasKids = (result.kids ?? 0) > 0;
    if (result.adults !== undefined) {
      result.total = result.adults + (result.kids ?? 0);
    }
  }

  const peopleMatch = new RegExp(
    `\\b${countWord}\\s+(?:people|persons|travell?ers|friends|guests|of us)\\b`,
    "i"
  ).exec(text);
  if (peopleMatch && !result.total) {
    result.total = toCount(peopleMatch[1]);
  }

  if (/\bwith\s+(?:my\s+|our\s+|the\s+)?(?:kids?|children|child|son|daughter|baby|toddler)\b/i.test(text)) {
    result.hasKids = true;
    if (!result.kids) {
      result.kids = 1;
    }
  }

  if (!result.total && result.hasKids) {
    result.total = (result.adults ?? 1) + (result.kids ?? 1);
  }

  if (
    result.total === undefined &&
    /\b(?:couple|honeymoon|two of us|both of us|my\s+(?:wife|husband|partner|girlfriend|boyfriend))\b/i.test(text)
  ) {
    result.total = 2;
  }

  if (!result.total && !result.hasKids && /\b(?:solo|alone|by myself|just me|on my own)\b/i.test(text)) {
    result.total = 1;
  }

  if (!result.total && !result.hasKids) {
    return undefined;
  }

  result.description = buildTravelPartyDescription(result);
  return result;
}

function extractPreferences(lower: string) {
  const categories = new Set<ActivityCategory>();
  for (const { category, keywords } of preferenceKeywords) {
    if (keywords.some((regex) => regex.test(lower))) {
      categories.add(category);
    }
  }
  return ACTIVITY_CATEGORIES.filter((category) => categories.has(category));
}

function extractTransportation(lower: string): TripIntentDraft["transportation"] {
  if (/\b(?:fly|flying|flights?|plane)\b/.test(lower)) return "Plane";
  if (/\b(?:trains?|rail)\b/.test(lower)) return "Train";
  if (/\b(?:bus|coach)\b/.test(lower)) return "Bus";
  if (/\b(?:drive|driving|road trip|car)\b/.test(lower)) return "Car";
  return undefined;
}

function extractAccommodation(lower: string): TripIntentDraft["accommodation"] {
  if (/\bhostels?\b/.test(lower)) return "Hostel";
  if (/\bresorts?\b/.test(lower)) return "Resort";
  if (/\b(?:airbnb|apartment|vacation rental)\b/.test(lower)) return "Airbnb";
  if (/\bhotels?\b/.test(lower)) return "Hotel";
  return undefined;
}

function monthNumber(token: string) {
  return MONTHS.indexOf(token.slice(0, 3).toLowerCase()) + 1;
}

function toCount(token: string) {
  const normalized = token.toLowerCase();
  const value = numberWords[normalized] ?? Number(normalized);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

function resolveCurrency(token?: string | null) {
  if (!token) return "USD";
  return currencySymbols[token] ?? currencyWords[token.toLowerCase()] ?? "USD";
}

function toValidIsoDate(year: number, month: number, day: number) {
  if (!year || !month || !day) return undefined;
  const iso = `${year}-${`${month}`.padStart(2, "0")}-${`${day}`.padStart(2, "0")}`;
  return isIsoDate(iso) ? iso : undefined;
}

function normalizeDateOrder(start: string, end: string): [string, string] {
  if (start <= end) return [start, end];
  return [end, start];
}

function computeDateConfidence(range?: TripIntentDateRange) {
  if (!range) return 0;
  if (range.startDate && range.endDate) return 0.85;
  if (range.startDate || range.endDate) return 0.6;
  if (range.durationDays) return 0.4;
  return 0.2;
}

function computeTravelerConfidence(party?: TripIntentTravelParty) {
  if (!party) return 0;
  if (party.total && party.kids !== undefined) {
    return 0.85;
  }
  if (party.total) return 0.7;
  if (party.hasKids) return 0.5;
  return 0.3;
}

function buildTravelPartyDescription(party: TripIntentTravelParty) {
  const pieces: string[] = [];
  if (party.total) {
    pieces.push(`${party.total} ${party.total === 1 ? "traveler" : "travelers"}`);
  }
  if (party.adults !== undefined && party.kids !== undefined) {
    pieces.push(`${party.adults} adults, ${party.kids} kids`);
  } else if (party.hasKids) {
    pieces.push("includes kids");
  }
  return pieces.join(" / ");
}

function escapeRegExp(value: string) {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function generateDraftId() {
  if (typeof crypto !== "undefined" && typeof crypto.randomUUID === "function") {
    return crypto.randomUUID();
  }
  return `trip-intent-${Date.now()}-${Math.random().toString(16).slice(2)}`;
}
