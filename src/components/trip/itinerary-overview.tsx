import { formatCurrency, formatLongDate } from "@/lib/format";
import type { Itinerary } from "@/types/travel";

export function ItineraryOverview({ itinerary }: { itinerary: Itinerary }) {
  const { destination, transportation, accommodation, seasonFit, trip } = itinerary;
  const seasonShare = Math.round(seasonFit.score * 100);

  return (
    <div className="space-y-6">
      <div className="grid gap-4 md:grid-cols-3">
        <Stat label="Dates" value={`${formatLongDate(trip.startDate)} – ${formatLongDate(trip.endDate)}`} />
        <Stat label="Duration" value={`${trip.duration} nights`} />
        <Stat label="Budget" value={formatCurrency(trip.budget)} />
      </div>

      <article className="space-y-3 text-sm leading-relaxed text-foreground/90">
        {itinerary.overview.split("\n\n").map((paragraph) => (
          <p key={paragraph}>{paragraph}</p>
        ))}
      </article>

      <div className="grid gap-4 md:grid-cols-2">
        <section className="rounded-2xl border border-border/60 p-4">
          <h3 className="text-sm font-semibold">Transportation</h3>
          <p className="mt-2 text-sm">{transportation.details}</p>
          <p className="mt-1 text-xs text-muted">
            {transportation.distanceKm} km · about {transportation.travelTimeHours} h ·{" "}
            {formatCurrency(transportation.cost)}
          </p>
        </section>
        <section className="rounded-2xl border border-border/60 p-4">
          <h3 className="text-sm font-semibold">Accommodation</h3>
          <p className="mt-2 text-sm">
            {accommodation.name} ({accommodation.type}, rated {accommodation.rating.toFixed(1)})
          </p>
          <p className="mt-1 text-xs text-muted">
            {formatCurrency(accommodation.costPerNight)} per night · {formatCurrency(accommodation.totalCost)} total
          </p>
          {accommodation.amenities.length > 0 && (
            <p className="mt-1 text-xs text-muted">{accommodation.amenities.join(" · ")}</p>
          )}
        </section>
      </div>

      <section className="rounded-2xl border border-dashed border-primary/40 bg-primary/5 p-4 text-sm">
        <h3 className="font-semibold text-primary">Season check</h3>
        <p className="mt-1 text-foreground/90">
          {seasonFit.bestMonths.length === 0
            ? `${destination.name} has no marked best season, any time works.`
            : `${seasonFit.bestSeasonDays} of ${seasonFit.totalDays} days (${seasonShare}%) fall in the best months to visit ${destination.name}.`}
        </p>
        <p className="mt-1 text-xs text-muted">Best seasons: {destination.bestSeasons.join(", ")}</p>
      </section>
    </div>
  );
}

function Stat({ label, value }: { label: string; value: string }) {
  return (
    <div className="rounded-2xl border border-border/60 bg-background/40 p-4">
      <p className="text-xs font-medium uppercase tracking-wide text-muted">{label}</p>
      <p className="mt-2 text-sm font-semibold text-foreground">{value}</p>
    </div>
  );
}
