import Link from "next/link";
import { getDefaultCatalog } from "@/lib/catalog";
import { summarizeDestination } from "@/lib/destinations/filter";
import { formatCurrency } from "@/lib/format";

const FEATURED_DESTINATIONS = ["Paris, France", "Tokyo, Japan", "New York, USA"];

const planningTips = [
  { title: "Book in advance", detail: "for better deals on flights and accommodation." },
  { title: "Pack light", detail: "to avoid extra baggage fees and move around easily." },
  { title: "Research local customs", detail: "and a few basic phrases when traveling abroad." },
  { title: "Make copies", detail: "of important documents." },
  { title: "Check visa requirements", detail: "well before your travel dates." },
];

const steps = [
  {
    label: "Describe",
    title: "Tell us about the trip",
    description: "Fill in the planner or type a sentence like “5 days in Rome in May, $2,000, love food”.",
  },
  {
    label: "Generate",
    title: "Get a day-by-day plan",
    description: "Transport, lodging and three activities a day, picked to fit your interests and budget.",
  },
  {
    label: "Prepare",
    title: "Budget, pack and save",
    description: "Review the expense breakdown, grab a packing list and save the trip to your account.",
  },
];

export default function HomePage() {
  const catalog = getDefaultCatalog();
  const featured = FEATURED_DESTINATIONS.flatMap((name) => {
    const destination = catalog.findDestination(name);
    return destination ? [summarizeDestination(destination)] : [];
  });

  return (
    <div className="space-y-16">
      <section className="space-y-6">
        <span className="inline-flex items-center rounded-full bg-primary/10 px-4 py-1 text-sm font-medium text-primary">
          Personalized travel planning
        </span>
        <h1 className="max-w-3xl text-4xl font-semibold leading-tight md:text-5xl">
          Plan your next trip in minutes, from the first flight to the last dinner.
        </h1>
        <p className="max-w-2xl text-lg text-muted">
          Pick a destination, dates and what you enjoy. We put together transportation, a place to
          stay, daily activities and a budget you can check at a glance.
        </p>
        <div className="flex flex-wrap gap-3">
          <Link
            href="/planner"
            className="rounded-xl bg-primary px-5 py-3 text-sm font-medium text-primary-foreground shadow-sm transition hover:bg-primary/90"
          >
            Start planning
          </Link>
          <Link
            href="/destinations"
            className="rounded-xl border border-border bg-surface px-5 py-3 text-sm font-medium transition hover:bg-surface/80"
          >
            Browse destinations
          </Link>
        </div>
      </section>

      <section className="grid gap-4 md:grid-cols-3">
        {steps.map((step) => (
          <article key={step.label} className="rounded-3xl border border-border bg-surface p-6 shadow-card">
            <p className="text-xs font-semibold uppercase tracking-[0.2em] text-primary/80">{step.label}</p>
            <h2 className="mt-2 text-lg font-semibold">{step.title}</h2>
            <p className="mt-2 text-sm text-muted">{step.description}</p>
          </article>
        ))}
      </section>

      <section className="space-y-4">
        <h2 className="text-2xl font-semibold">Popular destinations</h2>
        <div className="grid gap-4 md:grid-cols-3">
          {featured.map((destination) => (
            <article
              key={destination.id}
              className="flex flex-col gap-3 rounded-3xl border border-border bg-surface p-6 shadow-card"
            >
              <div>
                <h3 className="text-lg font-semibold">{destination.name}</h3>
                <p className="text-xs text-muted">
                  {destination.region} · about {formatCurrency(destination.avgDailyCost)} a day
                </p>
              </div>
              <p className="text-sm text-muted">{destination.description}</p>
              <p className="text-xs text-muted">Best time: {destination.bestTimeToVisit}</p>
              <Link
                href={`/planner?destination=${encodeURIComponent(destination.name)}`}
                className="mt-auto text-sm font-medium text-primary hover:underline"
              >
                Plan a trip here →
              </Link>
            </article>
          ))}
        </div>
      </section>

      <section className="rounded-3xl border border-dashed border-primary/40 bg-primary/5 p-6">
        <h2 className="text-lg font-semibold">Travel planning tips</h2>
        <ul className="mt-3 space-y-2 text-sm text-foreground/90">
          {planningTips.map((tip) => (
            <li key={tip.title}>
              <span className="font-semibold">{tip.title}</span> {tip.detail}
            </li>
          ))}
        </ul>
      </section>
    </div>
  );
}
