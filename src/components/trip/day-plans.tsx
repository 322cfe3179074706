import { formatCurrency, formatWeekdayDate } from "@/lib/format";
import type { ActivitySlot, DailyPlan } from "@/types/travel";

const slots = [
  { key: "morning", label: "Morning" },
  { key: "afternoon", label: "Afternoon" },
  { key: "evening", label: "Evening" },
] as const;

export function DayPlans({ plans }: { plans: DailyPlan[] }) {
  return (
    <ol className="space-y-4">
      {plans.map((plan) => (
        <li key={plan.day} className="rounded-2xl border border-border/60 p-4">
          <div className="flex flex-wrap items-baseline justify-between gap-2">
            <h3 className="text-base font-semibold">
              Day {plan.day}: {plan.title}
            </h3>
            <span className="text-xs text-muted">{formatWeekdayDate(plan.date)}</span>
          </div>
          <div className="mt-3 grid gap-3 md:grid-cols-3">
            {slots.map((slot) => (
              <SlotCard key={slot.key} label={slot.label} slot={plan[slot.key]} />
            ))}
          </div>
          <p className="mt-3 text-right text-xs text-muted">Day total {formatCurrency(plan.totalCost)}</p>
        </li>
      ))}
    </ol>
  );
}

function SlotCard({ label, slot }: { label: string; slot: ActivitySlot }) {
  return (
    <div className="rounded-xl bg-background/60 p-3">
      <p className="text-xs font-semibold uppercase tracking-wide text-primary/80">{label}</p>
      <p className="mt-1 text-sm font-medium">{slot.name ?? "Free time"}</p>
      <p className="mt-1 text-xs text-muted">{slot.description}</p>
      <p className="mt-2 text-xs font-medium">{slot.cost > 0 ? formatCurrency(slot.cost) : "Free"}</p>
    </div>
  );
}
