"use client";

import { useEffect, useState } from "react";
import { LoadingBlock } from "@/components/ui/spinner";
import { apiRequest, describeError } from "@/lib/api-client";
import type { PackingList } from "@/lib/packing";
import type { ActivityCategory } from "@/types/travel";

interface PackingListPanelProps {
  destination: string;
  startDate: string;
  endDate: string;
  activities: ActivityCategory[];
  travelers: number;
}

export function PackingListPanel({ destination, startDate, endDate, activities, travelers }: PackingListPanelProps) {
  const [packingList, setPackingList] = useState<PackingList | null>(null);
  const [error, setError] = useState<string | null>(null);
  const activityKey = activities.join("|");

  useEffect(() => {
    const controller = new AbortController();
    setPackingList(null);
    setError(null);

    apiRequest<{ packingList: PackingList }>("/api/packing-list", {
      body: { destination, startDate, endDate, activities: activityKey ? activityKey.split("|") : [], travelers },
      signal: controller.signal,
    })
      .then((data) => setPackingList(data.packingList))
      .catch((requestError: unknown) => {
        if (!controller.signal.aborted) {
          setError(describeError(requestError, "Could not build the packing list."));
        }
      });

    return () => controller.abort();
  }, [destination, startDate, endDate, activityKey, travelers]);

  if (error) {
    return <p className="text-sm text-destructive">{error}</p>;
  }
  if (!packingList) {
    return <LoadingBlock message="Building your packing list..." />;
  }

  return (
    <div className="space-y-6">
      <p className="text-sm text-muted">
        {packingList.nights} nights in {packingList.destination}, arriving in {packingList.season}.
      </p>
      <div className="grid gap-4 md:grid-cols-2">
        {packingList.sections.map((section) => (
          <section key={section.title} className="rounded-2xl border border-border/60 p-4">
            <h3 className="text-sm font-semibold">{section.title}</h3>
            <ul className="mt-2 space-y-1.5 text-sm">
              {section.items.map((item) => (
                <li key={item.name} className="flex items-start justify-between gap-3">
                  <span>
                    {item.name}
                    <span className="block text-xs text-muted">{item.reason}</span>
                  </span>
                  {item.quantity !== undefined && <span className="text-xs font-medium">×{item.quantity}</span>}
                </li>
              ))}
            </ul>
          </section>
        ))}
      </div>
      <ul className="space-y-1 rounded-2xl border border-dashed border-primary/40 bg-primary/5 p-4 text-sm">
        {packingList.tips.map((tip) => (
          <li key={tip}>· {tip}</li>
        ))}
      </ul>
    </div>
  );
}
