import { PlannerWorkspace } from "@/components/planner/planner-workspace";
import { getDefaultCatalog } from "@/lib/catalog";

export default async function PlannerPage({
  searchParams,
}: {
  searchParams: Promise<Record<string, string | string[] | undefined>>;
}) {
  const { destination } = await searchParams;
  const catalog = getDefaultCatalog();
  const requested = typeof destination === "string" ? catalog.findDestination(destination) : undefined;

  return (
    <div className="space-y-8">
      <header className="space-y-2">
        <h1 className="text-3xl font-semibold">Plan a trip</h1>
        <p className="text-muted">
          Tell us about your trip and we will put together transport, lodging, daily activities and a budget.
        </p>
      </header>
      <PlannerWorkspace
        destinations={catalog.listDestinationNames()}
        initialDestination={requested?.name ?? ""}
      />
    </div>
  );
}
