import { DestinationExplorer } from "@/components/destinations/destination-explorer";

export default function DestinationsPage() {
  return (
    <div className="space-y-8">
      <header className="space-y-2">
        <h1 className="text-3xl font-semibold">Explore destinations</h1>
        <p className="text-muted">Filter by region, budget, season and what each place does best.</p>
      </header>
      <DestinationExplorer />
    </div>
  );
}
