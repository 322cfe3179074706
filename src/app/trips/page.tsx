"use client";

import { useCallback, useEffect, useState } from "react";
import Link from "next/link";
import { useAuth } from "@/components/providers/auth-provider";
import { Button } from "@/components/ui/button";
import { LoadingBlock } from "@/components/ui/spinner";
import { useToast } from "@/components/ui/toast";
import { apiRequest, describeError } from "@/lib/api-client";
import { formatCurrency, formatShortDate } from "@/lib/format";
import type { SavedTripSummary } from "@/lib/trips/repository";

export default function TripsPage() {
  const { toast } = useToast();
  const { user, loading: loadingSession, configured, getAccessToken } = useAuth();
  const [trips, setTrips] = useState<SavedTripSummary[] | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [deletingId, setDeletingId] = useState<string | null>(null);

  const fetchTrips = useCallback(async () => {
    try {
      setError(null);
      const token = await getAccessToken();
      const data = await apiRequest<{ trips: SavedTripSummary[] }>("/api/trips", { token });
      setTrips(data.trips);
    } catch (requestError) {
      setError(describeError(requestError, "Could not load your trips."));
    }
  }, [getAccessToken]);

  useEffect(() => {
    if (user) {
      void fetchTrips();
    }
  }, [user, fetchTrips]);

  const handleDelete = async (tripId: string) => {
    try {
      setDeletingId(tripId);
      const token = await getAccessToken();
      await apiRequest(`/api/trips/${tripId}`, { method: "DELETE", token });
      setTrips((current) => current?.filter((trip) => trip.id !== tripId) ?? null);
      toast({ title: "Trip deleted", variant: "success" });
    } catch (requestError) {
      toast({
        title: "Could not delete the trip",
        description: describeError(requestError, "Please try again."),
        variant: "error",
      });
    } finally {
      setDeletingId(null);
    }
  };

  if (!configured) {
    return <p className="text-muted">Saved trips are not enabled on this deployment.</p>;
  }
  if (loadingSession) {
    return <LoadingBlock message="Checking your session..." />;
  }
  if (!user) {
    return (
      <p className="text-muted">
        <Link href="/login" className="text-primary hover:underline">
          Sign in
        </Link>{" "}
        to see the trips you have saved.
      </p>
    );
  }

  return (
    <div className="space-y-8">
      <header className="flex flex-wrap items-center justify-between gap-3">
        <div>
          <h1 className="text-3xl font-semibold">My trips</h1>
          <p className="text-muted">Itineraries you saved from the planner, newest first.</p>
        </div>
        <Button variant="secondary" onClick={() => void fetchTrips()}>
          Refresh
        </Button>
      </header>

      {error && <p className="text-sm text-destructive">{error}</p>}

      {!trips ? (
        <LoadingBlock message="Loading your trips..." />
      ) : trips.length === 0 ? (
        <div className="rounded-3xl border border-dashed border-border p-10 text-center text-sm text-muted">
          Nothing saved yet.{" "}
          <Link href="/planner" className="text-primary hover:underline">
            Plan a trip
          </Link>
        </div>
      ) : (
        <ul className="grid gap-4 md:grid-cols-2">
          {trips.map((trip) => (
            <li key={trip.id} className="space-y-3 rounded-3xl border border-border bg-surface p-5 shadow-card">
              <div>
                <Link href={`/trips/${trip.id}`} className="text-lg font-semibold hover:text-primary">
                  {trip.title}
                </Link>
                <p className="text-xs text-muted">
                  {trip.origin} → {trip.destination} · {formatShortDate(trip.startDate)} –{" "}
                  {formatShortDate(trip.endDate)} · {formatCurrency(trip.budget)}
                </p>
              </div>
              <Button
                size="sm"
                variant="danger"
                loading={deletingId === trip.id}
                onClick={() => void handleDelete(trip.id)}
              >
                Delete
              </Button>
            </li>
          ))}
        </ul>
      )}
    </div>
  );
}
