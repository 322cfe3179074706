import { describe, expect, it } from "vitest";
import { TravelCatalog, getDefaultCatalog } from "@/lib/catalog";
import { CatalogLookupError } from "@/lib/errors";
import { HARBOR_CITY, PALM_BAY, createTestCatalog, createTestCatalogData } from "./utils/catalog";
import { sequenceRandom } from "./utils/random";

describe("TravelCatalog", () => {
  it("finds destinations by exact, full or city name", () => {
    const catalog = createTestCatalog();
    expect(catalog.findDestination(HARBOR_CITY)?.id).toBe(1);
    expect(catalog.findDestination("  palm bay, islandia ")?.id).toBe(2);
    expect(catalog.findDestination("Palm Bay")?.id).toBe(2);
    expect(catalog.findDestination("Islandia")).toBeUndefined();
    expect(catalog.findDestination("   ")).toBeUndefined();
  });

  it("throws a lookup error for unknown names and ids", () => {
    const catalog = createTestCatalog();
    expect(() => catalog.getDestinationByName("Atlantis")).toThrow(CatalogLookupError);
    expect(() => catalog.getDestinationById(99)).toThrow("Unknown destination id: 99");
  });

  it("hands out copies that callers cannot mutate", () => {
    const catalog = createTestCatalog();
    const first = catalog.getDestinationById(1);
    first.features.cultural = 0;
    first.bestSeasons.push("winter");

    const second = catalog.getDestinationById(1);
    expect(second.features.cultural).toBe(0.9);
    expect(second.bestSeasons).toEqual(["spring", "fall"]);
  });

  it("lists regions once each in catalog order", () => {
    expect(createTestCatalog().listRegions()).toEqual(["Europe", "Asia"]);
  });

  it("filters activities and accommodations", () => {
    const catalog = createTestCatalog();
    expect(
      catalog.getActivitiesByDestinationAndCategory(1, "Food & Culinary").map((activity) => activity.name)
    ).toEqual(["Street Food Crawl"]);
    expect(catalog.getAccommodationsByDestinationAndType(1, "Hotel").map((item) => item.id)).toEqual([2, 3]);
    expect(catalog.getAccommodationsByDestinationAndType(2, "Any").map((item) => item.name)).toEqual([
      "Palm Resort",
    ]);
  });

  it("looks up transportation modes", () => {
    const catalog = createTestCatalog();
    expect(catalog.getTransportationByMode("Bus").speedKmH).toBe(80);
    expect(catalog.getTransportationByMode("Any", sequenceRandom([0.99])).mode).toBe("Car");
    expect(() => catalog.getTransportationByMode("Boat")).toThrow("Unknown transportation mode: Boat");
  });

  it("builds the feature vector with the cost level last", () => {
    const catalog = createTestCatalog();
    expect(catalog.getDestinationFeatureVector(catalog.getDestinationByName(PALM_BAY))).toEqual([
      0.3, 0.9, 0.6, 0.95, 0.3, 0.4, 0.6, 0.4,
    ]);
  });

  describe("fromUnknown", () => {
    it("accepts valid data", () => {
      const catalog = TravelCatalog.fromUnknown(createTestCatalogData());
      expect(catalog.listDestinationNames()).toHaveLength(3);
    });

    it("reports the first invalid fields", () => {
      const data = createTestCatalogData();
      const broken = { ...data, destinations: [{ ...data.destinations[0], costLevel: 9 }] };

      let caught: unknown;
      try {
        TravelCatalog.fromUnknown(broken);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(CatalogLookupError);
      expect(caught).toMatchObject({ kind: "invalid_catalog_data" });
      expect(caught instanceof Error ? caught.message : "").toContain("destinations.0.costLevel");
    });
  });

  it("loads the bundled catalog once", () => {
    const catalog = getDefaultCatalog();
    expect(catalog).toBe(getDefaultCatalog());
    expect(catalog.listDestinationNames()).toContain("Paris, France");
    expect(catalog.getDestinationByName("tokyo").name).toBe("Tokyo, Japan");
    expect(catalog.getActivitiesByDestination(1).length).toBeGreaterThan(0);
  });
});
