import { TravelCatalog, type CatalogData } from "@/lib/catalog";

export const HARBOR_CITY = "Harbor City, Testland";
export const PALM_BAY = "Palm Bay, Islandia";
export const EMPTY_TOWN = "Empty Town, Nowhere";

export function createTestCatalogData(): CatalogData {
  return {
    destinations: [
      {
        id: 1,
        name: HARBOR_CITY,
        region: "Europe",
        hemisphere: "north",
        costLevel: 3,
        features: {
          cultural: 0.9,
          outdoor: 0.2,
          culinary: 0.8,
          relaxation: 0.3,
          shopping: 0.7,
          entertainment: 0.6,
          sightseeing: 0.9,
        },
        climate: "temperate",
        bestSeasons: ["spring", "fall"],
        avgDailyCost: 150,
        languages: ["Testish", "English"],
        currency: "EUR",
        description: "its harbor, museums and street food.",
        localTransportation: ["Metro", "Tram"],
        popularAttractions: ["Old Port", "Art Museum"],
      },
      {
        id: 2,
        name: PALM_BAY,
        region: "Asia",
        hemisphere: "south",
        costLevel: 2,
        features: {
          cultural: 0.3,
          outdoor: 0.9,
          culinary: 0.6,
          relaxation: 0.95,
          shopping: 0.3,
          entertainment: 0.4,
          sightseeing: 0.6,
        },
        climate: "tropical",
        bestSeasons: ["Dry season (May-Sep)"],
        avgDailyCost: 80,
        languages: ["Islandic"],
        currency: "USD",
        description: "white beaches and coral reefs.",
        localTransportation: ["Scooter", "Boat"],
        popularAttractions: ["Coral Reef"],
      },
      {
        id: 3,
        name: EMPTY_TOWN,
        region: "Europe",
        hemisphere: "north",
        costLevel: 1,
        features: {
          cultural: 0.5,
          outdoor: 0.5,
          culinary: 0.5,
          relaxation: 0.5,
          shopping: 0.5,
          entertainment: 0.5,
          sightseeing: 0.5,
        },
        climate: "mediterranean",
        bestSeasons: [],
        avgDailyCost: 40,
        languages: ["Testish"],
        currency: "EUR",
        description: "quiet streets.",
        localTransportation: ["Walking"],
        popularAttractions: [],
      },
    ],
    activities: [
      {
        id: 1,
        destinationId: 1,
        name: "Art Museum Tour",
        category: "Cultural & Historical",
        description: "Guided cultural tour of the art museum",
        durationHours: 3,
        cost: 20,
        morningSuitable: true,
        afternoonSuitable: true,
        eveningSuitable: false,
        popularity: 0.9,
      },
      {
        id: 2,
        destinationId: 1,
        name: "Harbor Kayak",
        category: "Outdoor & Adventure",
        description: "Paddle through nature reserves by the harbor",
        durationHours: 2,
        cost: 40,
        morningSuitable: true,
        afternoonSuitable: true,
        eveningSuitable: false,
        popularity: 0.7,
      },
      {
        id: 3,
        destinationId: 1,
        name: "Street Food Crawl",
        category: "Food & Culinary",
        description: "Taste local food at night markets",
        durationHours: 3,
        cost: 30,
        morningSuitable: false,
        afternoonSuitable: false,
        eveningSuitable: true,
        popularity: 0.8,
      },
      {
        id: 4,
        destinationId: 1,
        name: "Old Town Walk",
        category: "Sightseeing",
        description: "Walk through the old town squares",
        durationHours: 2,
        cost: 0,
        morningSuitable: true,
        afternoonSuitable: true,
        eveningSuitable: true,
        popularity: 0.6,
      },
      {
        id: 5,
        destinationId: 1,
        name: "Jazz Club Night",
        category: "Entertainment",
        description: "Live jazz in a cellar club",
        durationHours: 3,
        cost: 35,
        morningSuitable: false,
        afternoonSuitable: false,
        eveningSuitable: true,
        popularity: 0.5,
      },
    ],
    accommodations: [
      {
        id: 1,
        destinationId: 1,
        name: "Budget Hostel Harbor",
        type: "Hostel",
        costPerNight: 30,
        rating: 3.8,
        amenities: ["WiFi"],
        suitableFor: ["solo"],
        locationQuality: 3,
      },
      {
        id: 2,
        destinationId: 1,
        name: "Mid-range Hotel Harbor",
        type: "Hotel",
        costPerNight: 120,
        rating: 4.2,
        amenities: ["WiFi", "Breakfast"],
        suitableFor: ["couples"],
        locationQuality: 4,
      },
      {
        id: 3,
        destinationId: 1,
        name: "Grand Harbor Hotel",
        type: "Hotel",
        costPerNight: 300,
        rating: 4.8,
        amenities: ["WiFi", "Spa"],
        suitableFor: ["luxury"],
        locationQuality: 5,
      },
      {
        id: 4,
        destinationId: 2,
        name: "Palm Resort",
        type: "Resort",
        costPerNight: 200,
        rating: 4.6,
        amenities: ["Pool"],
        suitableFor: ["families"],
        locationQuality: 4,
      },
    ],
    transportation: [
      {
        mode: "Plane",
        typicalCostPerKm: 0.15,
        speedKmH: 900,
        comfortLevel: 3,
        ecoFriendliness: 1,
        suitableDistanceMinKm: 300,
        suitableDistanceMaxKm: 20000,
      },
      {
        mode: "Train",
        typicalCostPerKm: 0.1,
        speedKmH: 200,
        comfortLevel: 4,
        ecoFriendliness: 4,
        suitableDistanceMinKm: 50,
        suitableDistanceMaxKm: 1000,
      },
      {
        mode: "Bus",
        typicalCostPerKm: 0.05,
        speedKmH: 80,
        comfortLevel: 2,
        ecoFriendliness: 3,
        suitableDistanceMinKm: 10,
        suitableDistanceMaxKm: 800,
      },
      {
        mode: "Car",
        typicalCostPerKm: 0.2,
        speedKmH: 100,
        comfortLevel: 4,
        ecoFriendliness: 2,
        suitableDistanceMinKm: 5,
        suitableDistanceMaxKm: 1000,
      },
    ],
  };
}

export function createTestCatalog() {
  return new TravelCatalog(createTestCatalogData());
}
