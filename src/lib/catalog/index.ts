export { TravelCatalog, getDefaultCatalog } from "./catalog";
export { catalogDataSchema, type CatalogData } from "./schema";
