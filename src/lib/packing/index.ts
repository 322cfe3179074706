export * from "./packing-list";
