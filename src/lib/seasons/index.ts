export * from "./seasons";
export * from "./date-optimizer";
