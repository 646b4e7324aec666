export * from "./content";
export * from "./models";
