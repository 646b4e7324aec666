export * from "./collector";
export * from "./enricher";
export * from "./methods";
export * from "./paginatedFetcher";
