export * from "./classifier";
export * from "./contentNodes";
export * from "./fileNames";
export * from "./filesCollector";
