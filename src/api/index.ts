export * from "./errors";
export * from "./resolveOwner";
export * from "./types";
export * from "./vkClient";
