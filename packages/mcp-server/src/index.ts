export * from "./config";
export * from "./dispatcher";
export * from "./envelope";
export * from "./server";
export * from "./tools/airing";
export * from "./tools/context";
export * from "./tools/details";
export * from "./tools/meta";
export * from "./tools/resolve";
export * from "./tools/schemas";
export * from "./tools/search";
export * from "./tools/season";
export * from "./tools/trending";
