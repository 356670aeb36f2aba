export * from "./types/media";
export * from "./types/envelope";
export * from "./types/source";
export * from "./constants/sources";
export * from "./errors/source-error";
export * from "./utils/json";
export * from "./utils/season";
export * from "./utils/text";
