export * from "./adapter";
export * from "./fallback";
export * from "./http";
export * from "./retry";
export * from "./providers/index";
export * from "./normalize/index";
