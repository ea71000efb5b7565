export * from "./schemas/grid";
export * from "./types/error";
export * from "./types/result";
