export * from "./types";
export * from "./dialect";
