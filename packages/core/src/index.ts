export * from "./alphabet";
export * from "./stats";
export * from "./window";
