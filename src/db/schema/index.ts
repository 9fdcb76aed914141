export * from "./text-units.ts";
export * from "./classifications.ts";
export * from "./text-unit-classifications.ts";
export * from "./word-tokens.ts";
export * from "./derived.ts";
