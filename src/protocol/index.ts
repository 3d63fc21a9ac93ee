// Codec exports: constants, value types, parsers and builders

export * from "./constants.ts";
export * from "./frameBuilder.ts";
export * from "./frameParser.ts";
export type * from "./types.ts";
