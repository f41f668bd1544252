export type * from "./types/codec.js";
export type * from "./types/conversion.js";
