export type * from "./types.js";
export type * from "./protocol.js";
