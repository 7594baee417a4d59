export type * from "./types/session.js";
export type * from "./types/api.js";
