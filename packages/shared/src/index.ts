export type * from "./types/auth.js";
export type * from "./types/event.js";
export type * from "./types/project.js";
