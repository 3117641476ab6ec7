export * from "./observe";
export * from "./parse";
export * from "./track";
export * from "./types";
