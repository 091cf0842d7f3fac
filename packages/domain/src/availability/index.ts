export * from "./conflicts";
export * from "./engine";
export * from "./interval";
export * from "./normalize";
export * from "./ranking";
export * from "./request";
export * from "./selection";
export * from "./types";
export * from "./windows";
