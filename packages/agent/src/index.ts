export * from "./errors";
export * from "./json";
export * from "./prompt/prompts";
export * from "./runtime";
export * from "./services";
