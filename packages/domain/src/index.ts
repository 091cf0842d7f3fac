export * from "./availability";
export * from "./services/ports";
export * from "./services/scheduling-service";
