export * from "./logger";
export * from "./db";
export * from "./taxonomy";
export * from "./posting";
export * from "./matching";
export * from "./stats";
export * from "./ingestion";
export * from "./runner";
export * from "./clients/http";
export * from "./clients/franceTravail";
