/**
 * Constants barrel exports
 */

export * from "./logger";
export * from "./textNormalization";
export * from "./taxonomy";
export * from "./aggregation";
export * from "./runner";
export * from "./clients/http";
export * from "./clients/franceTravail";
