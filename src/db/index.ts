/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/postingsRepo";
export * from "./repos/skillsRepo";
export * from "./repos/statsRepo";
export * from "./repos/runsRepo";
