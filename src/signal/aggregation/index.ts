export { aggregate, compareSkillNames, toPercentage } from "./aggregateStats";
export type { AggregatablePosting } from "./aggregateStats";
export { SkillRegistry } from "./skillRegistry";
