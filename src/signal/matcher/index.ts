export { extractSkills, matchPosting, skillNames } from "./matcher";
