export { flatten } from "./flatten.js";
export { pass } from "./pass.js";
