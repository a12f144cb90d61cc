export { NameGenerator } from "./generator.js";
