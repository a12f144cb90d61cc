export { arithmeticBuiltins } from "./arithmetic.js";
