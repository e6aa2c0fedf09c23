export { compile, MIN_SCORE } from "./query-compiler";
