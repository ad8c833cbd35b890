/**
 * Pipeline modules export
 */

export { read } from "./reader";
export { dispatch } from "./dispatcher";
export { report } from "./reporter";
export { stats } from "./stats";
