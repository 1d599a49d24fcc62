/**
 * Pipeline modules export
 */

export { validate, resolveToolchain } from "./validator";
export { analyze } from "./analyzer";
export { emit } from "./emitter";
export { dispatch, selectStrategy, filterModel } from "./dispatcher";
export { stats } from "./stats";
