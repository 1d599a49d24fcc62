/**
 * Default analysis collaborators
 */

export { JsonModelAnalysis } from "./json-model-analysis";
export { buildTypeModel } from "./build-model";
