/**
 * Default collaborator wiring used by the CLI
 */

import { JsonModelAnalysis, buildTypeModel } from "./analysis";
import { IdaScriptRenderer, createCSharpWriterFactory } from "./renderers";
import { fsPathProbe, globDirectoryProbe } from "./utils";
import type { TemplateSet } from "./templates";
import type { Collaborators } from "./types";
import type { Logger } from "./utils";

export function createDefaultCollaborators(
  templates: TemplateSet,
  logger?: Logger,
): Collaborators {
  return {
    analysis: new JsonModelAnalysis(logger),
    buildModel: buildTypeModel,
    createSourceWriter: createCSharpWriterFactory(templates),
    scriptRenderer: new IdaScriptRenderer(templates),
    directoryProbe: globDirectoryProbe,
    pathProbe: fsPathProbe,
  };
}
