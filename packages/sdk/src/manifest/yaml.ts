/**
 * Workflow YAML
 *
 * Reads workflow definitions authored as YAML (see WorkflowManifest) into
 * the plain document the orchestrator accepts, and writes manifests back
 * out. The document is not checked against the manifest schema here; the
 * orchestrator is the authority on what it accepts. Use `parseManifest`
 * for a typed view.
 */

import { readFile } from "node:fs/promises";
import { parse, stringify } from "yaml";
import { ValidationError, deepFreeze, type WorkflowDefinition } from "@agentflow/contracts";
import { isRecord } from "../core/guards.js";

/**
 * Parses YAML text into a workflow definition.
 * Throws ValidationError when the text is not YAML or not a mapping.
 */
export function parseWorkflowYaml(text: string): WorkflowDefinition {
  let document: unknown;
  try {
    document = parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Workflow YAML could not be parsed: ${message}`, [
      { field: "yaml", message },
    ]);
  }

  if (!isRecord(document)) {
    throw new ValidationError("Workflow YAML must be a mapping at the top level", [
      { field: "yaml", message: "expected a mapping" },
    ]);
  }
  return deepFreeze(document);
}

/** Reads and parses a workflow file from disk. */
export async function loadWorkflowFile(path: string): Promise<WorkflowDefinition> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Cannot read workflow file ${path}: ${message}`, [
      { field: "path", message },
    ]);
  }
  return parseWorkflowYaml(text);
}

/** Serializes a definition or manifest as YAML. */
export function toWorkflowYaml(definition: WorkflowDefinition): string {
  return stringify(definition);
}
