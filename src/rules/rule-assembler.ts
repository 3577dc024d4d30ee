import { stringify } from "yaml";
import { type ApiClient, ENDPOINTS, isRecord } from "../backend/api-client.js";
import type { Task } from "../catalog/task-catalog.js";
import { BackendError, ValidationError } from "../errors.js";
import { type RuleDocument, type RuleStructure, ruleDocumentSchema } from "../schemas/rule-schema.js";
import { determinePrimaryAppType } from "./app-type.js";
import { parseDataType } from "./data-types.js";
import { type IoMapContext, validateIoMap } from "./io-map.js";

export type DeclaredTask = Pick<Task, "name" | "inputs" | "outputs" | "appTags">;

export type AssembleOptions = {
  apiVersion: string;
  // Catalog declarations by task name; enables attribute checks in the I/O map.
  declaredTasks?: ReadonlyMap<string, DeclaredTask>;
};

export type RuleSubmission = {
  rule_id: string;
  status: string;
  timestamp: string;
};

function structuralErrors(structure: RuleStructure): string[] {
  const errors: string[] = [];
  if (!structure.rule_name.trim()) errors.push("Rule name is required");
  if (structure.tasks.length === 0) errors.push("At least one task is required");
  structure.tasks.forEach((task, index) => {
    if (!task.name.trim()) errors.push(`Task ${index + 1} has no name`);
  });
  (structure.inputs_meta ?? []).forEach((meta, index) => {
    if (!meta.name?.trim()) errors.push(`Input meta ${index + 1} has no name`);
    if (!meta.dataType?.trim()) errors.push(`Input meta ${meta.name ?? index + 1} has no dataType`);
  });
  (structure.outputs_meta ?? []).forEach((meta, index) => {
    if (!meta.name?.trim()) errors.push(`Output meta ${index + 1} has no name`);
  });
  return errors;
}

function resolveAppType(structure: RuleStructure, declared?: ReadonlyMap<string, DeclaredTask>): string {
  const explicit = structure.app_type?.trim();
  if (explicit) return explicit;
  const tagged = structure.tasks.map((task) => ({
    name: task.name,
    appTags: task.app_type ? { appType: task.app_type } : declared?.get(task.name)?.appTags ?? {},
  }));
  const resolution = determinePrimaryAppType(tagged);
  if (resolution.status === "ambiguous") {
    throw new ValidationError(
      "The selected tasks use several app types; pass app_type to choose one",
      resolution.candidates.map((candidate) => `${candidate.app_type}: ${candidate.tasks.join(", ")}`)
    );
  }
  return resolution.app_type;
}

export function ioMapContextFor(document: RuleDocument, declared?: ReadonlyMap<string, DeclaredTask>): IoMapContext {
  return {
    tasks: document.spec.tasks.map((task) => {
      const declaration = declared?.get(task.name);
      return {
        alias: task.alias,
        inputs: declaration?.inputs.map((input) => input.name),
        outputs: declaration?.outputs.map((output) => output.name),
      };
    }),
    ruleInputs: Array.from(
      new Set([...document.spec.inputsMeta__.map((meta) => meta.name), ...Object.keys(document.spec.inputs)])
    ),
    ruleOutputs: document.spec.outputsMeta__.map((meta) => meta.name),
  };
}

export function assembleRule(structure: RuleStructure, options: AssembleOptions): RuleDocument {
  const errors = structuralErrors(structure);
  if (errors.length > 0) {
    throw new ValidationError("Rule structure is invalid", errors);
  }

  const appType = resolveAppType(structure, options.declaredTasks);
  const document: RuleDocument = {
    apiVersion: options.apiVersion,
    kind: "rule",
    meta: {
      name: structure.rule_name.trim(),
      purpose: structure.purpose ?? "",
      description: structure.description ?? "",
      labels: {
        appType: [appType],
        environment: [structure.environment ?? "logical"],
        execlevel: [structure.exec_level ?? "app"],
      },
      annotations: { annotateType: [appType], app: [appType] },
    },
    spec: {
      inputs: structure.inputs ?? {},
      inputsMeta__: (structure.inputs_meta ?? []).map((meta) => ({
        name: meta.name?.trim() ?? "",
        dataType: parseDataType(meta.dataType),
        required: meta.required ?? false,
        ...(meta.defaultValue === undefined ? {} : { defaultValue: meta.defaultValue }),
      })),
      outputsMeta__: (structure.outputs_meta ?? []).map((meta) => ({
        name: meta.name?.trim() ?? "",
        dataType: parseDataType(meta.dataType),
        ...(meta.required === undefined ? {} : { required: meta.required }),
        ...(meta.defaultValue === undefined ? {} : { defaultValue: meta.defaultValue }),
      })),
      tasks: structure.tasks.map((task, index) => ({
        name: task.name.trim(),
        alias: `t${index + 1}`,
        type: "task",
        appTags: {
          appType: task.app_type ?? options.declaredTasks?.get(task.name)?.appTags.appType ?? [appType],
        },
        purpose: task.purpose ?? "",
      })),
      ioMap: (structure.io_map ?? []).map((entry) => entry.trim()).filter(Boolean),
    },
  };

  const ioErrors = validateIoMap(document.spec.ioMap, ioMapContextFor(document, options.declaredTasks));
  if (ioErrors.length > 0) {
    throw new ValidationError("I/O map is invalid", ioErrors);
  }
  return document;
}

// Checks a document that did not come from assembleRule, e.g. one edited by hand.
export function validateRuleDocument(
  candidate: unknown,
  declared?: ReadonlyMap<string, DeclaredTask>
): { valid: true; document: RuleDocument } | { valid: false; errors: string[] } {
  const parsed = ruleDocumentSchema.safeParse(candidate);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    };
  }
  const errors = validateIoMap(parsed.data.spec.ioMap, ioMapContextFor(parsed.data, declared));
  return errors.length > 0 ? { valid: false, errors } : { valid: true, document: parsed.data };
}

export function renderRuleYaml(document: RuleDocument): string {
  return stringify(document);
}

export async function submitRule(api: ApiClient, document: RuleDocument): Promise<RuleSubmission> {
  const response = await api.post(ENDPOINTS.rules, document);
  const id = isRecord(response) ? response.id : undefined;
  if ((typeof id !== "string" && typeof id !== "number") || id === "") {
    throw new BackendError("Rule creation response did not include a rule id");
  }
  const status = isRecord(response) && typeof response.status === "string" ? response.status : "created";
  const timestamp = isRecord(response) && typeof response.timestamp === "string" ? response.timestamp : "";
  return { rule_id: String(id), status, timestamp };
}
