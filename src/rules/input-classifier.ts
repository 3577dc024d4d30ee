import type { Task, TaskCatalog, TaskInput } from "../catalog/task-catalog.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { type DataType, isFileDataType } from "./data-types.js";
import { type TemplateFormat, parseTemplateFormat } from "./template-format.js";

export type InputCategory = "template" | "parameter";

export type ClassifiedInput = {
  unique_input_id: string;
  task_name: string;
  input_name: string;
  category: InputCategory;
  description: string;
  data_type: DataType;
  required: boolean;
  has_template: boolean;
  format: TemplateFormat | null;
  has_default: boolean;
  default_value: string | null;
  allow_user_values: boolean;
  allowed_values: unknown[];
};

export type InputOverview = {
  selected_tasks: string[];
  unknown_tasks: string[];
  template_inputs: ClassifiedInput[];
  parameter_inputs: ClassifiedInput[];
  template_count: number;
  parameter_count: number;
  total_count: number;
  estimated_minutes: number;
};

export function uniqueInputId(taskName: string, inputName: string): string {
  return `${taskName}.${inputName}`;
}

// Splits on the first dot only: input names may themselves contain dots.
export function splitUniqueInputId(id: string): { taskName: string; inputName: string } | undefined {
  const dot = id.indexOf(".");
  if (dot <= 0 || dot === id.length - 1) return undefined;
  return { taskName: id.slice(0, dot), inputName: id.slice(dot + 1) };
}

export function isTemplateInput(input: Pick<TaskInput, "templateFile" | "dataType">): boolean {
  return input.templateFile.length > 0 || isFileDataType(input.dataType);
}

export function classifyTaskInputs(task: Task): ClassifiedInput[] {
  return task.inputs.map((input) => {
    const template = isTemplateInput(input);
    return {
      unique_input_id: uniqueInputId(task.name, input.name),
      task_name: task.name,
      input_name: input.name,
      category: template ? "template" : "parameter",
      description: input.description,
      data_type: input.dataType,
      required: input.required,
      has_template: input.templateFile.length > 0,
      format: template ? parseTemplateFormat(input.format) : null,
      has_default: input.defaultValue.length > 0,
      default_value: input.defaultValue || null,
      allow_user_values: input.allowUserValues,
      allowed_values: input.allowedValues,
    };
  });
}

export async function buildInputOverview(catalog: TaskCatalog, selectedTasks: string[]): Promise<InputOverview> {
  const names = Array.from(new Set(selectedTasks.map((name) => name.trim()).filter(Boolean)));
  if (names.length === 0) {
    throw new ValidationError("No tasks selected for input analysis");
  }

  const overview: InputOverview = {
    selected_tasks: [],
    unknown_tasks: [],
    template_inputs: [],
    parameter_inputs: [],
    template_count: 0,
    parameter_count: 0,
    total_count: 0,
    estimated_minutes: 0,
  };

  // Sequential on purpose: one catalog request at a time.
  for (const name of names) {
    const task = await catalog.findTask(name);
    if (!task) {
      overview.unknown_tasks.push(name);
      continue;
    }
    overview.selected_tasks.push(name);
    for (const input of classifyTaskInputs(task)) {
      if (input.category === "template") {
        overview.template_inputs.push(input);
        overview.estimated_minutes += 3;
      } else {
        overview.parameter_inputs.push(input);
        overview.estimated_minutes += 0.5;
      }
    }
  }

  if (overview.selected_tasks.length === 0) {
    throw new NotFoundError(`None of the selected tasks were found: ${overview.unknown_tasks.join(", ")}`);
  }

  overview.template_count = overview.template_inputs.length;
  overview.parameter_count = overview.parameter_inputs.length;
  overview.total_count = overview.template_count + overview.parameter_count;
  return overview;
}

export function overviewInputs(overview: InputOverview): ClassifiedInput[] {
  return [...overview.template_inputs, ...overview.parameter_inputs];
}

export function renderOverview(overview: InputOverview): string {
  const lines = ["INPUT COLLECTION OVERVIEW:", "", "I've analyzed your selected tasks. Here's what we need to configure:", ""];

  if (overview.template_inputs.length > 0) {
    lines.push("TEMPLATE INPUTS (Files):");
    for (const input of overview.template_inputs) {
      lines.push(
        `• Task: ${input.task_name} → Input: ${input.input_name} (${(input.format ?? "text").toUpperCase()} file)`,
        `    Unique ID: ${input.unique_input_id}`,
        `    Description: ${input.description || "-"}`,
        `    Required: ${input.required ? "Yes" : "No"}`
      );
    }
    lines.push("");
  }

  if (overview.parameter_inputs.length > 0) {
    lines.push("PARAMETER INPUTS (Values):");
    for (const input of overview.parameter_inputs) {
      lines.push(
        `• Task: ${input.task_name} → Input: ${input.input_name} (${input.data_type})`,
        `    Unique ID: ${input.unique_input_id}`,
        `    Description: ${input.description || "-"}`,
        `    Required: ${input.required ? "Yes" : "No"}`
      );
    }
    lines.push("");
  }

  if (overview.unknown_tasks.length > 0) {
    lines.push(`WARNING: these tasks were not found and are excluded: ${overview.unknown_tasks.join(", ")}`, "");
  }

  const formats = Array.from(new Set(overview.template_inputs.map((input) => (input.format ?? "text").toUpperCase())));
  lines.push(
    "SUMMARY:",
    `- Total inputs needed: ${overview.total_count}`,
    `- Template files: ${overview.template_count}${formats.length > 0 ? ` (${formats.join(", ")})` : ""}`,
    `- Parameter values: ${overview.parameter_count}`,
    `- Estimated time: ~${Math.ceil(overview.estimated_minutes)} minutes`,
    "",
    "This will be collected step-by-step with progress indicators.",
    "Ready to start systematic input collection?"
  );
  return lines.join("\n");
}
