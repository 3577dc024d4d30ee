import type { Task, TaskCatalog, TaskInput } from "../catalog/task-catalog.js";
import { decodeContent } from "../catalog/task-content.js";
import { NoTemplateError, ValidationError } from "../errors.js";
import { type DataType, isFileDataType } from "./data-types.js";
import type { FileUploader } from "./file-upload.js";
import { isTemplateInput, uniqueInputId } from "./input-classifier.js";
import {
  type TemplateFormat,
  checkContent,
  extractRequiredFields,
  fileExtensionFor,
  generateExample,
  parseTemplateFormat,
  previewContent,
  validationRulesFor,
} from "./template-format.js";

const FORMAT_TIPS: Record<TemplateFormat, string[]> = {
  json: ["Paste the whole document, including the outer braces or brackets", "Keep the field names exactly as shown"],
  yaml: ["Indent nested keys with two spaces", "Quote values that contain ':' or start with special characters"],
  toml: ["Keep each [section] header from the template", "Arrays use [a, b] and strings use double quotes"],
  xml: ["Keep the root element from the template", "Escape & and < inside text as &amp; and &lt;"],
  text: ["Paste the content exactly as it should be stored"],
};

export type TemplateGuidance = {
  task_name: string;
  input_name: string;
  unique_input_id: string;
  description: string;
  data_type: DataType;
  format: TemplateFormat;
  is_file_type: boolean;
  template: string;
  required_fields: string[];
  example: string;
  validation_rules: string[];
  format_tips: string[];
  presentation: string;
};

export type TemplateCollection = {
  task_name: string;
  input_name: string;
  unique_input_id: string;
  data_type: DataType;
  format: TemplateFormat;
  is_file_type: boolean;
  validated_content: string;
  content_preview: string;
  matches_template: boolean;
  needs_final_confirmation: true;
  final_confirmation_message: string;
};

type ConfirmedTemplateBase = {
  task_name: string;
  input_name: string;
  unique_input_id: string;
  data_type: DataType;
  format: TemplateFormat;
};

export type TemplateConfirmation =
  | (ConfirmedTemplateBase & {
      storage_type: "FILE";
      file_url: string;
      filename: string;
      file_size: number;
    })
  | (ConfirmedTemplateBase & {
      storage_type: "MEMORY";
      stored_content: string;
    });

type ResolvedTemplate = {
  task: Task;
  input: TaskInput;
  format: TemplateFormat;
  template: string;
  requiredFields: string[];
};

async function resolveTemplateInput(catalog: TaskCatalog, taskName: string, inputName: string): Promise<ResolvedTemplate> {
  const { task, input } = await catalog.getTaskInput(taskName, inputName);
  if (!isTemplateInput(input)) {
    throw new ValidationError(
      `Input ${inputName} of task ${taskName} is a parameter input; collect it with collect_parameter_input`
    );
  }
  const format = parseTemplateFormat(input.format);
  const template = input.templateFile ? decodeContent(input.templateFile) : "";
  return { task, input, format, template, requiredFields: extractRequiredFields(template, format) };
}

function renderGuidance(guidance: Omit<TemplateGuidance, "presentation">): string {
  const lines = [
    `TEMPLATE INPUT: ${guidance.unique_input_id} (${guidance.format.toUpperCase()})`,
    "",
    guidance.description || "No description provided.",
    "",
    "Template:",
    guidance.template,
    "",
  ];
  if (guidance.required_fields.length > 0) {
    lines.push(`Required fields: ${guidance.required_fields.join(", ")}`, "");
  }
  lines.push("Example structure (replace every placeholder with your own values):", guidance.example, "");
  lines.push("Rules:", ...guidance.validation_rules.map((rule) => `- ${rule}`));
  lines.push("", "Please paste your content for this input.");
  return lines.join("\n");
}

export async function getTemplateGuidance(catalog: TaskCatalog, taskName: string, inputName: string): Promise<TemplateGuidance> {
  const { task, input, format, template, requiredFields } = await resolveTemplateInput(catalog, taskName, inputName);
  if (!template.trim()) {
    throw new NoTemplateError(`Input ${inputName} of task ${taskName} has no template`);
  }
  const guidance = {
    task_name: task.name,
    input_name: input.name,
    unique_input_id: uniqueInputId(task.name, input.name),
    description: input.description,
    data_type: input.dataType,
    format,
    is_file_type: isFileDataType(input.dataType),
    template,
    required_fields: requiredFields,
    example: generateExample(template, format),
    validation_rules: validationRulesFor(format),
    format_tips: FORMAT_TIPS[format],
  };
  return { ...guidance, presentation: renderGuidance(guidance) };
}

export async function collectTemplateInput(
  catalog: TaskCatalog,
  taskName: string,
  inputName: string,
  userContent: string
): Promise<TemplateCollection> {
  const { task, input, format, template, requiredFields } = await resolveTemplateInput(catalog, taskName, inputName);

  if (template.trim() && format !== "text") {
    const example = generateExample(template, format);
    if (example !== template && userContent.trim() === example.trim()) {
      throw new ValidationError("Content validation failed", [
        "The content is the generated example; replace the placeholder values with your real configuration",
      ]);
    }
  }

  checkContent(userContent, format, requiredFields);

  const preview = previewContent(userContent, format);
  return {
    task_name: task.name,
    input_name: input.name,
    unique_input_id: uniqueInputId(task.name, input.name),
    data_type: input.dataType,
    format,
    is_file_type: isFileDataType(input.dataType),
    validated_content: userContent,
    content_preview: preview,
    matches_template: template.trim() !== "" && userContent.trim() === template.trim(),
    needs_final_confirmation: true,
    final_confirmation_message: `You provided this ${format.toUpperCase()} content:\n\n${preview}\n\nIs this correct? (yes/no)`,
  };
}

export async function confirmTemplateInput(
  catalog: TaskCatalog,
  uploader: FileUploader,
  ruleName: string,
  taskName: string,
  inputName: string,
  content: string
): Promise<TemplateConfirmation> {
  const { task, input, format, requiredFields } = await resolveTemplateInput(catalog, taskName, inputName);
  checkContent(content, format, requiredFields);

  const base: ConfirmedTemplateBase = {
    task_name: task.name,
    input_name: input.name,
    unique_input_id: uniqueInputId(task.name, input.name),
    data_type: input.dataType,
    format,
  };

  if (!isFileDataType(input.dataType)) {
    return { ...base, storage_type: "MEMORY", stored_content: content };
  }

  // Deterministic name: confirming the same input again overwrites the stored file.
  const uploaded = await uploader.upload({
    ruleName,
    fileName: `${task.name}_${input.name}${fileExtensionFor(format)}`,
    content,
  });
  return { ...base, storage_type: "FILE", ...uploaded };
}
