import { type DataType, type ScalarValue, parseDataType } from "./data-types.js";
import { type ClassifiedInput, splitUniqueInputId } from "./input-classifier.js";

export type CollectedTemplateFile = {
  file_url?: string;
  stored_content?: string;
  filename?: string;
  file_size?: number;
  format?: string;
  data_type?: string;
  required?: boolean;
  validated?: boolean;
};

export type CollectedParameter = {
  value?: ScalarValue | null;
  data_type?: string;
  required?: boolean;
};

export type CollectedInputs = {
  template_files: Record<string, CollectedTemplateFile>;
  parameter_values: Record<string, CollectedParameter>;
};

export type VerificationStatus = "✓ Validated" | "✓ Set" | "⚠ Missing" | "⚠ Needs validation" | "○ Skipped";

export type VerificationItem = {
  unique_input_id: string;
  task_name: string;
  input_name: string;
  kind: "template" | "parameter";
  status: VerificationStatus;
  required: boolean;
  value_preview: string;
};

export type RuleInputMeta = {
  name: string;
  dataType: DataType;
  required: boolean;
  defaultValue: ScalarValue;
};

export type NameCollision = {
  input_name: string;
  unique_input_ids: string[];
  kept: string;
};

export type VerificationReport = {
  items: VerificationItem[];
  structured_inputs: Record<string, ScalarValue>;
  inputs_meta: RuleInputMeta[];
  task_input_mapping: Record<string, string[]>;
  missing_inputs: string[];
  needs_validation: string[];
  skipped_inputs: string[];
  invalid_ids: string[];
  name_collisions: NameCollision[];
  summary: { total: number; validated: number; set: number; missing: number; skipped: number };
  ready_for_creation: boolean;
};

function preview(value: string): string {
  const flat = value.replace(/\s+/g, " ").trim();
  return flat.length > 60 ? `${flat.slice(0, 57)}...` : flat;
}

class ReportBuilder {
  readonly items: VerificationItem[] = [];
  readonly structured: Record<string, ScalarValue> = {};
  readonly meta = new Map<string, RuleInputMeta>();
  readonly mapping: Record<string, string[]> = {};
  readonly invalidIds: string[] = [];

  add(item: VerificationItem, value: ScalarValue | undefined, dataType: DataType): void {
    this.items.push(item);
    if (value === undefined) return;
    // Rule inputs are keyed by bare name: the entry processed last wins.
    this.structured[item.input_name] = value;
    this.meta.set(item.input_name, {
      name: item.input_name,
      dataType,
      required: item.required,
      defaultValue: value,
    });
    (this.mapping[item.input_name] ??= []).push(item.unique_input_id);
  }

  collisions(): NameCollision[] {
    return Object.entries(this.mapping)
      .filter(([, ids]) => new Set(ids).size > 1)
      .map(([name, ids]) => ({ input_name: name, unique_input_ids: ids, kept: ids[ids.length - 1] ?? "" }));
  }
}

function verifyTemplate(builder: ReportBuilder, id: string, entry: CollectedTemplateFile): void {
  const parts = splitUniqueInputId(id);
  if (!parts) {
    builder.invalidIds.push(id);
    return;
  }
  const required = entry.required ?? true;
  const value = entry.file_url || entry.stored_content || undefined;
  let status: VerificationStatus;
  if (value === undefined) status = required ? "⚠ Missing" : "○ Skipped";
  else if (entry.validated === false) status = "⚠ Needs validation";
  else status = "✓ Validated";

  const dataType = parseDataType(entry.data_type ?? (entry.file_url ? "FILE" : "STRING"));
  builder.add(
    {
      unique_input_id: id,
      task_name: parts.taskName,
      input_name: parts.inputName,
      kind: "template",
      status,
      required,
      value_preview: entry.file_url ?? (entry.stored_content ? preview(entry.stored_content) : ""),
    },
    value,
    dataType
  );
}

function verifyParameter(builder: ReportBuilder, id: string, entry: CollectedParameter): void {
  const parts = splitUniqueInputId(id);
  if (!parts) {
    builder.invalidIds.push(id);
    return;
  }
  const required = entry.required ?? true;
  const raw = entry.value;
  const value = raw === null || raw === undefined || raw === "" ? undefined : raw;
  let status: VerificationStatus;
  if (value === undefined) status = required ? "⚠ Missing" : "○ Skipped";
  else status = "✓ Set";

  builder.add(
    {
      unique_input_id: id,
      task_name: parts.taskName,
      input_name: parts.inputName,
      kind: "parameter",
      status,
      required,
      value_preview: value === undefined ? "" : preview(String(value)),
    },
    value,
    parseDataType(entry.data_type)
  );
}

// Declared inputs, when known, add the required ones nobody collected.
export function verifyCollectedInputs(collected: CollectedInputs, declared: ClassifiedInput[] = []): VerificationReport {
  const builder = new ReportBuilder();
  for (const [id, entry] of Object.entries(collected.template_files)) {
    verifyTemplate(builder, id, entry);
  }
  for (const [id, entry] of Object.entries(collected.parameter_values)) {
    verifyParameter(builder, id, entry);
  }

  const seen = new Set(builder.items.map((item) => item.unique_input_id));
  for (const input of declared) {
    if (!input.required || seen.has(input.unique_input_id)) continue;
    seen.add(input.unique_input_id);
    builder.items.push({
      unique_input_id: input.unique_input_id,
      task_name: input.task_name,
      input_name: input.input_name,
      kind: input.category,
      status: "⚠ Missing",
      required: true,
      value_preview: "",
    });
  }

  const idsWith = (status: VerificationStatus) =>
    builder.items.filter((item) => item.status === status).map((item) => item.unique_input_id);
  const missing = idsWith("⚠ Missing");
  const unvalidated = idsWith("⚠ Needs validation");
  const skipped = idsWith("○ Skipped");

  return {
    items: builder.items,
    structured_inputs: builder.structured,
    inputs_meta: Array.from(builder.meta.values()),
    task_input_mapping: builder.mapping,
    missing_inputs: missing,
    needs_validation: unvalidated,
    skipped_inputs: skipped,
    invalid_ids: builder.invalidIds,
    name_collisions: builder.collisions(),
    summary: {
      total: builder.items.length,
      validated: idsWith("✓ Validated").length,
      set: idsWith("✓ Set").length,
      missing: missing.length,
      skipped: skipped.length,
    },
    // Every ⚠ item blocks creation, not only the missing ones.
    ready_for_creation: missing.length === 0 && unvalidated.length === 0,
  };
}

export function renderVerification(report: VerificationReport): string {
  const lines = ["INPUT VERIFICATION:", ""];
  for (const item of report.items) {
    const value = item.value_preview ? `: ${item.value_preview}` : "";
    lines.push(`${item.status}  ${item.unique_input_id}${value}`);
  }
  if (report.name_collisions.length > 0) {
    lines.push("", "Shared input names (the last value is used):");
    for (const collision of report.name_collisions) {
      lines.push(`- ${collision.input_name}: ${collision.unique_input_ids.join(", ")} → ${collision.kept}`);
    }
  }
  if (report.invalid_ids.length > 0) {
    lines.push("", `Ignored identifiers without a task prefix: ${report.invalid_ids.join(", ")}`);
  }
  lines.push(
    "",
    `Total: ${report.summary.total}, validated: ${report.summary.validated}, set: ${report.summary.set}, ` +
      `missing: ${report.summary.missing}, skipped: ${report.summary.skipped}`
  );
  if (report.ready_for_creation) {
    lines.push("All required inputs are collected. Ready to create the rule.");
  }
  if (report.missing_inputs.length > 0) {
    lines.push(`Missing required inputs: ${report.missing_inputs.join(", ")}`);
  }
  if (report.needs_validation.length > 0) {
    lines.push(`Inputs that still need validation: ${report.needs_validation.join(", ")}`);
  }
  return lines.join("\n");
}
