import type { TaskCatalog, TaskInput } from "../catalog/task-catalog.js";
import { ValidationError } from "../errors.js";
import { type DataType, type ScalarValue, dataTypeLabel, validateValue } from "./data-types.js";
import { isTemplateInput, uniqueInputId } from "./input-classifier.js";

export type ConfirmationType = "default" | "final";

type ParameterBase = {
  task_name: string;
  input_name: string;
  unique_input_id: string;
  data_type: DataType;
  description: string;
  required: boolean;
  allowed_values: unknown[];
};

export type ParameterCollection =
  | (ParameterBase & {
      status: "needs_default_confirmation";
      default_value: ScalarValue;
      confirmation_message: string;
    })
  | (ParameterBase & {
      status: "needs_final_confirmation";
      validated_value: ScalarValue;
      confirmation_message: string;
    })
  | (ParameterBase & {
      status: "needs_user_input";
      has_default: boolean;
      default_value: string | null;
      prompt: string;
    });

export type ParameterConfirmation = {
  task_name: string;
  input_name: string;
  unique_input_id: string;
  data_type: DataType;
  stored_value: ScalarValue;
  storage_type: "MEMORY";
  confirmation_type: ConfirmationType;
};

async function resolveParameterInput(catalog: TaskCatalog, taskName: string, inputName: string) {
  const { task, input } = await catalog.getTaskInput(taskName, inputName);
  if (isTemplateInput(input)) {
    throw new ValidationError(
      `Input ${inputName} of task ${taskName} is a template input; collect it with collect_template_input`
    );
  }
  const base: ParameterBase = {
    task_name: task.name,
    input_name: input.name,
    unique_input_id: uniqueInputId(task.name, input.name),
    data_type: input.dataType,
    description: input.description,
    required: input.required,
    allowed_values: input.allowedValues,
  };
  return { input, base };
}

function checkValue(input: TaskInput, raw: ScalarValue, subject: string): ScalarValue {
  if (input.required && typeof raw === "string" && !raw.trim()) {
    throw new ValidationError(`${subject} is required and cannot be blank`, [], {
      value: raw,
      expected_type: input.dataType,
    });
  }
  const check = validateValue(raw, input.dataType);
  if (!check.valid) {
    throw new ValidationError(`Invalid ${subject.toLowerCase()}: ${check.error}`, [check.error], {
      value: String(raw),
      expected_type: input.dataType,
    });
  }
  if (input.allowedValues.length > 0 && !input.allowUserValues) {
    const allowed = input.allowedValues.map(String);
    if (!allowed.includes(String(check.value))) {
      throw new ValidationError(`${subject} must be one of: ${allowed.join(", ")}`, [], {
        value: String(raw),
        expected_type: input.dataType,
      });
    }
  }
  return check.value;
}

function promptFor(input: TaskInput, base: ParameterBase): string {
  const lines = [`Please provide a value for ${base.unique_input_id} (${dataTypeLabel(input.dataType)}).`];
  if (input.description) lines.push(input.description);
  if (input.allowedValues.length > 0) lines.push(`Allowed values: ${input.allowedValues.map(String).join(", ")}`);
  if (input.defaultValue) lines.push(`Default value: ${input.defaultValue} (you can choose to use it)`);
  lines.push(input.required ? "This input is required." : "This input is optional.");
  return lines.join("\n");
}

export async function collectParameterInput(
  catalog: TaskCatalog,
  taskName: string,
  inputName: string,
  options: { value?: ScalarValue; useDefault?: boolean } = {}
): Promise<ParameterCollection> {
  const { input, base } = await resolveParameterInput(catalog, taskName, inputName);

  if (options.useDefault && input.defaultValue) {
    const value = checkValue(input, input.defaultValue, "Default value");
    return {
      ...base,
      status: "needs_default_confirmation",
      default_value: value,
      confirmation_message: `Use the default value '${String(value)}' for ${base.unique_input_id}? (yes/no)`,
    };
  }

  if (options.value !== undefined) {
    const value = checkValue(input, options.value, "Value");
    return {
      ...base,
      status: "needs_final_confirmation",
      validated_value: value,
      confirmation_message: `You entered '${String(value)}' for ${base.unique_input_id}. Is this correct? (yes/no)`,
    };
  }

  return {
    ...base,
    status: "needs_user_input",
    has_default: input.defaultValue.length > 0,
    default_value: input.defaultValue || null,
    prompt: promptFor(input, base),
  };
}

export async function confirmParameterInput(
  catalog: TaskCatalog,
  taskName: string,
  inputName: string,
  value: ScalarValue,
  confirmationType: ConfirmationType = "final"
): Promise<ParameterConfirmation> {
  const { input, base } = await resolveParameterInput(catalog, taskName, inputName);
  const stored = checkValue(input, value, "Value");

  if (confirmationType === "default") {
    if (!input.defaultValue) {
      throw new ValidationError(`Input ${inputName} of task ${taskName} has no default value`);
    }
    const declared = checkValue(input, input.defaultValue, "Default value");
    if (declared !== stored) {
      throw new ValidationError("Confirmed value does not match the declared default", [], {
        value: String(value),
        expected_default: input.defaultValue,
      });
    }
  }

  return {
    task_name: base.task_name,
    input_name: base.input_name,
    unique_input_id: base.unique_input_id,
    data_type: base.data_type,
    stored_value: stored,
    storage_type: "MEMORY",
    confirmation_type: confirmationType,
  };
}
