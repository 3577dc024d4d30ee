import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { parse as parseToml, stringify as stringifyToml } from "smol-toml";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { isRecord } from "../backend/api-client.js";
import { ValidationError, errorMessage } from "../errors.js";

export type TemplateFormat = "json" | "yaml" | "toml" | "xml" | "text";

const FORMAT_ALIASES: Record<string, TemplateFormat> = {
  json: "json",
  yaml: "yaml",
  yml: "yaml",
  toml: "toml",
  xml: "xml",
};

const EXTENSIONS: Record<TemplateFormat, string> = {
  json: ".json",
  yaml: ".yaml",
  toml: ".toml",
  xml: ".xml",
  text: ".txt",
};

const VALIDATION_RULES: Record<TemplateFormat, string[]> = {
  json: [
    "Must be valid JSON: double-quoted keys and strings, no trailing commas",
    "Objects use {} and arrays use []; arrays of objects are validated item by item",
    "Every top-level field from the template must be present",
  ],
  yaml: [
    "Indentation must be consistent and use spaces, not tabs",
    "Use 'key: value' pairs; list items start with '- '",
    "Every top-level field from the template must be present",
  ],
  toml: [
    "Sections are declared as [section_name]",
    "Use 'key = value' pairs; strings must be quoted",
    "Every top-level key or section from the template must be present",
  ],
  xml: [
    "Must be well-formed XML with a single root element",
    "Every opening tag needs a matching closing tag",
    "Every child element of the template's root must be present",
  ],
  text: ["Any non-empty text is accepted"],
};

export function parseTemplateFormat(raw: string | null | undefined): TemplateFormat {
  return FORMAT_ALIASES[(raw ?? "").trim().toLowerCase()] ?? "text";
}

export function fileExtensionFor(format: TemplateFormat): string {
  return EXTENSIONS[format];
}

export function validationRulesFor(format: TemplateFormat): string[] {
  return VALIDATION_RULES[format];
}

export function parseContent(content: string, format: TemplateFormat): unknown {
  if (!content.trim()) {
    throw new ValidationError("Content validation failed", ["Content is empty"]);
  }
  switch (format) {
    case "json":
      return parseWith("JSON", () => JSON.parse(content));
    case "yaml":
      return parseWith("YAML", () => parseYaml(content));
    case "toml":
      return parseWith("TOML", () => parseToml(content));
    case "xml": {
      const result = XMLValidator.validate(content);
      if (result !== true) {
        throw new ValidationError("Content validation failed", [
          `Invalid XML: ${result.err.msg} (line ${result.err.line}, column ${result.err.col})`,
        ]);
      }
      return new XMLParser({ ignoreDeclaration: true }).parse(content);
    }
    case "text":
      return content;
  }
}

function parseWith(label: string, parse: () => unknown): unknown {
  try {
    return parse();
  } catch (error) {
    throw new ValidationError("Content validation failed", [`Invalid ${label}: ${errorMessage(error)}`]);
  }
}

// The node whose keys are the template's fields. For XML that is the root
// element's body rather than the document wrapper.
function structuralRoot(parsed: unknown, format: TemplateFormat): unknown {
  if (format !== "xml") return parsed;
  if (!isRecord(parsed)) return undefined;
  const [rootName] = Object.keys(parsed);
  return rootName === undefined ? undefined : parsed[rootName];
}

export function extractRequiredFields(template: string, format: TemplateFormat): string[] {
  if (format === "text") return [];
  let parsed: unknown;
  try {
    parsed = parseContent(template, format);
  } catch {
    return [];
  }
  const root = structuralRoot(parsed, format);
  if (Array.isArray(root)) {
    const first: unknown = root[0];
    return isRecord(first) ? Object.keys(first) : [];
  }
  return isRecord(root) ? Object.keys(root) : [];
}

function missingFields(node: Record<string, unknown>, required: string[]): string[] {
  return required.filter((field) => !(field in node));
}

export function checkContent(content: string, format: TemplateFormat, requiredFields: string[]): unknown {
  const parsed = parseContent(content, format);
  if (requiredFields.length === 0) return parsed;

  const root = structuralRoot(parsed, format);
  const errors: string[] = [];
  if (Array.isArray(root)) {
    if (root.length === 0) {
      errors.push(`Array is empty; each item needs: ${requiredFields.join(", ")}`);
    }
    root.forEach((item: unknown, index) => {
      if (!isRecord(item)) {
        errors.push(`Item ${index + 1} is not an object`);
        return;
      }
      const missing = missingFields(item, requiredFields);
      if (missing.length > 0) {
        errors.push(`Item ${index + 1} is missing required field(s): ${missing.join(", ")}`);
      }
    });
  } else if (isRecord(root)) {
    const missing = missingFields(root, requiredFields);
    if (missing.length > 0) {
      errors.push(`Missing required field(s): ${missing.join(", ")}`);
    }
  } else {
    errors.push(`Content must be a ${format.toUpperCase()} structure with fields: ${requiredFields.join(", ")}`);
  }

  if (errors.length > 0) {
    throw new ValidationError("Content validation failed", errors);
  }
  return parsed;
}

function placeholder(value: unknown, key: string): unknown {
  if (typeof value === "string") return `example-${key}`;
  if (typeof value === "number") return 0;
  if (typeof value === "boolean") return false;
  if (value instanceof Date) return value;
  if (Array.isArray(value)) {
    return value.length > 0 ? [placeholder(value[0], key)] : [];
  }
  if (isRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([name, child]) => [name, placeholder(child, name)]));
  }
  return value;
}

// Same shape as the template with every leaf replaced by a neutral
// placeholder, serialized in the template's own format.
export function generateExample(template: string, format: TemplateFormat): string {
  if (format === "text") return template;
  let parsed: unknown;
  try {
    parsed = parseContent(template, format);
  } catch {
    return template;
  }
  const example = placeholder(parsed, "value");
  switch (format) {
    case "json":
      return JSON.stringify(example, null, 2);
    case "yaml":
      return stringifyYaml(example);
    case "toml":
      return isRecord(example) ? stringifyToml(example) : template;
    case "xml": {
      const xml: string = new XMLBuilder({ format: true, indentBy: "  " }).build(example);
      return xml.trim();
    }
  }
}

export function previewContent(content: string, format: TemplateFormat, limit = 500): string {
  let preview = content.trim();
  if (format === "json") {
    try {
      preview = JSON.stringify(JSON.parse(content), null, 2);
    } catch {
      // keep the raw text
    }
  }
  if (preview.length <= limit) return preview;
  return `${preview.slice(0, limit)}\n... (${preview.length - limit} more characters)`;
}
