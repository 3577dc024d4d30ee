export const DATA_TYPES = [
  "STRING",
  "INT",
  "FLOAT",
  "BOOLEAN",
  "DATE",
  "DATETIME",
  "FILE",
  "HTTP_CONFIG",
] as const;

export type DataType = (typeof DATA_TYPES)[number];

export type ScalarValue = string | number | boolean;

export type ValueCheck =
  | { valid: true; value: ScalarValue }
  | { valid: false; error: string };

type DataTypeSpec = {
  label: string;
  fileShaped: boolean;
  validate: (raw: string) => ValueCheck;
};

const ALIASES: Record<string, DataType> = {
  INTEGER: "INT",
  BOOL: "BOOLEAN",
  DOUBLE: "FLOAT",
  NUMBER: "FLOAT",
  TEXT: "STRING",
  HTTPCONFIG: "HTTP_CONFIG",
};

const TRUE_WORDS = new Set(["true", "yes", "1"]);
const FALSE_WORDS = new Set(["false", "no", "0"]);

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(:(\d{2})(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/;

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

function checkDate(raw: string): ValueCheck {
  const match = DATE_RE.exec(raw);
  if (!match || !isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) {
    return { valid: false, error: `'${raw}' is not a valid date (expected YYYY-MM-DD)` };
  }
  return { valid: true, value: raw };
}

function checkDateTime(raw: string): ValueCheck {
  const match = DATETIME_RE.exec(raw);
  const invalid: ValueCheck = {
    valid: false,
    error: `'${raw}' is not a valid ISO 8601 datetime (expected YYYY-MM-DDTHH:MM:SS with optional zone)`,
  };
  if (!match) return invalid;
  const hour = Number(match[4]);
  const minute = Number(match[5]);
  const second = match[7] === undefined ? 0 : Number(match[7]);
  if (!isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) return invalid;
  if (hour > 23 || minute > 59 || second > 59) return invalid;
  return { valid: true, value: raw };
}

const SPECS: Record<DataType, DataTypeSpec> = {
  STRING: {
    label: "text",
    fileShaped: false,
    validate: (raw) => ({ valid: true, value: raw }),
  },
  INT: {
    label: "integer",
    fileShaped: false,
    validate: (raw) => {
      if (!INT_RE.test(raw)) return { valid: false, error: `'${raw}' is not a valid integer` };
      const value = Number.parseInt(raw, 10);
      return Number.isSafeInteger(value)
        ? { valid: true, value }
        : { valid: false, error: `'${raw}' is outside the safe integer range` };
    },
  },
  FLOAT: {
    label: "decimal number",
    fileShaped: false,
    validate: (raw) => {
      if (!FLOAT_RE.test(raw)) return { valid: false, error: `'${raw}' is not a valid number` };
      const value = Number.parseFloat(raw);
      return Number.isFinite(value)
        ? { valid: true, value }
        : { valid: false, error: `'${raw}' is too large to store as a number` };
    },
  },
  BOOLEAN: {
    label: "true/false",
    fileShaped: false,
    validate: (raw) => {
      const word = raw.toLowerCase();
      if (TRUE_WORDS.has(word)) return { valid: true, value: true };
      if (FALSE_WORDS.has(word)) return { valid: true, value: false };
      return { valid: false, error: `'${raw}' is not a boolean (use true/false, yes/no or 1/0)` };
    },
  },
  DATE: { label: "date (YYYY-MM-DD)", fileShaped: false, validate: checkDate },
  DATETIME: { label: "ISO 8601 datetime", fileShaped: false, validate: checkDateTime },
  FILE: {
    label: "file",
    fileShaped: true,
    validate: (raw) => (raw ? { valid: true, value: raw } : { valid: false, error: "File content is empty" }),
  },
  HTTP_CONFIG: {
    label: "HTTP configuration file",
    fileShaped: true,
    validate: (raw) =>
      raw ? { valid: true, value: raw } : { valid: false, error: "HTTP configuration content is empty" },
  },
};

function isDataType(value: string): value is DataType {
  return DATA_TYPES.some((type) => type === value);
}

// Catalog data types are free-form strings; anything unrecognised is treated as text.
export function parseDataType(raw: string | null | undefined): DataType {
  const normalized = (raw ?? "").trim().toUpperCase();
  if (isDataType(normalized)) return normalized;
  return ALIASES[normalized] ?? "STRING";
}

export function isFileDataType(type: DataType): boolean {
  return SPECS[type].fileShaped;
}

export function dataTypeLabel(type: DataType): string {
  return SPECS[type].label;
}

export function validateValue(raw: ScalarValue, type: DataType): ValueCheck {
  const text = typeof raw === "string" ? raw.trim() : String(raw);
  // Free text keeps its surrounding whitespace; every other type is trimmed first.
  return SPECS[type].validate(type === "STRING" && typeof raw === "string" ? raw : text);
}
