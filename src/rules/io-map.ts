export type IoDirection = "Input" | "Output";

// "*" addresses the rule itself, "t<n>" the n-th task by alias.
export type IoAddress = {
  place: string;
  taskIndex?: number;
  direction: IoDirection;
  attribute: string;
};

export type IoMapEntry = {
  destination: IoAddress;
  source: IoAddress;
};

export type IoMapParse = { ok: true; entry: IoMapEntry } | { ok: false; error: string };

export type IoMapTask = {
  alias: string;
  inputs?: string[];
  outputs?: string[];
};

export type IoMapContext = {
  tasks: IoMapTask[];
  ruleInputs: string[];
  ruleOutputs: string[];
};

const TASK_PLACE_RE = /^t([1-9]\d*)$/;

export function formatIoAddress(address: IoAddress): string {
  return `${address.place}.${address.direction}.${address.attribute}`;
}

export function formatIoMapEntry(destination: IoAddress, source: IoAddress): string {
  return `${formatIoAddress(destination)}:=${formatIoAddress(source)}`;
}

function unquote(text: string): string {
  const trimmed = text.trim();
  const match = /^(["'])(.*)\1$/.exec(trimmed);
  return (match?.[2] ?? trimmed).trim();
}

function isDirection(value: string): value is IoDirection {
  return value === "Input" || value === "Output";
}

// PLACE.DIRECTION.ATTRIBUTE; the attribute is everything after the second dot.
export function parseIoAddress(text: string): IoAddress | undefined {
  const first = text.indexOf(".");
  const second = first < 0 ? -1 : text.indexOf(".", first + 1);
  if (first <= 0 || second < 0) return undefined;

  const place = text.slice(0, first);
  const direction = text.slice(first + 1, second);
  const attribute = text.slice(second + 1);
  if (!attribute || !isDirection(direction)) return undefined;

  if (place === "*") return { place, direction, attribute };
  const task = TASK_PLACE_RE.exec(place);
  if (!task) return undefined;
  return { place, taskIndex: Number(task[1]), direction, attribute };
}

export function parseIoMapEntry(raw: string): IoMapParse {
  const text = unquote(raw);
  const separator = text.indexOf(":=");
  if (separator < 0) {
    return { ok: false, error: `'${text}' is not of the form destination:=source` };
  }
  const destinationText = unquote(text.slice(0, separator));
  const sourceText = unquote(text.slice(separator + 2));
  const destination = parseIoAddress(destinationText);
  if (!destination) return { ok: false, error: `'${destinationText}' is not a valid address in '${text}'` };
  const source = parseIoAddress(sourceText);
  if (!source) return { ok: false, error: `'${sourceText}' is not a valid address in '${text}'` };
  return { ok: true, entry: { destination, source } };
}

function checkReference(address: IoAddress, context: IoMapContext, entry: string): string | undefined {
  const label = formatIoAddress(address);
  if (address.place === "*") {
    const names = address.direction === "Input" ? context.ruleInputs : context.ruleOutputs;
    return names.includes(address.attribute)
      ? undefined
      : `${label} in '${entry}' does not name a rule ${address.direction.toLowerCase()}`;
  }
  const task = context.tasks.find((candidate) => candidate.alias === address.place);
  if (!task) return `${label} in '${entry}' refers to unknown task alias ${address.place}`;
  // Tasks whose declaration is unknown are only checked by alias.
  const names = address.direction === "Input" ? task.inputs : task.outputs;
  if (names && !names.includes(address.attribute)) {
    return `${label} in '${entry}' does not name a declared ${address.direction.toLowerCase()} of ${task.alias}`;
  }
  return undefined;
}

export function validateIoMap(entries: string[], context: IoMapContext): string[] {
  const errors: string[] = [];
  for (const raw of entries) {
    const parsed = parseIoMapEntry(raw);
    if (!parsed.ok) {
      errors.push(parsed.error);
      continue;
    }
    const { destination, source } = parsed.entry;
    const text = formatIoMapEntry(destination, source);
    if (destination.place !== "*" && destination.direction === "Output") {
      errors.push(`${formatIoAddress(destination)} in '${text}' is a task output and cannot be a destination`);
    }
    for (const address of [destination, source]) {
      const problem = checkReference(address, context, text);
      if (problem) errors.push(problem);
    }
  }
  return errors;
}
