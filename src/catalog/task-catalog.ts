import { z } from "zod";
import { type ApiClient, ENDPOINTS } from "../backend/api-client.js";
import { BackendError, NotFoundError } from "../errors.js";
import { parseDataType } from "../rules/data-types.js";

const text = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

const flag = (fallback: boolean) =>
  z
    .boolean()
    .nullish()
    .transform((value) => value ?? fallback);

const list = <T extends z.ZodTypeAny>(item: T) =>
  z
    .array(item)
    .nullish()
    .transform((value) => value ?? []);

const taskInputSchema = z.object({
  name: z.string(),
  description: text,
  dataType: z
    .string()
    .nullish()
    .transform((value) => parseDataType(value)),
  defaultValue: z
    .union([z.string(), z.number(), z.boolean()])
    .nullish()
    .transform((value) => (value === null || value === undefined ? "" : String(value))),
  showField: flag(true),
  required: flag(false),
  allowUserValues: flag(true),
  allowedValues: list(z.unknown()),
  templateFile: text,
  format: text,
});

const taskOutputSchema = z.object({
  name: z.string(),
  description: text,
  dataType: z
    .string()
    .nullish()
    .transform((value) => parseDataType(value)),
});

const appTagValue = z
  .union([z.array(z.string()), z.string()])
  .transform((value) => (Array.isArray(value) ? value : [value]));

export const taskSchema = z.object({
  name: z.string(),
  displayName: text,
  version: text,
  description: text,
  type: text,
  tags: list(z.string()),
  applicationType: text,
  inputs: list(taskInputSchema),
  outputs: list(taskOutputSchema),
  appTags: z
    .record(appTagValue)
    .nullish()
    .transform((value) => value ?? {}),
  readmeData: text,
});

const taskListSchema = z.object({
  items: list(taskSchema),
});

export type Task = z.output<typeof taskSchema>;
export type TaskInput = Task["inputs"][number];
export type TaskOutput = Task["outputs"][number];
export type TaskRecord = z.input<typeof taskSchema>;

// Passthrough to the backend task catalog. Nothing is cached: every call
// refetches so the agent always sees the current catalog.
export class TaskCatalog {
  constructor(private readonly api: ApiClient) {}

  async listByTag(tag = "primitive"): Promise<Task[]> {
    return this.fetch({ tags: tag });
  }

  async findTask(name: string): Promise<Task | undefined> {
    const items = await this.fetch({ name });
    return items.find((task) => task.name === name);
  }

  async getTask(name: string): Promise<Task> {
    const task = await this.findTask(name);
    if (!task) {
      throw new NotFoundError(`Task '${name}' not found in available tasks`);
    }
    return task;
  }

  async getTaskInput(taskName: string, inputName: string): Promise<{ task: Task; input: TaskInput }> {
    const task = await this.getTask(taskName);
    const input = task.inputs.find((candidate) => candidate.name === inputName);
    if (!input) {
      throw new NotFoundError(`Input ${inputName} not found in task ${taskName}`);
    }
    return { task, input };
  }

  private async fetch(params: { tags?: string; name?: string }): Promise<Task[]> {
    const response = await this.api.get(ENDPOINTS.tasks, params);
    const parsed = taskListSchema.safeParse(response);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new BackendError(
        `Malformed task catalog response${issue ? ` at ${issue.path.join(".")}: ${issue.message}` : ""}`
      );
    }
    return parsed.data.items;
  }
}
