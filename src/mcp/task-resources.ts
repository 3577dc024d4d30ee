import type { Task } from "../catalog/task-catalog.js";
import {
  categorizeTasks,
  decodeContent,
  extractCapabilities,
  extractPurpose,
  extractUseCases,
  taskAppType,
} from "../catalog/task-content.js";
import { NotFoundError } from "../errors.js";
import { classifyTaskInputs } from "../rules/input-classifier.js";
import type { ToolContext } from "./tool-context.js";

export type TaskSummary = {
  name: string;
  displayName: string;
  description: string;
  purpose: string;
  tags: string[];
  capabilities: string[];
  input_count: number;
  output_count: number;
  has_templates: boolean;
  app_type: string;
};

export function summarizeTask(task: Task): TaskSummary {
  const readme = decodeContent(task.readmeData);
  return {
    name: task.name,
    displayName: task.displayName || task.name,
    description: task.description,
    purpose: extractPurpose(task.description),
    tags: task.tags,
    capabilities: extractCapabilities(readme),
    input_count: task.inputs.length,
    output_count: task.outputs.length,
    has_templates: task.inputs.some((input) => input.templateFile.length > 0),
    app_type: taskAppType(task),
  };
}

export async function taskCatalogSummary(ctx: ToolContext) {
  const tasks = await ctx.catalog.listByTag();
  return {
    total_tasks: tasks.length,
    tasks: tasks.map(summarizeTask),
    categories: Object.fromEntries(categorizeTasks(tasks)),
  };
}

export async function taskDetails(ctx: ToolContext, taskName: string) {
  const task = await ctx.catalog.getTask(taskName);
  const readme = decodeContent(task.readmeData);
  return {
    ...summarizeTask(task),
    version: task.version,
    type: task.type,
    application_type: task.applicationType,
    app_tags: task.appTags,
    use_cases: extractUseCases(readme),
    inputs: classifyTaskInputs(task),
    outputs: task.outputs.map((output) => ({
      name: output.name,
      description: output.description,
      data_type: output.dataType,
    })),
    readme,
  };
}

export async function tasksInCategory(ctx: ToolContext, category: string) {
  const tasks = await ctx.catalog.listByTag();
  const names = categorizeTasks(tasks).get(category);
  if (!names) {
    throw new NotFoundError(`No tasks found in category '${category}'`);
  }
  return {
    category,
    tasks: tasks.filter((task) => names.includes(task.name)).map(summarizeTask),
  };
}
