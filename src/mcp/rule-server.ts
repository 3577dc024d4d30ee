import { createSdkMcpServer, tool } from "@anthropic-ai/claude-agent-sdk";
import { ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ruleStructureSchema } from "../schemas/rule-schema.js";
import { assessmentToolDefinitions } from "./assessment-tool-definitions.js";
import {
  buildRuleStructure,
  closeRuleSession,
  collectParameter,
  collectTemplate,
  confirmParameter,
  confirmTemplate,
  createRule,
  getRuleSession,
  getTaskDetails,
  prepareInputCollectionOverview,
  primaryAppType,
  rejectStagedInput,
  startRuleSession,
  templateGuidance,
  uploadFile,
  verifyInputs,
} from "./rule-tools.js";
import { taskCatalogSummary, taskDetails, tasksInCategory } from "./task-resources.js";
import type { ToolContext } from "./tool-context.js";
import { textResult } from "./tool-result.js";
import { registerWorkflowPrompt } from "./workflow-prompt.js";

export const RULE_SERVER_NAME = "rule-tools";

const scalarValue = z.union([z.string(), z.number(), z.boolean()]);

const collectedInputsSchema = z.object({
  template_files: z
    .record(
      z.object({
        file_url: z.string().optional(),
        stored_content: z.string().optional(),
        filename: z.string().optional(),
        file_size: z.number().optional(),
        format: z.string().optional(),
        data_type: z.string().optional(),
        required: z.boolean().optional(),
        validated: z.boolean().optional(),
      })
    )
    .default({}),
  parameter_values: z
    .record(
      z.object({
        value: scalarValue.nullable().optional(),
        data_type: z.string().optional(),
        required: z.boolean().optional(),
      })
    )
    .default({}),
});

const sessionId = z.string().optional().describe("Rule session id from start_rule_session; enables server-side tracking");

function jsonContents(uri: URL, payload: unknown) {
  return {
    contents: [{ uri: uri.href, mimeType: "application/json", text: JSON.stringify(payload, null, 2) }],
  };
}

function variable(value: string | string[] | undefined): string {
  const raw = Array.isArray(value) ? (value[0] ?? "") : (value ?? "");
  return decodeURIComponent(raw);
}

// In-process MCP server exposing the rule-authoring workflow and the
// assessment tools around it. Workflow sessions live in `ctx`, so servers
// built on one context share them.
export function createRuleMcpServer(ctx: ToolContext) {
  const server = createSdkMcpServer({
    name: RULE_SERVER_NAME,
    version: "0.1.0",
    tools: [
      // Overview of every input the selected tasks need, split into templates and parameters
      tool(
        "prepare_input_collection_overview",
        "Analyze the selected tasks and list every input to collect, template files first, with a time estimate.",
        {
          selected_tasks: z.array(z.string()).describe("Task names chosen for the rule"),
        },
        async (args) => textResult(await prepareInputCollectionOverview(ctx, args))
      ),
      tool(
        "get_task_details",
        "Return a task's description, README highlights, inputs and outputs.",
        {
          task_name: z.string(),
        },
        async (args) => textResult(await getTaskDetails(ctx, args))
      ),
      tool(
        "get_template_guidance",
        "Return the decoded template, required fields, a placeholder example and format rules for a template input.",
        {
          task_name: z.string(),
          input_name: z.string(),
        },
        async (args) => textResult(await templateGuidance(ctx, args))
      ),
      tool(
        "collect_template_input",
        "Validate user-provided template content (syntax and required fields) and stage it for confirmation.",
        {
          task_name: z.string(),
          input_name: z.string(),
          user_content: z.string().describe("Content exactly as the user provided it"),
          session_id: sessionId,
        },
        async (args) => textResult(await collectTemplate(ctx, args))
      ),
      // FILE and HTTP_CONFIG inputs are uploaded; everything else stays in memory
      tool(
        "confirm_template_input",
        "Store confirmed template content: upload file-type inputs, keep the rest in memory.",
        {
          rule_name: z.string(),
          task_name: z.string(),
          input_name: z.string(),
          confirmed_content: z.string(),
          session_id: sessionId,
        },
        async (args) => textResult(await confirmTemplate(ctx, args))
      ),
      tool(
        "collect_parameter_input",
        "Validate a parameter value against its data type, offer the default, or prompt for a value.",
        {
          task_name: z.string(),
          input_name: z.string(),
          user_value: scalarValue.optional(),
          use_default: z.boolean().optional(),
          session_id: sessionId,
        },
        async (args) => textResult(await collectParameter(ctx, args))
      ),
      tool(
        "confirm_parameter_input",
        "Store a confirmed parameter value.",
        {
          task_name: z.string(),
          input_name: z.string(),
          confirmed_value: scalarValue,
          confirmation_type: z.enum(["default", "final"]).optional(),
          session_id: sessionId,
        },
        async (args) => textResult(await confirmParameter(ctx, args))
      ),
      tool(
        "verify_collected_inputs",
        "Check collected inputs for completeness and build the rule-level inputs and inputsMeta__.",
        {
          collected_inputs: collectedInputsSchema.optional().describe("Stateless mode only; rejected together with session_id"),
          selected_tasks: z.array(z.string()).optional().describe("When given, required inputs nobody collected are reported missing"),
          session_id: sessionId,
        },
        async (args) => textResult(await verifyInputs(ctx, args))
      ),
      tool(
        "determine_primary_app_type",
        "Derive the rule's application type from the selected tasks' appType tags.",
        {
          selected_tasks: z.array(z.string()),
          chosen_app_type: z.string().optional(),
        },
        async (args) => textResult(await primaryAppType(ctx, args))
      ),
      tool(
        "build_rule_structure",
        "Assemble and validate the rule document without submitting it; returns a YAML preview.",
        {
          rule_structure: ruleStructureSchema,
        },
        async (args) => textResult(await buildRuleStructure(ctx, args))
      ),
      tool(
        "create_rule",
        "Assemble, validate and submit the rule. With session_id the inputs must match the session's confirmed inputs and are filled in when omitted.",
        {
          rule_structure: ruleStructureSchema,
          session_id: sessionId,
        },
        async (args) => textResult(await createRule(ctx, args))
      ),
      tool(
        "upload_file",
        "Upload arbitrary file content for a rule.",
        {
          rule_name: z.string(),
          file_name: z.string(),
          content: z.string(),
          content_encoding: z.enum(["utf-8", "base64"]).optional(),
        },
        async (args) => textResult(await uploadFile(ctx, args))
      ),
      tool(
        "start_rule_session",
        "Start a server-side session that tracks each input from collection to confirmation.",
        {
          rule_name: z.string(),
          selected_tasks: z.array(z.string()),
        },
        async (args) => textResult(await startRuleSession(ctx, args))
      ),
      tool(
        "get_rule_session",
        "Show a rule session's phase and the state of every input.",
        {
          session_id: z.string(),
        },
        async (args) => textResult(await getRuleSession(ctx, args))
      ),
      tool(
        "reject_staged_input",
        "Discard a staged value the user did not confirm.",
        {
          session_id: z.string(),
          unique_input_id: z.string().describe("task_name.input_name"),
        },
        async (args) => textResult(await rejectStagedInput(ctx, args))
      ),
      tool(
        "close_rule_session",
        "Discard a rule session once the rule is created or abandoned.",
        {
          session_id: z.string(),
        },
        async (args) => textResult(await closeRuleSession(ctx, args))
      ),
      ...assessmentToolDefinitions(ctx),
    ],
  });

  server.instance.registerResource(
    "tasks-summary",
    "tasks://summary",
    { title: "Task catalog summary", mimeType: "application/json" },
    async (uri) => jsonContents(uri, await taskCatalogSummary(ctx))
  );
  server.instance.registerResource(
    "task-details",
    new ResourceTemplate("tasks://details/{task_name}", { list: undefined }),
    { title: "Task details", mimeType: "application/json" },
    async (uri, variables) => jsonContents(uri, await taskDetails(ctx, variable(variables.task_name)))
  );
  server.instance.registerResource(
    "tasks-by-category",
    new ResourceTemplate("tasks://by-category/{category}", { list: undefined }),
    { title: "Tasks by category", mimeType: "application/json" },
    async (uri, variables) => jsonContents(uri, await tasksInCategory(ctx, variable(variables.category)))
  );

  registerWorkflowPrompt(server.instance);

  return server;
}
