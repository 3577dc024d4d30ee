import type { AgentDefinition, McpServerConfig, Options, SDKMessage } from "@anthropic-ai/claude-agent-sdk";
import { isRecord } from "./backend/api-client.js";
import type { GatewayConfig } from "./config.js";
import { RULE_SERVER_NAME, createRuleMcpServer } from "./mcp/rule-server.js";
import type { ToolContext } from "./mcp/tool-context.js";
import { type SubagentConfig, subagents } from "./subagents/index.js";

export const RULE_TOOL_NAMES = [
  "prepare_input_collection_overview",
  "get_task_details",
  "get_template_guidance",
  "collect_template_input",
  "confirm_template_input",
  "collect_parameter_input",
  "confirm_parameter_input",
  "verify_collected_inputs",
  "determine_primary_app_type",
  "build_rule_structure",
  "create_rule",
  "upload_file",
  "start_rule_session",
  "get_rule_session",
  "reject_staged_input",
  "close_rule_session",
] as const;

export const ASSESSMENT_TOOL_NAMES = [
  "fetch_rule_readme",
  "list_assessments",
  "list_assessment_control_configs",
  "create_assessment",
  "fetch_recent_assessment_runs",
  "fetch_assessment_runs",
  "fetch_assessment_run_details",
  "fetch_assessment_run_leaf_controls",
  "fetch_run_controls",
  "fetch_run_control_meta_data",
  "fetch_assessment_run_leaf_control_evidence",
  "fetch_evidence_records",
  "fetch_available_control_actions",
  "execute_action",
  "create_control_config",
  "suggest_control_config_citations",
  "attach_citation_to_control_config",
  "fetch_control_source_summary",
  "get_evidence_sample_data",
  "get_assessment_context",
  "create_sql_rule_and_attach",
  "create_control_config_note",
] as const;

export const SERVER_TOOL_NAMES = [...RULE_TOOL_NAMES, ...ASSESSMENT_TOOL_NAMES];

export function mcpToolName(tool: string): string {
  return `mcp__${RULE_SERVER_NAME}__${tool}`;
}

export const RULE_ALLOWED_TOOLS = ["Task", ...SERVER_TOOL_NAMES.map(mcpToolName)];

export function buildSystemPrompt(config: GatewayConfig): string {
  return [
    "You help compliance engineers author rules for the compliance management system.",
    "A rule chains catalog tasks; each task input is either a template file or a parameter value.",
    "",
    "## Workflow",
    "",
    "1. Help the user pick tasks. Read the tasks://summary resource or call get_task_details.",
    "2. Call start_rule_session with the rule name and the chosen tasks, and show the overview presentation.",
    "3. Template inputs first: get_template_guidance, then collect_template_input with the user's own content,",
    "   then confirm_template_input once the user says yes. Never submit the example placeholders.",
    "4. Parameter inputs next: collect_parameter_input (offer the default when there is one),",
    "   then confirm_parameter_input.",
    "5. Call verify_collected_inputs. Continue only when ready_for_creation is true.",
    "6. Call determine_primary_app_type; ask the user when the result is ambiguous.",
    "7. Call build_rule_structure with structured_inputs and inputs_meta from verification, show rule_yaml,",
    "   and wait for approval.",
    "8. Call create_rule and report the rule id, then close_rule_session.",
    "",
    "## Assessments",
    "",
    "- Runs, run controls, evidence and records are read-only lookups; start from list_assessments.",
    "- Actions change state: fetch_available_control_actions, confirm the effect with the user, then execute_action.",
    "- SQL rule automation on a control config: suggest and attach a citation, fetch_control_source_summary,",
    "  get_evidence_sample_data, then create_sql_rule_and_attach and optionally create_control_config_note.",
    "- Write tools with a confirm flag return a preview first. Set confirm only after the user approves that preview,",
    "  never in the turn that first shows it. Never pick an assessment, control or citation for the user.",
    "- The workflow_knowledge prompt explains how workflows are built.",
    "",
    "## Rules",
    "",
    "- Refer to inputs by their unique id task_name.input_name; two tasks may share an input name.",
    "- Pass session_id to every collect, confirm and verify call once a session exists. A confirmation must repeat",
    "  exactly the value the user was shown.",
    "- Every tool result has success and next_action. On failure, show the error and follow next_action.",
    "- Ask one question at a time and confirm every value before storing it.",
    `- Rules are created with apiVersion ${config.ruleApiVersion}.`,
  ].join("\n");
}

function buildSubagentPrompt(agent: SubagentConfig): string {
  return [
    `You are the ${agent.name} subagent, part of a rule-authoring team.`,
    "",
    agent.purpose,
    "",
    "Use only your MCP tools. Return a short text report; the orchestrator talks to the user.",
  ].join("\n");
}

export function buildSubagentDefinitions(): Record<string, AgentDefinition> {
  return subagents.reduce<Record<string, AgentDefinition>>((acc, agent) => {
    acc[agent.name] = {
      description: agent.purpose,
      prompt: buildSubagentPrompt(agent),
      tools: agent.tools.map(mcpToolName),
      model: agent.model,
    };
    return acc;
  }, {});
}

export function buildRuleMcpServers(ctx: ToolContext): Record<string, McpServerConfig> {
  return { [RULE_SERVER_NAME]: createRuleMcpServer(ctx) };
}

// Options shared by every turn of a chat; `resume` continues the same conversation.
export function buildQueryOptions(ctx: ToolContext, resume?: string): Options {
  const { config } = ctx;
  return {
    model: config.model,
    systemPrompt: buildSystemPrompt(config),
    allowedTools: [...RULE_ALLOWED_TOOLS],
    permissionMode: "bypassPermissions",
    maxTurns: config.maxTurns,
    mcpServers: buildRuleMcpServers(ctx),
    includePartialMessages: true,
    ...(config.enableSubagents ? { agents: buildSubagentDefinitions() } : {}),
    ...(config.claudeCodeExecutable ? { pathToClaudeCodeExecutable: config.claudeCodeExecutable } : {}),
    ...(resume ? { resume } : {}),
  };
}

// Text deltas from partial assistant messages; tool-use and thinking events are skipped.
export function streamedText(message: SDKMessage): string | undefined {
  if (message.type !== "stream_event") return undefined;
  const event: unknown = message.event;
  if (!isRecord(event) || event.type !== "content_block_delta" || !isRecord(event.delta)) return undefined;
  const delta = event.delta;
  return delta.type === "text_delta" && typeof delta.text === "string" ? delta.text : undefined;
}
