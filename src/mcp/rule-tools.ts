import { ValidationError } from "../errors.js";
import type { RuleStructure } from "../schemas/rule-schema.js";
import { determinePrimaryAppType } from "../rules/app-type.js";
import type { ScalarValue } from "../rules/data-types.js";
import type { ContentEncoding } from "../rules/file-upload.js";
import {
  type ClassifiedInput,
  buildInputOverview,
  overviewInputs,
  renderOverview,
  uniqueInputId,
} from "../rules/input-classifier.js";
import { type ConfirmationType, collectParameterInput, confirmParameterInput } from "../rules/parameter-input.js";
import { type DeclaredTask, assembleRule, renderRuleYaml, submitRule } from "../rules/rule-assembler.js";
import { collectTemplateInput, confirmTemplateInput, getTemplateGuidance } from "../rules/template-input.js";
import {
  type CollectedInputs,
  type VerificationReport,
  renderVerification,
  verifyCollectedInputs,
} from "../rules/verification.js";
import type { RuleWorkflowSession } from "../rules/workflow-session.js";
import { taskDetails } from "./task-resources.js";
import type { ToolContext } from "./tool-context.js";
import { type ToolResult, runTool } from "./tool-result.js";

function sessionFor(ctx: ToolContext, sessionId: string | undefined): RuleWorkflowSession | undefined {
  return sessionId ? ctx.sessions.get(sessionId) : undefined;
}

export type OverviewRequest = { selected_tasks: string[] };

export async function prepareInputCollectionOverview(ctx: ToolContext, request: OverviewRequest): Promise<ToolResult> {
  return runTool("prepare_input_collection_overview", async () => {
    const overview = await buildInputOverview(ctx.catalog, request.selected_tasks);
    return {
      success: true,
      message: `Found ${overview.total_count} inputs across ${overview.selected_tasks.length} tasks`,
      ...overview,
      presentation: renderOverview(overview),
      next_action:
        "Show the presentation to the user and wait for their go-ahead, then collect template inputs first (get_template_guidance) and parameters after.",
    };
  });
}

export type TaskDetailsRequest = { task_name: string };

export async function getTaskDetails(ctx: ToolContext, request: TaskDetailsRequest): Promise<ToolResult> {
  return runTool("get_task_details", async () => ({
    success: true,
    message: `Details for task ${request.task_name}`,
    task: await taskDetails(ctx, request.task_name),
    next_action: "Use the task's inputs and outputs to plan the rule; call prepare_input_collection_overview once tasks are chosen.",
  }));
}

export type TemplateGuidanceRequest = { task_name: string; input_name: string };

export async function templateGuidance(ctx: ToolContext, request: TemplateGuidanceRequest): Promise<ToolResult> {
  return runTool("get_template_guidance", async () => {
    const guidance = await getTemplateGuidance(ctx.catalog, request.task_name, request.input_name);
    return {
      success: true,
      message: `Template guidance for ${guidance.unique_input_id}`,
      ...guidance,
      next_action:
        "Show the presentation to the user and ask them to paste their own content, then call collect_template_input.",
    };
  });
}

export type CollectTemplateRequest = {
  task_name: string;
  input_name: string;
  user_content: string;
  session_id?: string;
};

export async function collectTemplate(ctx: ToolContext, request: CollectTemplateRequest): Promise<ToolResult> {
  return runTool("collect_template_input", async () => {
    const session = sessionFor(ctx, request.session_id);
    const collected = await collectTemplateInput(ctx.catalog, request.task_name, request.input_name, request.user_content);
    session?.stage(collected.unique_input_id, { kind: "template", content: collected.validated_content });
    return {
      success: true,
      message: `Content for ${collected.unique_input_id} is valid ${collected.format.toUpperCase()}`,
      ...collected,
      next_action:
        "Show final_confirmation_message to the user. On yes call confirm_template_input with validated_content; on no ask for new content.",
    };
  });
}

export type ConfirmTemplateRequest = {
  rule_name: string;
  task_name: string;
  input_name: string;
  confirmed_content: string;
  session_id?: string;
};

export async function confirmTemplate(ctx: ToolContext, request: ConfirmTemplateRequest): Promise<ToolResult> {
  return runTool("confirm_template_input", async () => {
    const session = sessionFor(ctx, request.session_id);
    const ruleName = request.rule_name.trim() || session?.ruleName || "";
    // Checked before the upload so a rejected confirmation stores nothing.
    session?.assertConfirmable(uniqueInputId(request.task_name, request.input_name), {
      kind: "template",
      content: request.confirmed_content,
    });
    const confirmed = await confirmTemplateInput(
      ctx.catalog,
      ctx.files,
      ruleName,
      request.task_name,
      request.input_name,
      request.confirmed_content
    );
    if (confirmed.storage_type === "FILE") {
      session?.confirm(confirmed.unique_input_id, {
        kind: "template",
        content: request.confirmed_content,
        file_url: confirmed.file_url,
        filename: confirmed.filename,
        file_size: confirmed.file_size,
      });
    } else {
      session?.confirm(confirmed.unique_input_id, {
        kind: "template",
        content: request.confirmed_content,
        stored_content: confirmed.stored_content,
      });
    }
    return {
      success: true,
      message:
        confirmed.storage_type === "FILE"
          ? `Stored ${confirmed.unique_input_id} as ${confirmed.filename}`
          : `Stored ${confirmed.unique_input_id} in memory`,
      ...confirmed,
      next_action: "Record the stored value under its unique_input_id and move on to the next input.",
    };
  });
}

export type CollectParameterRequest = {
  task_name: string;
  input_name: string;
  user_value?: ScalarValue;
  use_default?: boolean;
  session_id?: string;
};

export async function collectParameter(ctx: ToolContext, request: CollectParameterRequest): Promise<ToolResult> {
  return runTool("collect_parameter_input", async () => {
    const session = sessionFor(ctx, request.session_id);
    const collected = await collectParameterInput(ctx.catalog, request.task_name, request.input_name, {
      value: request.user_value,
      useDefault: request.use_default,
    });
    switch (collected.status) {
      case "needs_default_confirmation":
        session?.stage(collected.unique_input_id, { kind: "parameter", value: collected.default_value });
        return {
          success: true,
          message: `Default value available for ${collected.unique_input_id}`,
          ...collected,
          next_action: "Ask the user to confirm the default; on yes call confirm_parameter_input with confirmation_type 'default'.",
        };
      case "needs_final_confirmation":
        session?.stage(collected.unique_input_id, { kind: "parameter", value: collected.validated_value });
        return {
          success: true,
          message: `Value for ${collected.unique_input_id} is valid`,
          ...collected,
          next_action: "Ask the user to confirm the value; on yes call confirm_parameter_input with validated_value.",
        };
      case "needs_user_input":
        return {
          success: true,
          message: `Waiting for a value for ${collected.unique_input_id}`,
          ...collected,
          next_action: "Show the prompt to the user and call collect_parameter_input again with their answer.",
        };
    }
  });
}

export type ConfirmParameterRequest = {
  task_name: string;
  input_name: string;
  confirmed_value: ScalarValue;
  confirmation_type?: ConfirmationType;
  session_id?: string;
};

export async function confirmParameter(ctx: ToolContext, request: ConfirmParameterRequest): Promise<ToolResult> {
  return runTool("confirm_parameter_input", async () => {
    const session = sessionFor(ctx, request.session_id);
    const confirmed = await confirmParameterInput(
      ctx.catalog,
      request.task_name,
      request.input_name,
      request.confirmed_value,
      request.confirmation_type ?? "final"
    );
    session?.confirm(confirmed.unique_input_id, { kind: "parameter", value: confirmed.stored_value });
    return {
      success: true,
      message: `Stored ${confirmed.unique_input_id} = ${String(confirmed.stored_value)}`,
      ...confirmed,
      next_action: "Record the stored value under its unique_input_id and move on to the next input.",
    };
  });
}

export type VerifyRequest = {
  collected_inputs?: CollectedInputs;
  selected_tasks?: string[];
  session_id?: string;
};

export async function verifyInputs(ctx: ToolContext, request: VerifyRequest): Promise<ToolResult> {
  return runTool("verify_collected_inputs", async () => {
    const session = sessionFor(ctx, request.session_id);
    let report: VerificationReport;
    if (session) {
      if (request.collected_inputs) {
        throw new ValidationError(
          "collected_inputs cannot be combined with session_id; the session verifies the inputs it confirmed"
        );
      }
      report = verifyCollectedInputs(session.toCollectedInputs(), session.declaredInputs());
      session.markVerified(report);
    } else {
      let declared: ClassifiedInput[] = [];
      if (request.selected_tasks && request.selected_tasks.length > 0) {
        declared = overviewInputs(await buildInputOverview(ctx.catalog, request.selected_tasks));
      }
      const collected: CollectedInputs = request.collected_inputs ?? { template_files: {}, parameter_values: {} };
      report = verifyCollectedInputs(collected, declared);
    }
    return {
      success: true,
      message: report.ready_for_creation ? "All required inputs are collected" : notReadyMessage(report),
      ...report,
      presentation: renderVerification(report),
      next_action: report.ready_for_creation
        ? "Show the presentation, then determine the primary app type and build the rule structure from structured_inputs and inputs_meta."
        : "Collect the missing inputs and validate the flagged ones before creating the rule.",
    };
  });
}

function notReadyMessage(report: VerificationReport): string {
  const parts: string[] = [];
  if (report.missing_inputs.length > 0) parts.push(`${report.missing_inputs.length} required input(s) are missing`);
  if (report.needs_validation.length > 0) parts.push(`${report.needs_validation.length} input(s) need validation`);
  return parts.join("; ");
}

async function declaredTasks(ctx: ToolContext, names: string[]): Promise<Map<string, DeclaredTask>> {
  const tasks = new Map<string, DeclaredTask>();
  for (const name of new Set(names)) {
    tasks.set(name, await ctx.catalog.getTask(name));
  }
  return tasks;
}

export type AppTypeRequest = { selected_tasks: string[]; chosen_app_type?: string };

export async function primaryAppType(ctx: ToolContext, request: AppTypeRequest): Promise<ToolResult> {
  return runTool("determine_primary_app_type", async () => {
    const tasks = await declaredTasks(ctx, request.selected_tasks);
    const resolution = determinePrimaryAppType(Array.from(tasks.values()), request.chosen_app_type);
    return {
      success: true,
      message:
        resolution.status === "ambiguous"
          ? "Several app types are in use"
          : `Primary app type is ${resolution.app_type}`,
      ...resolution,
      next_action:
        resolution.status === "ambiguous"
          ? "Ask the user which app type the rule should carry, then call again with chosen_app_type."
          : "Use app_type when building the rule structure.",
    };
  });
}

export type RuleStructureRequest = { rule_structure: RuleStructure; session_id?: string };

export async function buildRuleStructure(ctx: ToolContext, request: RuleStructureRequest): Promise<ToolResult> {
  return runTool("build_rule_structure", async () => {
    const tasks = await declaredTasks(ctx, request.rule_structure.tasks.map((task) => task.name));
    const document = assembleRule(request.rule_structure, {
      apiVersion: ctx.config.ruleApiVersion,
      declaredTasks: tasks,
    });
    return {
      success: true,
      message: `Rule ${document.meta.name} is ready for review`,
      rule: document,
      rule_yaml: renderRuleYaml(document),
      next_action: "Show rule_yaml to the user and ask for approval before calling create_rule.",
    };
  });
}

// A session-backed rule carries exactly the inputs the session confirmed;
// missing inputs and inputs_meta are filled in from the verification report.
function withSessionInputs(structure: RuleStructure, session: RuleWorkflowSession): RuleStructure {
  const report = verifyCollectedInputs(session.toCollectedInputs(), session.declaredInputs());
  const expected = new Map(Object.entries(report.structured_inputs));
  const inputs_meta = structure.inputs_meta ?? report.inputs_meta;
  if (!structure.inputs) {
    return { ...structure, inputs: report.structured_inputs, inputs_meta };
  }

  const given = new Map(Object.entries(structure.inputs));
  const problems: string[] = [];
  for (const [name, value] of expected) {
    if (!given.has(name)) {
      problems.push(`${name}: confirmed in the session but missing from inputs`);
    } else if (given.get(name) !== value) {
      problems.push(`${name}: session has ${JSON.stringify(value)}, inputs have ${JSON.stringify(given.get(name))}`);
    }
  }
  for (const name of given.keys()) {
    if (!expected.has(name)) problems.push(`${name}: not confirmed in the session`);
  }
  if (problems.length > 0) {
    throw new ValidationError(`Rule inputs do not match the inputs confirmed in session ${session.id}`, problems);
  }
  return { ...structure, inputs_meta };
}

export async function createRule(ctx: ToolContext, request: RuleStructureRequest): Promise<ToolResult> {
  return runTool("create_rule", async () => {
    const session = sessionFor(ctx, request.session_id);
    if (session && session.phase !== "verified") {
      throw new ValidationError(
        `Session ${session.id} is in phase '${session.phase}'; verify the collected inputs before creating the rule`
      );
    }
    const structure = session ? withSessionInputs(request.rule_structure, session) : request.rule_structure;
    const tasks = await declaredTasks(ctx, structure.tasks.map((task) => task.name));
    const document = assembleRule(structure, {
      apiVersion: ctx.config.ruleApiVersion,
      declaredTasks: tasks,
    });
    const submission = await submitRule(ctx.api, document);
    session?.markAssembled(submission.rule_id);
    return {
      success: true,
      message: `Rule ${document.meta.name} created`,
      ...submission,
      rule_name: document.meta.name,
      next_action: "Tell the user the rule was created and share rule_id, then call close_rule_session.",
    };
  });
}

export type UploadFileRequest = {
  rule_name: string;
  file_name: string;
  content: string;
  content_encoding?: ContentEncoding;
};

export async function uploadFile(ctx: ToolContext, request: UploadFileRequest): Promise<ToolResult> {
  return runTool("upload_file", async () => {
    const uploaded = await ctx.files.upload({
      ruleName: request.rule_name,
      fileName: request.file_name,
      content: request.content,
      encoding: request.content_encoding,
    });
    return {
      success: true,
      message: `Uploaded ${uploaded.filename}`,
      ...uploaded,
      next_action: "Use file_url wherever the rule needs this file.",
    };
  });
}

export type StartSessionRequest = { rule_name: string; selected_tasks: string[] };

export async function startRuleSession(ctx: ToolContext, request: StartSessionRequest): Promise<ToolResult> {
  return runTool("start_rule_session", async () => {
    if (!request.rule_name.trim()) {
      throw new ValidationError("Rule name is required to start a session");
    }
    const overview = await buildInputOverview(ctx.catalog, request.selected_tasks);
    const session = ctx.sessions.create(request.rule_name.trim(), overview);
    return {
      success: true,
      message: `Started session ${session.id} for rule ${session.ruleName}`,
      ...session.snapshot(),
      overview,
      presentation: renderOverview(overview),
      next_action: "Pass session_id to every collect, confirm and verify call for this rule.",
    };
  });
}

export type SessionRequest = { session_id: string };

export async function getRuleSession(ctx: ToolContext, request: SessionRequest): Promise<ToolResult> {
  return runTool("get_rule_session", async () => {
    const snapshot = ctx.sessions.get(request.session_id).snapshot();
    const pending = snapshot.inputs.filter((input) => input.state !== "confirmed").map((input) => input.unique_input_id);
    return {
      success: true,
      message: `Session ${snapshot.session_id} is in phase ${snapshot.phase}`,
      ...snapshot,
      next_action:
        pending.length > 0
          ? `Continue with the unconfirmed inputs: ${pending.join(", ")}`
          : "All inputs are confirmed; call verify_collected_inputs with this session_id.",
    };
  });
}

export type RejectStagedRequest = { session_id: string; unique_input_id: string };

export async function rejectStagedInput(ctx: ToolContext, request: RejectStagedRequest): Promise<ToolResult> {
  return runTool("reject_staged_input", async () => {
    const session = ctx.sessions.get(request.session_id);
    session.reject(request.unique_input_id);
    return {
      success: true,
      message: `Discarded the staged value for ${request.unique_input_id}`,
      unique_input_id: request.unique_input_id,
      state: session.stateOf(request.unique_input_id),
      next_action: "Ask the user for a new value for this input.",
    };
  });
}

export async function closeRuleSession(ctx: ToolContext, request: SessionRequest): Promise<ToolResult> {
  return runTool("close_rule_session", async () => {
    const snapshot = ctx.sessions.close(request.session_id);
    return {
      success: true,
      message: `Closed session ${snapshot.session_id} in phase ${snapshot.phase}`,
      ...snapshot,
      next_action: "The session is gone; start a new one to author another rule.",
    };
  });
}
