import { type ActionExecution, executeAction, fetchAvailableActions } from "../assessments/actions.js";
import {
  type AssessmentFilters,
  fetchRuleReadme,
  listAssessmentControls,
  listAssessments,
} from "../assessments/assessments.js";
import {
  attachCitation,
  createAssessment,
  createControlConfig,
  createControlNote,
  createSqlRule,
  fetchAssessmentContext,
  fetchControlSourceSummary,
  fetchEvidenceSamples,
  suggestControlCitations,
} from "../assessments/control-configs.js";
import {
  fetchAssessmentRuns,
  fetchEvidenceRecords,
  fetchRecentAssessmentRuns,
  fetchRunControlEvidence,
  fetchRunControlPlanData,
  fetchRunDetails,
  fetchRunLeafControls,
  searchRunControls,
} from "../assessments/runs.js";
import type { ToolContext } from "./tool-context.js";
import { type ToolResult, runTool } from "./tool-result.js";

const AWAIT_CONFIRMATION = "Show the preview to the user. Call again with confirm true only after they approve it.";

export type RuleReadmeRequest = { name: string };

export async function ruleReadme(ctx: ToolContext, request: RuleReadmeRequest): Promise<ToolResult> {
  return runTool("fetch_rule_readme", async () => ({
    success: true,
    message: `README for rule ${request.name}`,
    ...(await fetchRuleReadme(ctx.api, request.name)),
    next_action: "Summarize the README for the user.",
  }));
}

export type ListAssessmentsRequest = {
  category_id?: string;
  category_name_contains?: string;
  name_contains?: string;
};

export async function assessments(ctx: ToolContext, request: ListAssessmentsRequest): Promise<ToolResult> {
  return runTool("list_assessments", async () => {
    const filters: AssessmentFilters = {
      categoryId: request.category_id,
      categoryNameContains: request.category_name_contains,
      nameContains: request.name_contains,
    };
    const items = await listAssessments(ctx.api, filters);
    return {
      success: true,
      message: `Found ${items.length} assessments`,
      assessments: items,
      next_action: "Ask the user which assessment the rule should be attached to.",
    };
  });
}

export type AssessmentRequest = { assessment_id: string };

export async function assessmentControls(ctx: ToolContext, request: AssessmentRequest): Promise<ToolResult> {
  return runTool("list_assessment_control_configs", async () => {
    const page = await listAssessmentControls(ctx.api, request.assessment_id, ctx.config.maxControlPages);
    return {
      success: true,
      message: `Found ${page.controls.length} controls`,
      ...page,
      next_action: page.truncated
        ? "Tell the user the control list was cut off and ask them to narrow the search."
        : "Ask the user which control the rule should cover.",
    };
  });
}

export type CreateAssessmentRequest = { yaml_content: string };

export async function newAssessment(ctx: ToolContext, request: CreateAssessmentRequest): Promise<ToolResult> {
  return runTool("create_assessment", async () => {
    const created = await createAssessment(ctx.api, request.yaml_content);
    return {
      success: true,
      message: `Created assessment ${created.assessment_id} in category ${created.category_name}`,
      ...created,
      next_action: "Tell the user the assessment was created; offer to add control configs to it.",
    };
  });
}

// --- runs, run controls and evidence -------------------------------------

export async function recentAssessmentRuns(ctx: ToolContext, request: AssessmentRequest): Promise<ToolResult> {
  return runTool("fetch_recent_assessment_runs", async () => {
    const runs = await fetchRecentAssessmentRuns(ctx.api, request.assessment_id);
    return {
      success: true,
      message: `Found ${runs.length} recent runs`,
      runs,
      next_action: "Ask the user which run to inspect, then call fetch_assessment_run_leaf_controls.",
    };
  });
}

export type AssessmentRunsRequest = AssessmentRequest & { page?: number; page_size?: number };

export async function assessmentRuns(ctx: ToolContext, request: AssessmentRunsRequest): Promise<ToolResult> {
  return runTool("fetch_assessment_runs", async () => {
    const page = await fetchAssessmentRuns(ctx.api, request.assessment_id, request.page, request.page_size);
    return {
      success: true,
      message: `Found ${page.runs.length} runs on page ${page.page}`,
      ...page,
      next_action:
        page.runs.length === page.page_size
          ? "More runs may exist; call again with the next page if the user asks."
          : "Ask the user which run to inspect.",
    };
  });
}

export type RunRequest = { run_id: string };

export async function runDetails(ctx: ToolContext, request: RunRequest): Promise<ToolResult> {
  return runTool("fetch_assessment_run_details", async () => {
    const controls = await fetchRunDetails(ctx.api, request.run_id);
    return {
      success: true,
      message: `Run ${request.run_id} has ${controls.length} leaf controls`,
      controls,
      next_action: "Summarize the run's controls and their compliance status for the user.",
    };
  });
}

export async function runLeafControls(ctx: ToolContext, request: RunRequest): Promise<ToolResult> {
  return runTool("fetch_assessment_run_leaf_controls", async () => {
    const controls = await fetchRunLeafControls(ctx.api, request.run_id);
    return {
      success: true,
      message: `Run ${request.run_id} has ${controls.length} leaf controls`,
      controls,
      next_action: "Ask the user which control to inspect, then call fetch_assessment_run_leaf_control_evidence.",
    };
  });
}

export type RunControlSearchRequest = { control_name: string };

export async function runControls(ctx: ToolContext, request: RunControlSearchRequest): Promise<ToolResult> {
  return runTool("fetch_run_controls", async () => {
    const controls = await searchRunControls(ctx.api, request.control_name);
    return {
      success: true,
      message: `Found ${controls.length} run controls matching '${request.control_name}'`,
      controls,
      next_action: "Ask the user which run control they mean.",
    };
  });
}

export type RunControlRequest = { run_control_id: string };

export async function runControlMetadata(ctx: ToolContext, request: RunControlRequest): Promise<ToolResult> {
  return runTool("fetch_run_control_meta_data", async () => ({
    success: true,
    message: `Plan data for run control ${request.run_control_id}`,
    plan_data: await fetchRunControlPlanData(ctx.api, request.run_control_id),
    next_action: "Use the plan data to explain the control's configuration to the user.",
  }));
}

export async function runControlEvidence(ctx: ToolContext, request: RunControlRequest): Promise<ToolResult> {
  return runTool("fetch_assessment_run_leaf_control_evidence", async () => {
    const evidence = await fetchRunControlEvidence(ctx.api, request.run_control_id);
    return {
      success: true,
      message: `Run control ${request.run_control_id} has ${evidence.length} evidence files`,
      evidence,
      next_action: "Ask the user which evidence to open, then call fetch_evidence_records.",
    };
  });
}

export type EvidenceRecordsRequest = { evidence_id: string };

export async function evidenceRecords(ctx: ToolContext, request: EvidenceRecordsRequest): Promise<ToolResult> {
  return runTool("fetch_evidence_records", async () => {
    const records = await fetchEvidenceRecords(ctx.api, request.evidence_id);
    return {
      success: true,
      message: `Evidence ${request.evidence_id} has ${records.length} records`,
      records,
      next_action: "Summarize the records' compliance status for the user.",
    };
  });
}

// --- actions -------------------------------------------------------------

export type AvailableActionsRequest = {
  assessment_name: string;
  control_number?: string;
  control_alias?: string;
  evidence_name?: string;
};

export async function availableActions(ctx: ToolContext, request: AvailableActionsRequest): Promise<ToolResult> {
  return runTool("fetch_available_control_actions", async () => {
    const actions = await fetchAvailableActions(ctx.api, {
      assessmentName: request.assessment_name,
      controlNumber: request.control_number,
      controlAlias: request.control_alias,
      evidenceName: request.evidence_name,
    });
    return {
      success: true,
      message: `Found ${actions.length} actions`,
      actions,
      next_action: "Ask the user which action to run and confirm its effect before calling execute_action.",
    };
  });
}

export type ExecuteActionRequest = {
  assessment_id: string;
  assessment_run_id: string;
  action_binding_id: string;
  assessment_run_control_id?: string;
  assessment_run_control_evidence_id?: string;
  evidence_record_ids?: string[];
};

export async function runAction(ctx: ToolContext, request: ExecuteActionRequest): Promise<ToolResult> {
  return runTool("execute_action", async () => {
    const execution: ActionExecution = {
      assessmentId: request.assessment_id,
      assessmentRunId: request.assessment_run_id,
      actionBindingId: request.action_binding_id,
      assessmentRunControlId: request.assessment_run_control_id,
      assessmentRunControlEvidenceId: request.assessment_run_control_evidence_id,
      evidenceRecordIds: request.evidence_record_ids,
    };
    const executed = await executeAction(ctx.api, execution);
    return {
      success: true,
      message: `Triggered ${executed.level}-level action ${request.action_binding_id}`,
      ...executed,
      next_action: "Tell the user the action was triggered and what it will do.",
    };
  });
}

// --- control configs, citations and SQL rules ----------------------------

export type CreateControlConfigRequest = {
  assessment_id: string;
  name: string;
  alias?: string;
  control_number?: string;
  description?: string;
};

export async function newControlConfig(ctx: ToolContext, request: CreateControlConfigRequest): Promise<ToolResult> {
  return runTool("create_control_config", async () => {
    const control = await createControlConfig(ctx.api, {
      assessmentId: request.assessment_id,
      name: request.name,
      alias: request.alias,
      controlNumber: request.control_number,
      description: request.description,
    });
    return {
      success: true,
      message: `Created control config ${control.id}`,
      control,
      next_action: "Suggest citations for the new control with suggest_control_config_citations.",
    };
  });
}

export type SuggestCitationsRequest = {
  assessment_id: string;
  control_name: string;
  description?: string;
  control_id?: string;
};

export async function citationSuggestions(ctx: ToolContext, request: SuggestCitationsRequest): Promise<ToolResult> {
  return runTool("suggest_control_config_citations", async () => {
    const suggestions = await suggestControlCitations(ctx.api, {
      assessmentId: request.assessment_id,
      controlName: request.control_name,
      description: request.description,
      controlId: request.control_id,
    });
    const count = suggestions.items.reduce((total, item) => total + item.suggestions.length, 0);
    return {
      success: true,
      message: `Found ${count} suggested citations from ${suggestions.authority_document || "the default authority document"}`,
      ...suggestions,
      next_action:
        "Let the user pick one suggestion, then preview it with attach_citation_to_control_config. Never pick for them.",
    };
  });
}

export type AttachCitationRequest = {
  assessment_id: string;
  control_id: string;
  authority_document: string;
  control_ids_in_authority_document: string[];
  sort_id: string;
  control_names: string[];
  confirm?: boolean;
};

export async function citationAttachment(ctx: ToolContext, request: AttachCitationRequest): Promise<ToolResult> {
  return runTool("attach_citation_to_control_config", async () => {
    const attached = await attachCitation(
      ctx.api,
      {
        assessmentId: request.assessment_id,
        controlId: request.control_id,
        authorityDocument: request.authority_document,
        controlIdsInAuthorityDocument: request.control_ids_in_authority_document,
        sortId: request.sort_id,
        controlNames: request.control_names,
      },
      request.confirm ?? false
    );
    if (attached.status === "preview") {
      return {
        success: true,
        message: "Confirmation required before attaching the citation",
        ...attached,
        next_action: AWAIT_CONFIRMATION,
      };
    }
    return {
      success: true,
      message: `Attached ${attached.citations.length} citation(s) to control ${request.control_id}`,
      ...attached,
      next_action: "Call fetch_control_source_summary for the control to see its linked evidence.",
    };
  });
}

export type ControlRequest = { control_id: string };

export async function controlSourceSummary(ctx: ToolContext, request: ControlRequest): Promise<ToolResult> {
  return runTool("fetch_control_source_summary", async () => {
    const { summary, has_lineage } = await fetchControlSourceSummary(ctx.api, request.control_id);
    return {
      success: true,
      message: has_lineage
        ? `Control ${request.control_id} is linked to evidence configs`
        : `No evidence configs are linked to control ${request.control_id}`,
      summary,
      has_lineage,
      next_action: has_lineage
        ? "Call get_evidence_sample_data for the linked evidence before drafting a SQL rule."
        : "Stop SQL rule generation: the control has a citation but no linked evidence configs. Tell the user.",
    };
  });
}

export type EvidenceSampleRequest = { control_config_id: string; evidence_names?: string[]; records?: number };

export async function evidenceSamples(ctx: ToolContext, request: EvidenceSampleRequest): Promise<ToolResult> {
  return runTool("get_evidence_sample_data", async () => {
    const samples = await fetchEvidenceSamples(ctx.api, {
      controlConfigId: request.control_config_id,
      evidenceNames: request.evidence_names,
      records: request.records,
    });
    return {
      success: true,
      message: `Fetched samples for ${samples.evidences.length} evidence configs`,
      ...samples,
      next_action:
        samples.evidences.length > 0
          ? "Draft the SQL rule from the samples and preview it with create_sql_rule_and_attach."
          : "No samples exist; draft the SQL rule from the evidence schema or ask the user for sample rows.",
    };
  });
}

export async function assessmentContext(ctx: ToolContext): Promise<ToolResult> {
  return runTool("get_assessment_context", async () => ({
    success: true,
    message: "Fetched the assessment context",
    context: await fetchAssessmentContext(ctx.api),
    next_action: "Use the context when planning control automation or SQL rules.",
  }));
}

export type SqlRuleRequest = {
  control_config_id: string;
  sql_query: string;
  referenced_evidence_names: string[];
  new_evidence_name: string;
  confirm?: boolean;
};

export async function sqlRule(ctx: ToolContext, request: SqlRuleRequest): Promise<ToolResult> {
  return runTool("create_sql_rule_and_attach", async () => {
    const created = await createSqlRule(
      ctx.api,
      {
        controlConfigId: request.control_config_id,
        sqlQuery: request.sql_query,
        referencedEvidenceNames: request.referenced_evidence_names,
        newEvidenceName: request.new_evidence_name,
      },
      request.confirm ?? false
    );
    if (created.status === "preview") {
      return {
        success: true,
        message: "Confirmation required before creating the SQL rule",
        ...created,
        next_action: AWAIT_CONFIRMATION,
      };
    }
    return {
      success: true,
      message: `Created SQL rule ${created.rule_id}`,
      ...created,
      next_action: "Offer to document the rule on the control with create_control_config_note.",
    };
  });
}

export type ControlNoteRequest = {
  control_config_id: string;
  assessment_id: string;
  notes: string;
  topic?: string;
  confirm?: boolean;
};

export async function controlNote(ctx: ToolContext, request: ControlNoteRequest): Promise<ToolResult> {
  return runTool("create_control_config_note", async () => {
    const created = await createControlNote(
      ctx.api,
      {
        controlConfigId: request.control_config_id,
        assessmentId: request.assessment_id,
        notes: request.notes,
        topic: request.topic,
      },
      request.confirm ?? false
    );
    if (created.status === "preview") {
      return {
        success: true,
        message: "Confirmation required before creating the note",
        ...created,
        next_action: AWAIT_CONFIRMATION,
      };
    }
    return {
      success: true,
      message: `Added a note to control ${request.control_config_id}`,
      ...created,
      next_action: "Tell the user the note was saved.",
    };
  });
}
