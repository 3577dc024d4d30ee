import { tool } from "@anthropic-ai/claude-agent-sdk";
import { z } from "zod";
import {
  assessmentContext,
  assessmentControls,
  assessmentRuns,
  assessments,
  availableActions,
  citationAttachment,
  citationSuggestions,
  controlNote,
  controlSourceSummary,
  evidenceRecords,
  evidenceSamples,
  newAssessment,
  newControlConfig,
  recentAssessmentRuns,
  ruleReadme,
  runAction,
  runControlEvidence,
  runControlMetadata,
  runControls,
  runDetails,
  runLeafControls,
  sqlRule,
} from "./assessment-tools.js";
import type { ToolContext } from "./tool-context.js";
import { textResult } from "./tool-result.js";

const confirm = z.boolean().optional().describe("false (default) returns a preview; true performs the change");

// Assessments, their runs and evidence, and the control-config side of SQL rule automation.
export function assessmentToolDefinitions(ctx: ToolContext) {
  return [
    tool(
      "fetch_rule_readme",
      "Fetch and decode the README of an existing rule.",
      {
        name: z.string(),
      },
      async (args) => textResult(await ruleReadme(ctx, args))
    ),
    tool(
      "list_assessments",
      "List assessments, optionally filtered by category or name.",
      {
        category_id: z.string().optional(),
        category_name_contains: z.string().optional(),
        name_contains: z.string().optional(),
      },
      async (args) => textResult(await assessments(ctx, args))
    ),
    tool(
      "list_assessment_control_configs",
      "List the leaf controls of an assessment, page by page up to the configured bound.",
      {
        assessment_id: z.string(),
      },
      async (args) => textResult(await assessmentControls(ctx, args))
    ),
    tool(
      "create_assessment",
      "Create an assessment from its YAML definition; metadata.name and metadata.categoryName are required.",
      {
        yaml_content: z.string(),
      },
      async (args) => textResult(await newAssessment(ctx, args))
    ),
    tool(
      "fetch_recent_assessment_runs",
      "List the ten most recent runs of an assessment.",
      {
        assessment_id: z.string(),
      },
      async (args) => textResult(await recentAssessmentRuns(ctx, args))
    ),
    tool(
      "fetch_assessment_runs",
      "List one page of an assessment's runs (at most 10 per page).",
      {
        assessment_id: z.string(),
        page: z.number().int().optional(),
        page_size: z.number().int().optional(),
      },
      async (args) => textResult(await assessmentRuns(ctx, args))
    ),
    tool(
      "fetch_assessment_run_details",
      "Return the full leaf-control records of an assessment run.",
      {
        run_id: z.string(),
      },
      async (args) => textResult(await runDetails(ctx, args))
    ),
    tool(
      "fetch_assessment_run_leaf_controls",
      "List an assessment run's leaf controls with status and compliance.",
      {
        run_id: z.string(),
      },
      async (args) => textResult(await runLeafControls(ctx, args))
    ),
    tool(
      "fetch_run_controls",
      "Search run controls by name.",
      {
        control_name: z.string(),
      },
      async (args) => textResult(await runControls(ctx, args))
    ),
    tool(
      "fetch_run_control_meta_data",
      "Return the plan data behind a run control.",
      {
        run_control_id: z.string(),
      },
      async (args) => textResult(await runControlMetadata(ctx, args))
    ),
    tool(
      "fetch_assessment_run_leaf_control_evidence",
      "List the evidence files of a run control.",
      {
        run_control_id: z.string(),
      },
      async (args) => textResult(await runControlEvidence(ctx, args))
    ),
    tool(
      "fetch_evidence_records",
      "Return the records of an evidence file with their compliance status.",
      {
        evidence_id: z.string(),
      },
      async (args) => textResult(await evidenceRecords(ctx, args))
    ),
    tool(
      "fetch_available_control_actions",
      "List the user actions available for an assessment, control or evidence.",
      {
        assessment_name: z.string(),
        control_number: z.string().optional(),
        control_alias: z.string().optional(),
        evidence_name: z.string().optional(),
      },
      async (args) => textResult(await availableActions(ctx, args))
    ),
    tool(
      "execute_action",
      "Trigger an action on an assessment run, one of its controls, or records of a control's evidence.",
      {
        assessment_id: z.string(),
        assessment_run_id: z.string(),
        action_binding_id: z.string(),
        assessment_run_control_id: z.string().optional(),
        assessment_run_control_evidence_id: z.string().optional(),
        evidence_record_ids: z.array(z.string()).optional(),
      },
      async (args) => textResult(await runAction(ctx, args))
    ),
    tool(
      "create_control_config",
      "Create a control config in an assessment.",
      {
        assessment_id: z.string(),
        name: z.string(),
        alias: z.string().optional(),
        control_number: z.string().optional(),
        description: z.string().optional(),
      },
      async (args) => textResult(await newControlConfig(ctx, args))
    ),
    tool(
      "suggest_control_config_citations",
      "Suggest authority-document controls to cite on a control config.",
      {
        assessment_id: z.string(),
        control_name: z.string(),
        description: z.string().optional(),
        control_id: z.string().optional().describe("Existing control config id; omit for a new control"),
      },
      async (args) => textResult(await citationSuggestions(ctx, args))
    ),
    tool(
      "attach_citation_to_control_config",
      "Attach one user-selected citation to a control config.",
      {
        assessment_id: z.string(),
        control_id: z.string(),
        authority_document: z.string(),
        control_ids_in_authority_document: z.array(z.string()),
        sort_id: z.string(),
        control_names: z.array(z.string()),
        confirm,
      },
      async (args) => textResult(await citationAttachment(ctx, args))
    ),
    tool(
      "fetch_control_source_summary",
      "Show how a control config links to evidence configs, with each evidence's columns.",
      {
        control_id: z.string(),
      },
      async (args) => textResult(await controlSourceSummary(ctx, args))
    ),
    tool(
      "get_evidence_sample_data",
      "Fetch sample rows (1-10 per evidence, default 3) of the evidence linked to a control config.",
      {
        control_config_id: z.string(),
        evidence_names: z.array(z.string()).optional(),
        records: z.number().int().optional(),
      },
      async (args) => textResult(await evidenceSamples(ctx, args))
    ),
    tool(
      "get_assessment_context",
      "Fetch the assessment context used to plan control automation.",
      {},
      async () => textResult(await assessmentContext(ctx))
    ),
    tool(
      "create_sql_rule_and_attach",
      "Create a SQL rule over existing evidence configs and attach it to a control config.",
      {
        control_config_id: z.string(),
        sql_query: z.string().describe("Query using the referenced evidence names as table names"),
        referenced_evidence_names: z.array(z.string()),
        new_evidence_name: z.string(),
        confirm,
      },
      async (args) => textResult(await sqlRule(ctx, args))
    ),
    tool(
      "create_control_config_note",
      "Add a markdown documentation note to a control config.",
      {
        control_config_id: z.string(),
        assessment_id: z.string(),
        notes: z.string(),
        topic: z.string().optional(),
        confirm,
      },
      async (args) => textResult(await controlNote(ctx, args))
    ),
  ];
}
