import type { AgentDefinition } from "@anthropic-ai/claude-agent-sdk";

export type SubagentConfig = {
  name: string;
  model: AgentDefinition["model"];
  purpose: string;
  tools: string[];
};

// The task analyst only reads the catalog; the I/O mapper wires data between
// tasks; the evidence reviewer only reads assessment runs.
export const subagents: SubagentConfig[] = [
  {
    name: "task-analyst",
    model: "haiku",
    purpose:
      "Reads the task catalog and explains what candidate tasks do, which inputs they need and " +
      "which outputs they produce. Use when the user is still choosing tasks or asks what a task " +
      "is for.",
    tools: ["get_task_details", "prepare_input_collection_overview", "get_template_guidance"],
  },
  {
    name: "io-mapper",
    model: "sonnet",
    purpose:
      "Designs the rule's ioMap: wires rule inputs to task inputs and task outputs to later task " +
      "inputs and rule outputs, using the t1..tn aliases. Use once tasks and inputs are settled " +
      "and before build_rule_structure.",
    tools: ["get_task_details", "build_rule_structure"],
  },
  {
    name: "evidence-reviewer",
    model: "haiku",
    purpose:
      "Looks up assessment runs, their leaf controls, evidence files and evidence records, and " +
      "summarizes compliance status. Use when the user asks how a run or control performed.",
    tools: [
      "list_assessments",
      "fetch_recent_assessment_runs",
      "fetch_assessment_run_leaf_controls",
      "fetch_assessment_run_leaf_control_evidence",
      "fetch_evidence_records",
    ],
  },
];
