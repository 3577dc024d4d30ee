import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

export const WORKFLOW_PROMPT_NAME = "workflow_knowledge";

const EVENT_INPUT_EXAMPLE = [
  "inputs:",
  "  - name: AssessmentRunID",
  "    type: Text",
  "    desc: Id of the assessment run whose details are fetched.",
  "    optional: false",
  "    mapValueFrom:",
  "      outputField: runId",
  "      source:",
  "        label: When assessment run completed",
  "        displayable: When an assessment run is completed",
  "        type: RESOURCE_BASED_EVENT",
  '        specInput: { expr: assessmentName == "<assessment name>" }',
  "        payload: [assessmentName, runName, controlNumber, evidenceName, runId, runControlId, evidenceId]",
  "      type: Event",
];

const ACTIVITY_INPUT_EXAMPLE = [
  "inputs:",
  "  - name: DataFile",
  "    type: File",
  "    desc: File the field is extracted from.",
  "    mapValueFrom:",
  "      outputField: AssessmentRunDetails",
  "      source:",
  "        label: Activity 1",
  "        name: FetchAssessmentRunDetails",
  "        outputs: [AssessmentDetails, AssessmentRunDetails, Error]",
  "      type: Activity",
];

const SAMPLE_WORKFLOW = [
  "apiVersion: v3",
  "kind: kind",
  "metadata:",
  "  name: notify-on-run-completion",
  "  description: Emails the owners once an assessment run completes",
  "spec:",
  "  states:",
  "    Start: { groupName: Ungrouped }",
  "    End: { groupName: Ungrouped }",
  "  activities:",
  "    Activity 1:",
  "      groupName: Ungrouped",
  "      action:",
  "        type: Function",
  "        reference:",
  "          name: SendEmailNotification",
  "          displayable: Send Email Notification (in HTML)",
  "          inputs:",
  "            - { name: messageHeader, type: Text, value: Run completed }",
  "            - { name: recipients, type: TextArray, value: owner@example.test }",
  "            - { name: messageContent, type: MultilineText, value: Assessment {{Event.Event 1.assessmentName}} has completed. }",
  "  conditions: {}",
  "  transitions:",
  "    - from: Start",
  "      to: Activity 1",
  "      type: Event",
  "      label: Event 1",
  "      event:",
  "        displayable: When an assessment run is completed",
  "        type: RESOURCE_BASED_EVENT",
  '        specInput: { expr: assessmentName == "<assessment name>" }',
  "    - from: Activity 1",
  "      to: End",
  "      type: PassThrough",
];

export function buildWorkflowKnowledge(): string {
  return [
    "# Workflows",
    "",
    "A workflow is a flowchart of nodes that starts when a trigger event fires: an assessment run completes,",
    "a period of time passes, or a user acts (submits a form, approves a request).",
    "",
    "## Node types",
    "",
    "- State: waits for an event. Marks the start and the end of a workflow and can pause it mid-flow.",
    "  Its outgoing edge is always an event (a user action or a timer).",
    "- Activity: does the work. It runs a pre-built function, a pre-built rule, a pre-built task or another",
    "  saved workflow, and produces outputs from its inputs.",
    "- Condition: evaluates a CL expression and continues on its yes or its no branch.",
    "",
    "## Connection rules",
    "",
    "1. A state connects to an activity, a condition or another state.",
    "2. An activity connects to another activity, a condition or a state.",
    "3. A condition has exactly two branches, yes and no; each may lead to any node type.",
    "4. Use only states, activities and conditions. Give every node a custom label.",
    "",
    "## Inputs",
    "",
    "Every node input is mapped from an output of an earlier node or event through mapValueFrom.",
    "When no earlier node produces an input, ask the user for it; do not emit a complete workflow without it.",
    "Collect the events, functions, tasks, rules and conditions the workflow needs before writing it.",
    "TextArray values are comma-separated strings.",
    "",
    "Input mapped from an event:",
    "",
    "```yaml",
    ...EVENT_INPUT_EXAMPLE,
    "```",
    "",
    "Input mapped from an activity:",
    "",
    "```yaml",
    ...ACTIVITY_INPUT_EXAMPLE,
    "```",
    "",
    "## Output references",
    "",
    "Any value or expr may reference earlier outputs; they are filled in at run time:",
    "",
    "- expr: '{{Activity.Activity 2.ExtractedValue}} == \"FALSE\"'",
    "- value: Form assigned with ID {{Activity.Assign Form.formAssignmentID}}.",
    "",
    "## User actions",
    "",
    "To wait for a person, an activity calls the RequestUserAction function (actionList, recipients,",
    "messageContent, and upload and comment preferences). The following transition listens for the",
    "'When the user action is completed' event, filtered with an expr such as action == \"Ready to upload\";",
    "its payload carries action, userActionId, comments, uploadedFileHash, attachments and payload.",
    "",
    "## Example",
    "",
    "Always show the user a diagram of the workflow alongside its YAML.",
    "",
    "```yaml",
    ...SAMPLE_WORKFLOW,
    "```",
  ].join("\n");
}

export function registerWorkflowPrompt(server: McpServer): void {
  server.registerPrompt(
    WORKFLOW_PROMPT_NAME,
    {
      title: "Workflow authoring knowledge",
      description: "Node types, connection rules and input mapping for building compliance workflows.",
    },
    () => ({
      messages: [{ role: "user", content: { type: "text", text: buildWorkflowKnowledge() } }],
    })
  );
}
