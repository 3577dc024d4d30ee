import { type ApiClient, ENDPOINTS, isRecord } from "../backend/api-client.js";
import { BackendError, ValidationError } from "../errors.js";
import { looseItemsSchema, parseOrThrow } from "./backend-schemas.js";

export type ActionScope = {
  assessmentName: string;
  controlNumber?: string;
  controlAlias?: string;
  evidenceName?: string;
};

export type ActionLevel = "assessment" | "control" | "evidence";

export type ActionExecution = {
  assessmentId: string;
  assessmentRunId: string;
  actionBindingId: string;
  assessmentRunControlId?: string;
  assessmentRunControlEvidenceId?: string;
  evidenceRecordIds?: string[];
};

// User actions bound at the given scope. Rule bodies attached to an action are left out.
export async function fetchAvailableActions(api: ApiClient, scope: ActionScope): Promise<Array<Record<string, unknown>>> {
  if (!scope.assessmentName.trim()) {
    throw new ValidationError("Assessment name is required to look up actions");
  }
  const response = await api.post(ENDPOINTS.availableActions, {
    actionType: "action",
    assessmentName: scope.assessmentName,
    controlNumber: scope.controlNumber ?? "",
    controlAlias: scope.controlAlias ?? "",
    evidenceName: scope.evidenceName ?? "",
    isRulesReq: true,
    triggerType: "userAction",
  });
  const { items } = parseOrThrow(looseItemsSchema, response, "available actions");
  return items.filter(isRecord).map(({ rules: _rules, ...action }) => action);
}

export function actionLevel(execution: ActionExecution): ActionLevel {
  if (execution.assessmentRunControlEvidenceId) return "evidence";
  if (execution.assessmentRunControlId) return "control";
  return "assessment";
}

function checkExecution(execution: ActionExecution): void {
  const problems: string[] = [];
  if (!execution.assessmentId.trim()) problems.push("assessmentId is required");
  if (!execution.assessmentRunId.trim()) problems.push("assessmentRunId is required");
  if (!execution.actionBindingId.trim()) problems.push("actionBindingId is required");
  const recordIds = execution.evidenceRecordIds ?? [];
  if (execution.assessmentRunControlEvidenceId) {
    if (!execution.assessmentRunControlId) problems.push("assessmentRunControlId is required for an evidence-level action");
    if (recordIds.length === 0) problems.push("evidenceRecordIds are required for an evidence-level action");
  } else if (recordIds.length > 0) {
    problems.push("evidenceRecordIds need assessmentRunControlEvidenceId");
  }
  if (problems.length > 0) {
    throw new ValidationError("Action cannot be executed", problems);
  }
}

export async function executeAction(
  api: ApiClient,
  execution: ActionExecution
): Promise<{ level: ActionLevel; result: Record<string, unknown> }> {
  checkExecution(execution);
  const response = await api.post(ENDPOINTS.actionExecutions, {
    actionBindingID: execution.actionBindingId,
    planInstanceID: execution.assessmentRunId,
    planID: execution.assessmentId,
    planInstanceControlID: execution.assessmentRunControlId ?? "",
    planInstanceControlEvidenceID: execution.assessmentRunControlEvidenceId ?? "",
    recordIDs: execution.evidenceRecordIds ?? [],
    rules: [],
  });
  if (!isRecord(response)) {
    throw new BackendError("Malformed action execution response");
  }
  return { level: actionLevel(execution), result: response };
}
