import { z } from "zod";
import { type ApiClient, ENDPOINTS, isRecord, recordPath } from "../backend/api-client.js";
import { BackendError, ValidationError } from "../errors.js";
import { idText, looseItemsSchema, optionalText, parseOrThrow, validItems } from "./backend-schemas.js";

export const RUN_PAGE_SIZE = 10;
const RUN_CONTROL_SEARCH_SIZE = 50;

const nullableNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? null);

const runSchema = z.object({
  id: idText,
  planId: idText,
  name: optionalText,
  description: optionalText,
  applicationType: optionalText,
  configId: optionalText,
  fromDate: optionalText,
  toDate: optionalText,
  started: optionalText,
  ended: optionalText,
  status: optionalText,
  computedScore: nullableNumber,
  computedWeight: nullableNumber,
  complianceStatus: optionalText,
  createdAt: optionalText,
});

const runControlSchema = z.object({
  id: idText,
  name: optionalText,
  displayable: optionalText,
  alias: optionalText,
  priority: optionalText,
  status: optionalText,
  dueDate: optionalText,
  complianceStatus: optionalText,
});

const runEvidenceSchema = z.object({
  id: idText,
  name: optionalText,
  description: optionalText,
  fileName: optionalText,
});

const evidenceRecordSchema = z.object({
  id: idText,
  ResourceID: optionalText,
  ResourceName: optionalText,
  ResourceType: optionalText,
  ComplianceStatus: optionalText,
});

export type AssessmentRun = {
  id: string;
  name: string;
  description: string;
  assessmentId: string;
  applicationType: string;
  configId: string;
  fromDate: string;
  toDate: string;
  started: string;
  ended: string;
  status: string;
  computedScore: number | null;
  computedWeight: number | null;
  complianceStatus: string;
  createdAt: string;
};

export type RunControl = {
  id: string;
  name: string;
  controlNumber: string;
  alias: string;
  priority: string;
  status: string;
  dueDate: string;
  complianceStatus: string;
};

export type RunEvidence = z.output<typeof runEvidenceSchema>;

export type EvidenceRecord = z.output<typeof evidenceRecordSchema>;

function toRun(item: z.output<typeof runSchema>): AssessmentRun {
  const { planId, ...rest } = item;
  return { ...rest, assessmentId: planId };
}

function toRunControl(item: z.output<typeof runControlSchema>): RunControl {
  const { displayable, ...rest } = item;
  return { ...rest, controlNumber: displayable };
}

async function runPage(api: ApiClient, assessmentId: string, page: number, pageSize: number): Promise<AssessmentRun[]> {
  const response = await api.get(ENDPOINTS.planInstances, {
    fields: "basic",
    page,
    page_size: pageSize,
    plan_id: assessmentId,
  });
  // Runs without an id or assessment id are dropped rather than failing the page.
  const { items } = parseOrThrow(looseItemsSchema, response, "assessment run");
  return validItems(runSchema, items).map(toRun);
}

export async function fetchRecentAssessmentRuns(api: ApiClient, assessmentId: string): Promise<AssessmentRun[]> {
  return runPage(api, assessmentId, 1, RUN_PAGE_SIZE);
}

/** One page of runs. A page or page size of 0 means the first page or the full page size. */
export async function fetchAssessmentRuns(
  api: ApiClient,
  assessmentId: string,
  page = 1,
  pageSize = RUN_PAGE_SIZE
): Promise<{ page: number; page_size: number; runs: AssessmentRun[] }> {
  if (!Number.isInteger(page) || page < 0) {
    throw new ValidationError(`Page must be a non-negative integer, got ${page}`);
  }
  if (!Number.isInteger(pageSize) || pageSize < 0 || pageSize > RUN_PAGE_SIZE) {
    throw new ValidationError(`Page size must be between 1 and ${RUN_PAGE_SIZE}, got ${pageSize}`);
  }
  const resolvedPage = page || 1;
  const resolvedSize = pageSize || RUN_PAGE_SIZE;
  return {
    page: resolvedPage,
    page_size: resolvedSize,
    runs: await runPage(api, assessmentId, resolvedPage, resolvedSize),
  };
}

async function leafControlItems(api: ApiClient, runId: string): Promise<unknown[]> {
  const response = await api.get(ENDPOINTS.planInstanceControls, {
    fields: "basic",
    is_leaf_control: true,
    plan_instance_id: runId,
  });
  return parseOrThrow(looseItemsSchema, response, "run control").items;
}

// Full leaf-control records of a run, as the backend returns them.
export async function fetchRunDetails(api: ApiClient, runId: string): Promise<Array<Record<string, unknown>>> {
  return (await leafControlItems(api, runId)).filter(isRecord);
}

export async function fetchRunLeafControls(api: ApiClient, runId: string): Promise<RunControl[]> {
  return validItems(runControlSchema, await leafControlItems(api, runId)).map(toRunControl);
}

export async function searchRunControls(api: ApiClient, nameContains: string): Promise<RunControl[]> {
  const response = await api.get(ENDPOINTS.planInstanceControls, {
    fields: "basic",
    control_name_contains: nameContains,
    page: 1,
    page_size: RUN_CONTROL_SEARCH_SIZE,
  });
  const { items } = parseOrThrow(looseItemsSchema, response, "run control");
  return validItems(runControlSchema, items).map(toRunControl);
}

export async function fetchRunControlPlanData(api: ApiClient, runControlId: string): Promise<Record<string, unknown>> {
  const response = await api.get(recordPath(ENDPOINTS.planInstanceControls, runControlId, "plan-data"));
  if (!isRecord(response)) {
    throw new BackendError(`Malformed plan data response for run control ${runControlId}`);
  }
  return response;
}

export async function fetchRunControlEvidence(api: ApiClient, runControlId: string): Promise<RunEvidence[]> {
  const response = await api.get(ENDPOINTS.planInstanceEvidences, { plan_instance_control_id: runControlId });
  const { items } = parseOrThrow(looseItemsSchema, response, "run control evidence");
  return validItems(runEvidenceSchema, items);
}

const evidenceFileSchema = z.object({ fileBytes: z.string().min(1) });

/**
 * Records of one evidence file. The backend returns the file base64-encoded;
 * it must decode to a JSON array of records.
 */
export async function fetchEvidenceRecords(api: ApiClient, evidenceId: string): Promise<EvidenceRecord[]> {
  const response = await api.post(ENDPOINTS.evidenceData, {
    evidenceID: evidenceId,
    templateType: "evidence",
    status: ["active"],
    returnFormat: "json",
    isSrcFetchCall: true,
    isUserPriority: true,
    considerFileSizeRestriction: true,
    viewEvidenceFlow: true,
  });
  const { fileBytes } = parseOrThrow(evidenceFileSchema, response, "evidence data");
  let records: unknown;
  try {
    records = JSON.parse(Buffer.from(fileBytes, "base64").toString("utf8"));
  } catch {
    throw new BackendError(`Evidence ${evidenceId} is not a JSON file`);
  }
  if (!Array.isArray(records)) {
    throw new BackendError(`Evidence ${evidenceId} does not hold a list of records`);
  }
  return validItems(evidenceRecordSchema, records);
}
