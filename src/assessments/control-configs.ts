import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { type ApiClient, ENDPOINTS, isRecord, recordPath } from "../backend/api-client.js";
import { encodeContent } from "../catalog/task-content.js";
import { BackendError, ValidationError, errorMessage } from "../errors.js";
import { idText, looseItemsSchema, optionalText, parseOrThrow, validItems } from "./backend-schemas.js";

export const DEFAULT_NOTE_TOPIC = "SQL Rule Documentation";
export const DEFAULT_SAMPLE_RECORDS = 3;
const MAX_SAMPLE_RECORDS = 10;

// Write operations run in two steps: without `confirm` they only echo what
// would be sent, so the user can review it first.
export type Confirmable<TPreview, TDone> = ({ status: "preview" } & TPreview) | ({ status: "done" } & TDone);

function required(problems: string[], value: string | undefined, name: string): string {
  const trimmed = value?.trim() ?? "";
  if (!trimmed) problems.push(`${name} is required`);
  return trimmed;
}

function requiredList(problems: string[], values: string[] | undefined, name: string): string[] {
  const trimmed = (values ?? []).map((value) => value.trim()).filter(Boolean);
  if (trimmed.length === 0) problems.push(`${name} must list at least one value`);
  return trimmed;
}

function throwIfAny(problems: string[], what: string): void {
  if (problems.length > 0) throw new ValidationError(`Cannot ${what}`, problems);
}

// --- assessments ---------------------------------------------------------

const categorySchema = z.object({ id: idText, name: optionalText });
const createdSchema = z.object({ id: idText }).passthrough();

export type CreatedAssessment = {
  assessment: Record<string, unknown>;
  assessment_id: string;
  category_name: string;
  category_id: string;
  created_category: boolean;
};

function assessmentMetadata(yamlContent: string): { name: string; categoryName: string } {
  let document: unknown;
  try {
    document = parseYaml(yamlContent);
  } catch (error) {
    throw new ValidationError(`Invalid YAML: ${errorMessage(error)}`);
  }
  const metadata = isRecord(document) && isRecord(document.metadata) ? document.metadata : {};
  const problems: string[] = [];
  const name = required(problems, typeof metadata.name === "string" ? metadata.name : undefined, "metadata.name");
  const categoryName = required(
    problems,
    typeof metadata.categoryName === "string" ? metadata.categoryName : undefined,
    "metadata.categoryName"
  );
  throwIfAny(problems, "create the assessment");
  return { name, categoryName };
}

/** Creates an assessment from its YAML definition, creating its category when none matches by name. */
export async function createAssessment(api: ApiClient, yamlContent: string): Promise<CreatedAssessment> {
  if (!yamlContent.trim()) {
    throw new ValidationError("Assessment YAML is empty");
  }
  const { name, categoryName } = assessmentMetadata(yamlContent);

  const listed = await api.get(ENDPOINTS.assessmentCategories);
  const categories = Array.isArray(listed) ? validItems(categorySchema, listed) : [];
  let categoryId = categories.find((category) => category.name.trim() === categoryName)?.id;
  const createdCategory = categoryId === undefined;
  if (categoryId === undefined) {
    console.error(`assessment category '${categoryName}' not found; creating it`);
    const created = await api.post(ENDPOINTS.assessmentCategories, { name: categoryName });
    categoryId = parseOrThrow(createdSchema, created, "category creation").id;
  }

  const response = await api.post(ENDPOINTS.assessments, {
    name,
    fileType: "yaml",
    fileContent: encodeContent(yamlContent),
    categoryId,
  });
  const assessment = parseOrThrow(createdSchema, response, "assessment creation");
  return {
    assessment,
    assessment_id: assessment.id,
    category_name: categoryName,
    category_id: categoryId,
    created_category: createdCategory,
  };
}

// --- control configs and citations ---------------------------------------

export type NewControlConfig = {
  assessmentId: string;
  name: string;
  alias?: string;
  controlNumber?: string;
  description?: string;
};

const controlConfigSchema = z.object({ id: idText, displayable: optionalText, alias: optionalText });

export async function createControlConfig(
  api: ApiClient,
  control: NewControlConfig
): Promise<z.output<typeof controlConfigSchema>> {
  const problems: string[] = [];
  const planId = required(problems, control.assessmentId, "assessmentId");
  const name = required(problems, control.name, "name");
  throwIfAny(problems, "create the control config");

  const response = await api.post(ENDPOINTS.planControls, {
    name,
    description: control.description?.trim() ?? "",
    displayable: control.controlNumber?.trim() ?? "",
    alias: control.alias?.trim() ?? "",
    planId,
    isPreRequisite: false,
  });
  return parseOrThrow(controlConfigSchema, response, "control config creation");
}

const suggestionSchema = z.object({
  Name: optionalText,
  "Control ID": z.union([z.string(), z.number()]).nullish(),
  "Control Classification": optionalText,
  "Impact Zone": optionalText,
  "Control Requirement": optionalText,
  "Sort ID": optionalText,
  "Control Type": optionalText,
  Score: z.number().nullish(),
});

const suggestionsSchema = z.object({
  items: z
    .array(
      z.object({
        inputControlName: optionalText,
        controlId: optionalText,
        suggestions: z
          .array(z.unknown())
          .nullish()
          .transform((value) => value ?? []),
      })
    )
    .nullish()
    .transform((value) => value ?? []),
  authorityDocument: optionalText,
});

export type CitationSuggestion = {
  name: string;
  controlId: string;
  classification: string;
  impactZone: string;
  requirement: string;
  sortId: string;
  controlType: string;
  score: number;
};

export type CitationSuggestions = {
  authority_document: string;
  items: Array<{ input_control_name: string; control_id: string; suggestions: CitationSuggestion[] }>;
};

export type CitationQuery = {
  assessmentId: string;
  controlName: string;
  description?: string;
  controlId?: string;
};

function toSuggestion(item: z.output<typeof suggestionSchema>): CitationSuggestion {
  const controlId = item["Control ID"];
  return {
    name: item.Name,
    controlId: controlId === null || controlId === undefined ? "" : String(controlId),
    classification: item["Control Classification"],
    impactZone: item["Impact Zone"],
    requirement: item["Control Requirement"],
    sortId: item["Sort ID"],
    controlType: item["Control Type"],
    score: item.Score ?? 0,
  };
}

/** Authority-document controls similar to the named control, for citing on a control config. */
export async function suggestControlCitations(api: ApiClient, query: CitationQuery): Promise<CitationSuggestions> {
  const problems: string[] = [];
  required(problems, query.assessmentId, "assessmentId");
  const name = required(problems, query.controlName, "controlName");
  throwIfAny(problems, "suggest citations");

  const response = await api.post(ENDPOINTS.similarControls, {
    assessment_type: "asset",
    assessment_id: "",
    assessment_name: "",
    use_default_authority_document: true,
    controls: [{ id: "", name, description: query.description?.trim() ?? "" }],
  });
  const parsed = parseOrThrow(suggestionsSchema, response, "citation suggestion");
  return {
    authority_document: parsed.authorityDocument,
    items: parsed.items.map((item) => ({
      input_control_name: item.inputControlName,
      control_id: item.controlId || query.controlId?.trim() || "",
      suggestions: validItems(suggestionSchema, item.suggestions).map(toSuggestion),
    })),
  };
}

export type CitationRequest = {
  assessmentId: string;
  controlId: string;
  authorityDocument: string;
  controlIdsInAuthorityDocument: string[];
  sortId: string;
  controlNames: string[];
};

const citationSchema = z.object({
  id: idText,
  planControlID: optionalText,
  authorityDocument: optionalText,
  controlNames: z
    .array(z.string())
    .nullish()
    .transform((value) => value ?? []),
  controlsInAuthorityDocument: z
    .array(z.string())
    .nullish()
    .transform((value) => value ?? []),
  sortID: optionalText,
  status: optionalText,
});

export type Citation = z.output<typeof citationSchema>;

type CitationPreview = {
  assessment_id: string;
  control_id: string;
  citation: { authorityDocument: string; controlIdsInAuthorityDocument: string[]; sortId: string; controlNames: string[] };
};

export async function attachCitation(
  api: ApiClient,
  request: CitationRequest,
  confirm: boolean
): Promise<Confirmable<CitationPreview, { citations: Citation[]; warnings: string[] }>> {
  const problems: string[] = [];
  const assessmentId = required(problems, request.assessmentId, "assessmentId");
  const controlId = required(problems, request.controlId, "controlId");
  const authorityDocument = required(problems, request.authorityDocument, "authorityDocument");
  const controlIds = requiredList(problems, request.controlIdsInAuthorityDocument, "controlIdsInAuthorityDocument");
  const sortId = required(problems, request.sortId, "sortId");
  const controlNames = requiredList(problems, request.controlNames, "controlNames");
  throwIfAny(problems, "attach the citation");

  if (!confirm) {
    return {
      status: "preview",
      assessment_id: assessmentId,
      control_id: controlId,
      citation: { authorityDocument, controlIdsInAuthorityDocument: controlIds, sortId, controlNames },
    };
  }

  const response = await api.post(ENDPOINTS.citationsBatch, {
    authorityDocument,
    planControlCitations: [
      { planControlID: controlId, controlsInAuthorityDocument: controlIds, sortID: sortId, controlNames },
    ],
  });
  const { items } = parseOrThrow(looseItemsSchema, response, "citation");
  const citations = validItems(citationSchema, items);

  // The citation is attached either way; a failed control-link sync only warns.
  const warnings: string[] = [];
  try {
    await api.post(ENDPOINTS.syncCitations, {
      planID: assessmentId,
      authorityDocument,
      updateControlLinking: true,
      controlId,
    });
  } catch (error) {
    console.error(`citation sync for control ${controlId} failed: ${errorMessage(error)}`);
    warnings.push(`Citation attached, but syncing control links failed: ${errorMessage(error)}`);
  }
  return { status: "done", citations, warnings };
}

// --- SQL rules and their context -----------------------------------------

type Column = {
  name?: string | null;
  type?: string | null;
  mode?: string | null;
  fieldDataType?: string | null;
  fieldOrder?: number | null;
};

type SourceEvidence = {
  id?: string | null;
  name?: string | null;
  description?: string | null;
  fileName?: string | null;
  columnsInfo?: Column[] | null;
};

export type LinkedControl = {
  assessmentId?: string | null;
  assessmentName?: string | null;
  controlId?: string | null;
  controlName?: string | null;
  controlDescription?: string | null;
  referenceType?: string | null;
  lineage?: Lineage[] | null;
  evidences?: SourceEvidence[] | null;
  rule?: { ruleId?: string | null; ruleName?: string | null; ruleDescription?: string | null } | null;
};

export type Lineage = {
  originType?: string | null;
  recursionLevel?: number | null;
  linkedFrom?: LinkedControl[] | null;
};

const columnSchema: z.ZodType<Column> = z.object({
  name: z.string().nullish(),
  type: z.string().nullish(),
  mode: z.string().nullish(),
  fieldDataType: z.string().nullish(),
  fieldOrder: z.number().nullish(),
});

const sourceEvidenceSchema: z.ZodType<SourceEvidence> = z.object({
  id: z.string().nullish(),
  name: z.string().nullish(),
  description: z.string().nullish(),
  fileName: z.string().nullish(),
  columnsInfo: z.array(columnSchema).nullish(),
});

const lineageSchema: z.ZodType<Lineage> = z.lazy(() =>
  z.object({
    originType: z.string().nullish(),
    recursionLevel: z.number().nullish(),
    linkedFrom: z.array(linkedControlSchema).nullish(),
  })
);

const linkedControlSchema: z.ZodType<LinkedControl> = z.lazy(() =>
  z.object({
    assessmentId: z.string().nullish(),
    assessmentName: z.string().nullish(),
    controlId: z.string().nullish(),
    controlName: z.string().nullish(),
    controlDescription: z.string().nullish(),
    referenceType: z.string().nullish(),
    lineage: z.array(lineageSchema).nullish(),
    evidences: z.array(sourceEvidenceSchema).nullish(),
    rule: z
      .object({
        ruleId: z.string().nullish(),
        ruleName: z.string().nullish(),
        ruleDescription: z.string().nullish(),
      })
      .nullish(),
  })
);

const sourceSummarySchema = z.object({ lineage: z.array(lineageSchema).nullish() }).passthrough();

export type SourceSummary = z.output<typeof sourceSummarySchema>;

/** How a control config is linked to evidence configs, with each evidence's columns. */
export async function fetchControlSourceSummary(
  api: ApiClient,
  controlId: string
): Promise<{ summary: SourceSummary; has_lineage: boolean }> {
  const problems: string[] = [];
  const id = required(problems, controlId, "controlId");
  throwIfAny(problems, "fetch the source summary");

  const response = await api.post(ENDPOINTS.sourceSummary, { controlID: id });
  const summary = parseOrThrow(sourceSummarySchema, response, "control source summary");
  return { summary, has_lineage: (summary.lineage ?? []).length > 0 };
}

export type SampleRequest = { controlConfigId: string; evidenceNames?: string[]; records?: number };

// Outside 1..10 the sample size falls back to the default.
export function sampleRecordCount(records: number | undefined): number {
  if (records === undefined || !Number.isInteger(records) || records < 1 || records > MAX_SAMPLE_RECORDS) {
    return DEFAULT_SAMPLE_RECORDS;
  }
  return records;
}

export async function fetchEvidenceSamples(
  api: ApiClient,
  request: SampleRequest
): Promise<{ control_id: string; record_count: number; evidences: unknown[] }> {
  const problems: string[] = [];
  const controlId = required(problems, request.controlConfigId, "controlConfigId");
  throwIfAny(problems, "fetch evidence samples");

  const recordCount = sampleRecordCount(request.records);
  const evidenceNames = (request.evidenceNames ?? []).map((name) => name.trim()).filter(Boolean);
  const response = await api.post(ENDPOINTS.sampleEvidenceData, {
    controlID: controlId,
    records: recordCount,
    ...(evidenceNames.length > 0 ? { evidenceNames } : {}),
  });
  if (!Array.isArray(response)) {
    throw new BackendError("Malformed evidence sample response: expected a list");
  }
  return { control_id: controlId, record_count: recordCount, evidences: response };
}

export async function fetchAssessmentContext(api: ApiClient): Promise<Record<string, unknown>> {
  const response = await api.get(ENDPOINTS.assessmentContext);
  if (!isRecord(response)) {
    throw new BackendError("Malformed assessment context response");
  }
  return response;
}

export type SqlRuleRequest = {
  controlConfigId: string;
  sqlQuery: string;
  referencedEvidenceNames: string[];
  newEvidenceName: string;
};

type SqlRulePreview = {
  control_config_id: string;
  sql_query: string;
  new_evidence_name: string;
  referenced_evidence_names: string[];
};

const sqlRuleCreatedSchema = z.object({ ruleId: idText, evidenceId: optionalText });

/**
 * SQL rule over existing evidence configs (used as table names), writing its
 * result to a new evidence config on the control.
 */
export async function createSqlRule(
  api: ApiClient,
  request: SqlRuleRequest,
  confirm: boolean
): Promise<Confirmable<SqlRulePreview, { rule_id: string; evidence_id: string }>> {
  const problems: string[] = [];
  const controlConfigId = required(problems, request.controlConfigId, "controlConfigId");
  const sqlQuery = required(problems, request.sqlQuery, "sqlQuery");
  const referenced = requiredList(problems, request.referencedEvidenceNames, "referencedEvidenceNames");
  const evidenceName = required(problems, request.newEvidenceName, "newEvidenceName");
  throwIfAny(problems, "create the SQL rule");

  if (!confirm) {
    return {
      status: "preview",
      control_config_id: controlConfigId,
      sql_query: sqlQuery,
      new_evidence_name: evidenceName,
      referenced_evidence_names: referenced,
    };
  }
  const response = await api.post(recordPath(ENDPOINTS.planControls, controlConfigId, "create-sql-rule-evidence"), {
    sqlQuery,
    evidenceName,
    referedEvidenceNames: referenced,
  });
  const created = parseOrThrow(sqlRuleCreatedSchema, response, "SQL rule creation");
  return { status: "done", rule_id: created.ruleId, evidence_id: created.evidenceId };
}

export type NoteRequest = { controlConfigId: string; assessmentId: string; notes: string; topic?: string };

type NotePreview = { control_config_id: string; topic: string; notes: string };

export async function createControlNote(
  api: ApiClient,
  request: NoteRequest,
  confirm: boolean
): Promise<Confirmable<NotePreview, { note: Record<string, unknown> }>> {
  const problems: string[] = [];
  const planControlID = required(problems, request.controlConfigId, "controlConfigId");
  const planId = required(problems, request.assessmentId, "assessmentId");
  const notes = required(problems, request.notes, "notes");
  throwIfAny(problems, "create the note");
  const topic = request.topic?.trim() || DEFAULT_NOTE_TOPIC;

  if (!confirm) {
    return { status: "preview", control_config_id: planControlID, topic, notes };
  }
  const response = await api.post(recordPath(ENDPOINTS.planControls, planControlID, "notes"), {
    topic,
    notes,
    planId,
    planControlID,
  });
  return { status: "done", note: isRecord(response) ? response : {} };
}
