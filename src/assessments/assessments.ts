import { z } from "zod";
import { type ApiClient, ENDPOINTS } from "../backend/api-client.js";
import { decodeContent } from "../catalog/task-content.js";
import { NotFoundError, errorMessage } from "../errors.js";
import { FileUploader, fileHashFromUrl } from "../rules/file-upload.js";
import { idText, optionalText, pageSchema, parseOrThrow } from "./backend-schemas.js";

const CONTROL_PAGE_SIZE = 100;

const assessmentSchema = z
  .object({
    id: idText,
    name: optionalText,
    categoryName: optionalText,
  })
  .passthrough();

const controlSchema = z
  .object({
    id: idText,
    name: optionalText,
    alias: optionalText,
    controlNumber: optionalText,
    displayable: optionalText,
    additionalContext: z.unknown().optional(),
  })
  .passthrough();

const controlPageSchema = pageSchema(controlSchema);

const ruleSearchSchema = pageSchema(
  z.object({
    name: z.string(),
    readme: z.string().nullish(),
  })
);

export type AssessmentFilters = {
  categoryId?: string;
  categoryNameContains?: string;
  nameContains?: string;
};

export type AssessmentSummary = {
  id: string;
  name: string;
  category_name: string;
};

export type AssessmentControl = {
  id: string;
  name: string;
  alias: string;
  controlNumber: string;
  additionalContext: unknown;
};

export type AssessmentControlPage = {
  assessment_id: string;
  controls: AssessmentControl[];
  pages_fetched: number;
  truncated: boolean;
  warnings: string[];
};

export async function listAssessments(api: ApiClient, filters: AssessmentFilters = {}): Promise<AssessmentSummary[]> {
  const response = await api.get(ENDPOINTS.plans, {
    fields: "basic",
    category_id: filters.categoryId,
    category_name_contains: filters.categoryNameContains,
    name_contains: filters.nameContains,
  });
  const page = parseOrThrow(pageSchema(assessmentSchema), response, "assessment list");
  return page.items
    .filter((item) => item.name && item.categoryName)
    .map((item) => ({ id: item.id, name: item.name, category_name: item.categoryName }));
}

// Leaf controls of one assessment, fetched one page at a time up to `maxPages`.
export async function listAssessmentControls(
  api: ApiClient,
  assessmentId: string,
  maxPages: number
): Promise<AssessmentControlPage> {
  const result: AssessmentControlPage = {
    assessment_id: assessmentId,
    controls: [],
    pages_fetched: 0,
    truncated: false,
    warnings: [],
  };

  for (let page = 1; ; page += 1) {
    if (page > maxPages) {
      result.truncated = true;
      result.warnings.push(`Stopped after ${maxPages} pages; more controls may exist`);
      break;
    }

    let parsed: z.output<typeof controlPageSchema>;
    try {
      const response = await api.get(ENDPOINTS.planControls, {
        page,
        page_size: CONTROL_PAGE_SIZE,
        plan_id: assessmentId,
        fields: "basic",
        is_leaf_control: true,
        include_additional_context: true,
      });
      parsed = parseOrThrow(controlPageSchema, response, "assessment control");
    } catch (error) {
      if (page === 1) throw error;
      result.warnings.push(`Page ${page} failed: ${errorMessage(error)}; returning the controls fetched so far`);
      break;
    }

    result.pages_fetched = page;
    result.controls.push(
      ...parsed.items.map((item) => ({
        id: item.id,
        name: item.name,
        alias: item.alias,
        controlNumber: item.displayable || item.controlNumber,
        additionalContext: item.additionalContext ?? null,
      }))
    );

    const lastPage = parsed.TotalPage ?? undefined;
    if (parsed.items.length === 0 || (lastPage !== undefined && page >= lastPage)) break;
  }
  return result;
}

export async function fetchRuleReadme(api: ApiClient, name: string): Promise<{ name: string; readme: string }> {
  const response = await api.get(ENDPOINTS.rules, { name });
  const page = parseOrThrow(ruleSearchSchema, response, "rule search");
  const rule = page.items.find((item) => item.name === name);
  if (!rule) {
    throw new NotFoundError(`Rule '${name}' not found`);
  }
  if (!rule.readme) {
    throw new NotFoundError(`Rule '${name}' has no README`);
  }
  const content = await new FileUploader(api).fetchContent(fileHashFromUrl(rule.readme));
  return { name: rule.name, readme: decodeContent(content) };
}
