import axios, { type AxiosInstance, type AxiosRequestConfig, isAxiosError } from "axios";
import { BackendError, TimeoutError } from "../errors.js";

export const ENDPOINTS = {
  tasks: "v1/tasks",
  uploadFile: "v1/files/upload",
  files: "v1/files",
  rules: "v1/rules",
  plans: "v1/plans",
  planControls: "v1/plan-controls",
  assessments: "v1/assessments",
  assessmentCategories: "v1/assessment-categories",
  assessmentContext: "v1/assessments/context",
  planInstances: "v1/plan-instances",
  planInstanceControls: "v1/plan-instance-controls",
  planInstanceEvidences: "v1/plan-instance-evidences",
  evidenceData: "v1/datahandler/fetch-data",
  availableActions: "v1/actions/fetch-available-actions",
  actionExecutions: "v1/actions/executions",
  similarControls: "v1/controls/similar",
  citationsBatch: "v1/plan-control-citations/batch",
  syncCitations: "v1/plans/sync-ccf-ids",
  sourceSummary: "v1/plan-controls/fetch-source-summary",
  sampleEvidenceData: "v1/plan-controls/fetch-sample-evidence-data",
} as const;

// Paths below one record, e.g. `v1/plan-controls/{id}/notes`.
export function recordPath(collection: string, id: string, action: string): string {
  return `${collection}/${encodeURIComponent(id)}/${action}`;
}

export type QueryParams = Record<string, string | number | boolean | undefined>;

// Everything the gateway needs from the backend. Responses stay `unknown`
// until a caller parses them into its own projection.
export interface ApiClient {
  get(path: string, params?: QueryParams): Promise<unknown>;
  post(path: string, body: unknown): Promise<unknown>;
}

export type AxiosApiClientOptions = {
  baseUrl: string;
  token?: string;
  timeoutMs: number;
  adapter?: AxiosRequestConfig["adapter"];
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeBody(data: unknown): string {
  if (typeof data === "string") return data.slice(0, 500);
  if (isRecord(data)) {
    for (const key of ["error", "Message", "message", "Description"]) {
      const value = data[key];
      if (typeof value === "string" && value) return value;
    }
  }
  return JSON.stringify(data ?? null).slice(0, 500);
}

export class AxiosApiClient implements ApiClient {
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(options: AxiosApiClientOptions) {
    this.timeoutMs = options.timeoutMs;
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        ...(options.token ? { Authorization: options.token } : {}),
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async get(path: string, params?: QueryParams): Promise<unknown> {
    return this.send({ method: "GET", url: path, params: dropUndefined(params) });
  }

  async post(path: string, body: unknown): Promise<unknown> {
    return this.send({ method: "POST", url: path, data: body });
  }

  private async send(config: AxiosRequestConfig): Promise<unknown> {
    const target = `${config.method ?? "GET"} ${config.url ?? ""}`;
    try {
      const response = await this.http.request<unknown>(config);
      const data = response.data;
      // Some endpoints answer 200 with an error envelope instead of a status code.
      if (isRecord(data) && typeof data.error === "string" && data.error) {
        throw new BackendError(`${target} returned an error: ${data.error}`, response.status);
      }
      return data;
    } catch (error) {
      if (!isAxiosError(error)) throw error;
      if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
        throw new TimeoutError(
          `Request timed out after ${Math.round(this.timeoutMs / 1000)} seconds for ${target}`
        );
      }
      if (error.response) {
        throw new BackendError(
          `${target} failed with status ${error.response.status}: ${describeBody(error.response.data)}`,
          error.response.status
        );
      }
      throw new BackendError(`No response received for ${target}: ${error.message}`);
    }
  }
}

function dropUndefined(params: QueryParams | undefined): Record<string, string | number | boolean> | undefined {
  if (!params) return undefined;
  const result: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}
