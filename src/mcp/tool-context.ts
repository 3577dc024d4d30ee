import { type ApiClient, AxiosApiClient } from "../backend/api-client.js";
import { TaskCatalog } from "../catalog/task-catalog.js";
import type { GatewayConfig } from "../config.js";
import { FileUploader } from "../rules/file-upload.js";
import { WorkflowSessionStore } from "../rules/workflow-session.js";

// Everything a tool call may touch. One context is shared by all tools of a server.
export type ToolContext = {
  config: GatewayConfig;
  api: ApiClient;
  catalog: TaskCatalog;
  files: FileUploader;
  sessions: WorkflowSessionStore;
};

export function createToolContext(config: GatewayConfig, api?: ApiClient): ToolContext {
  const client =
    api ??
    new AxiosApiClient({
      baseUrl: config.apiBaseUrl,
      token: config.apiToken,
      timeoutMs: config.requestTimeoutMs,
    });
  return {
    config,
    api: client,
    catalog: new TaskCatalog(client),
    files: new FileUploader(client),
    sessions: new WorkflowSessionStore({ idleTtlMs: config.sessionIdleTtlMs }),
  };
}
