import { type ErrorCode, RuleWorkflowError, errorMessage } from "../errors.js";

export type ToolResult = {
  success: boolean;
  next_action: string;
  [key: string]: unknown;
};

const RECOVERY: Record<ErrorCode | "INTERNAL", string> = {
  VALIDATION: "Show the validation errors to the user and ask for corrected input.",
  NOT_FOUND: "Check the task and input names against get_task_details or the tasks://summary resource.",
  NO_TEMPLATE: "This input has no template; ask the user for the content directly or collect it as a parameter.",
  UPLOAD: "Tell the user the file could not be stored and ask whether to retry the confirmation.",
  BACKEND: "Report the backend error to the user; do not retry automatically.",
  TIMEOUT: "The backend did not answer in time; ask the user whether to retry.",
  INTERNAL: "Report the unexpected error to the user.",
};

function failure(tool: string, error: unknown): ToolResult {
  console.error(`${tool} error: ${errorMessage(error)}`);
  if (error instanceof RuleWorkflowError) {
    return {
      success: false,
      error: error.message,
      error_type: error.code,
      ...(error.details.length > 0 ? { validation_errors: error.details } : {}),
      ...error.context,
      next_action: RECOVERY[error.code],
    };
  }
  return { success: false, error: errorMessage(error), error_type: "INTERNAL", next_action: RECOVERY.INTERNAL };
}

// Typed errors thrown below this point become failure payloads; the agent
// reads `success` instead of catching.
export async function runTool(tool: string, body: () => Promise<ToolResult>): Promise<ToolResult> {
  try {
    return await body();
  } catch (error) {
    return failure(tool, error);
  }
}

export function textResult(result: ToolResult) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
  };
}
