import { expect } from "chai";
import { type Task, type TaskRecord, taskSchema } from "../../src/catalog/task-catalog.js";
import { encodeContent } from "../../src/catalog/task-content.js";

export const FETCH_CONFIG_TEMPLATE = JSON.stringify({ endpoint: "https://api.example.test", retries: 3 }, null, 2);
export const MAPPING_TEMPLATE = "fields:\n  - source: id\n    target: identifier\n";

export const FETCH_README = [
  "# FetchData",
  "",
  "Pulls records from an HTTP endpoint.",
  "",
  "## Capabilities",
  "- Pulls records over HTTP",
  "- Retries failed calls",
  "",
  "## Use cases",
  "- Collect evidence from an internal API",
].join("\n");

export const fetchDataTask: TaskRecord = {
  name: "FetchData",
  displayName: "Fetch data",
  description: "Fetches records from an HTTP source. Retries on failure.",
  tags: ["primitive", "ingest"],
  appTags: { appType: ["nocredapp"] },
  readmeData: encodeContent(FETCH_README),
  inputs: [
    { name: "Source", description: "Where to read from", dataType: "STRING", required: true },
    {
      name: "Config",
      dataType: "HTTP_CONFIG",
      required: true,
      templateFile: encodeContent(FETCH_CONFIG_TEMPLATE),
      format: "json",
    },
    { name: "Limit", dataType: "INTEGER", defaultValue: "10" },
  ],
  outputs: [{ name: "Records", dataType: "FILE" }],
};

export const transformTask: TaskRecord = {
  name: "Transform",
  description: "Maps fields between record shapes.",
  tags: ["primitive", "transform"],
  appTags: { appType: "nocredapp" },
  inputs: [
    { name: "Source", dataType: "STRING", required: true },
    { name: "Mapping", dataType: "STRING", required: true, templateFile: encodeContent(MAPPING_TEMPLATE), format: "yml" },
    { name: "Enabled", dataType: "BOOL", required: true },
  ],
  outputs: [{ name: "Result", dataType: "FILE" }],
};

export const notifyTask: TaskRecord = {
  name: "NotifySlack",
  description: "Posts a message to a Slack channel.",
  tags: ["primitive", "notify"],
  appTags: { appType: ["Slack"] },
  inputs: [
    { name: "Channel", dataType: "STRING", required: true, allowedValues: ["#alerts", "#audit"], allowUserValues: false },
    { name: "Message", dataType: "STRING" },
  ],
  outputs: [{ name: "Status", dataType: "STRING" }],
};

export const evidenceTask: TaskRecord = {
  name: "UploadEvidence",
  description: "Stores an evidence file.",
  inputs: [
    { name: "Evidence", dataType: "FILE", required: true, templateFile: "", format: "" },
    { name: "RunDate", dataType: "DATE", required: true },
  ],
};

export const ALL_TASKS: TaskRecord[] = [fetchDataTask, transformTask, notifyTask, evidenceTask];

export function parsedTask(record: TaskRecord): Task {
  return taskSchema.parse(record);
}

// Resolves with the rejection so tests can assert on the error itself.
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  expect.fail("expected the promise to reject");
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  expect.fail("expected the call to throw");
}
