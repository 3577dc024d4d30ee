import { describe, it } from "mocha";
import { expect } from "chai";
import { TaskCatalog } from "../src/catalog/task-catalog.js";
import { BackendError, NoTemplateError, NotFoundError, UploadError, ValidationError } from "../src/errors.js";
import { FileUploader, fileHashFromUrl } from "../src/rules/file-upload.js";
import { collectTemplateInput, confirmTemplateInput, getTemplateGuidance } from "../src/rules/template-input.js";
import { FAKE_FILE_BASE, FakeApi } from "./helpers/fake-api.js";
import { ALL_TASKS, FETCH_CONFIG_TEMPLATE, rejectionOf } from "./helpers/fixtures.js";

const REAL_CONFIG = '{"endpoint":"https://collector.internal.test","retries":5}';
const PRETTY_CONFIG = JSON.stringify(JSON.parse(REAL_CONFIG), null, 2);

function setup() {
  const api = new FakeApi(ALL_TASKS);
  return { api, catalog: new TaskCatalog(api), uploader: new FileUploader(api) };
}

describe("template inputs", () => {
  describe("getTemplateGuidance", () => {
    it("returns the decoded template with its fields and a placeholder example", async () => {
      const { catalog } = setup();
      const guidance = await getTemplateGuidance(catalog, "FetchData", "Config");

      expect(guidance.unique_input_id).to.equal("FetchData.Config");
      expect(guidance.format).to.equal("json");
      expect(guidance.is_file_type).to.equal(true);
      expect(guidance.template).to.equal(FETCH_CONFIG_TEMPLATE);
      expect(guidance.required_fields).to.deep.equal(["endpoint", "retries"]);
      expect(guidance.example).to.equal(JSON.stringify({ endpoint: "example-endpoint", retries: 0 }, null, 2));
      expect(guidance.presentation.split("\n")[0]).to.equal("TEMPLATE INPUT: FetchData.Config (JSON)");
    });

    it("rejects parameter inputs", async () => {
      const { catalog } = setup();
      const error = await rejectionOf(getTemplateGuidance(catalog, "FetchData", "Source"));
      expect(error).to.be.instanceOf(ValidationError);
      expect(error).to.have.property(
        "message",
        "Input Source of task FetchData is a parameter input; collect it with collect_parameter_input"
      );
    });

    it("reports inputs without a template", async () => {
      const { catalog } = setup();
      const error = await rejectionOf(getTemplateGuidance(catalog, "UploadEvidence", "Evidence"));
      expect(error).to.be.instanceOf(NoTemplateError);
      expect(error).to.have.property("message", "Input Evidence of task UploadEvidence has no template");
    });

    it("reports unknown inputs", async () => {
      const { catalog } = setup();
      const error = await rejectionOf(getTemplateGuidance(catalog, "FetchData", "Nope"));
      expect(error).to.be.instanceOf(NotFoundError);
      expect(error).to.have.property("message", "Input Nope not found in task FetchData");
    });
  });

  describe("collectTemplateInput", () => {
    it("validates content and asks for confirmation", async () => {
      const { catalog } = setup();
      const collected = await collectTemplateInput(catalog, "FetchData", "Config", REAL_CONFIG);

      expect(collected.validated_content).to.equal(REAL_CONFIG);
      expect(collected.content_preview).to.equal(PRETTY_CONFIG);
      expect(collected.matches_template).to.equal(false);
      expect(collected.needs_final_confirmation).to.equal(true);
      expect(collected.final_confirmation_message).to.equal(
        `You provided this JSON content:\n\n${PRETTY_CONFIG}\n\nIs this correct? (yes/no)`
      );
    });

    it("rejects the generated example", async () => {
      const { catalog } = setup();
      const example = JSON.stringify({ endpoint: "example-endpoint", retries: 0 }, null, 2);
      const error = await rejectionOf(collectTemplateInput(catalog, "FetchData", "Config", example));
      expect(error).to.be.instanceOf(ValidationError);
      expect(error).to.have.deep.property("details", [
        "The content is the generated example; replace the placeholder values with your real configuration",
      ]);
    });

    it("reports missing template fields", async () => {
      const { catalog } = setup();
      const error = await rejectionOf(collectTemplateInput(catalog, "FetchData", "Config", '{"endpoint":"x"}'));
      expect(error).to.have.deep.property("details", ["Missing required field(s): retries"]);
    });

    it("flags content identical to the template", async () => {
      const { catalog } = setup();
      const collected = await collectTemplateInput(catalog, "FetchData", "Config", FETCH_CONFIG_TEMPLATE);
      expect(collected.matches_template).to.equal(true);
    });
  });

  describe("confirmTemplateInput", () => {
    it("uploads file-typed inputs under a deterministic name", async () => {
      const { api, catalog, uploader } = setup();
      const first = await confirmTemplateInput(catalog, uploader, "fetch-rule", "FetchData", "Config", REAL_CONFIG);

      expect(first.storage_type).to.equal("FILE");
      if (first.storage_type !== "FILE") return;
      expect(first.filename).to.equal("FetchData_Config.json");
      expect(first.file_size).to.equal(Buffer.byteLength(REAL_CONFIG));
      expect(first.file_url.startsWith(FAKE_FILE_BASE)).to.equal(true);

      const updated = '{"endpoint":"https://collector.internal.test","retries":1}';
      const second = await confirmTemplateInput(catalog, uploader, "fetch-rule", "FetchData", "Config", updated);
      expect(second.storage_type === "FILE" && second.file_url).to.equal(first.file_url);
      expect(api.files.size).to.equal(1);
      expect(await uploader.fetchContent(fileHashFromUrl(first.file_url))).to.equal(updated);
    });

    it("keeps non-file template inputs in memory", async () => {
      const { api, catalog, uploader } = setup();
      const content = "fields:\n  - source: name\n    target: full_name\n";
      const confirmed = await confirmTemplateInput(catalog, uploader, "fetch-rule", "Transform", "Mapping", content);

      expect(confirmed).to.deep.equal({
        task_name: "Transform",
        input_name: "Mapping",
        unique_input_id: "Transform.Mapping",
        data_type: "STRING",
        format: "yaml",
        storage_type: "MEMORY",
        stored_content: content,
      });
      expect(api.callsTo("POST", "v1/files/upload")).to.have.length(0);
    });

    it("uploads file inputs without a template as text", async () => {
      const { catalog, uploader } = setup();
      const confirmed = await confirmTemplateInput(catalog, uploader, "evidence-rule", "UploadEvidence", "Evidence", "log line");
      expect(confirmed.storage_type === "FILE" && confirmed.filename).to.equal("UploadEvidence_Evidence.txt");
    });
  });

  describe("FileUploader", () => {
    it("requires a rule name", async () => {
      const { uploader } = setup();
      const error = await rejectionOf(uploader.upload({ ruleName: " ", fileName: "a.txt", content: "x" }));
      expect(error).to.have.property("message", "Rule name is required to upload a file");
    });

    it("accepts base64 content as is", async () => {
      const { api, uploader } = setup();
      const result = await uploader.upload({ ruleName: "r", fileName: "a.txt", content: "aGVsbG8=", encoding: "base64" });
      expect(result.file_size).to.equal(5);
      expect(api.callsTo("POST", "v1/files/upload")[0]?.body).to.deep.equal({
        fileName: "a.txt",
        fileContent: "aGVsbG8=",
        ruleName: "r",
      });
    });

    it("rejects invalid base64", async () => {
      const { uploader } = setup();
      const error = await rejectionOf(uploader.upload({ ruleName: "r", fileName: "a.txt", content: "@@@", encoding: "base64" }));
      expect(error).to.be.instanceOf(ValidationError);
      expect(error).to.have.property("message", "Content is not valid base64");
    });

    it("wraps backend failures", async () => {
      const { api, uploader } = setup();
      api.fail = (call) =>
        call.path === "v1/files/upload" ? new BackendError("POST v1/files/upload failed with status 500: disk full", 500) : undefined;

      const error = await rejectionOf(uploader.upload({ ruleName: "r", fileName: "a.txt", content: "x" }));
      expect(error).to.be.instanceOf(UploadError);
      expect(error).to.have.property(
        "message",
        "File upload failed: POST v1/files/upload failed with status 500: disk full"
      );
    });

    it("fails when the backend returns no file URL", async () => {
      const uploader = new FileUploader({ get: async () => ({}), post: async () => ({}) });
      const error = await rejectionOf(uploader.upload({ ruleName: "r", fileName: "a.txt", content: "x" }));
      expect(error).to.have.property("message", "Unable to find the uploaded file URL");
    });

    it("takes the hash from the last path segment", () => {
      expect(fileHashFromUrl("https://files.test/v1/files/abc123?download=1")).to.equal("abc123");
    });
  });
});
