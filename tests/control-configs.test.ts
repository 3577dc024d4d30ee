import { describe, it } from "mocha";
import { expect } from "chai";
import {
  attachCitation,
  createAssessment,
  createControlConfig,
  createControlNote,
  createSqlRule,
  fetchAssessmentContext,
  fetchControlSourceSummary,
  fetchEvidenceSamples,
  sampleRecordCount,
  suggestControlCitations,
} from "../src/assessments/control-configs.js";
import { encodeContent } from "../src/catalog/task-content.js";
import { BackendError, ValidationError } from "../src/errors.js";
import { FakeApi } from "./helpers/fake-api.js";
import { rejectionOf } from "./helpers/fixtures.js";

const ASSESSMENT_YAML = "metadata:\n  name: Access review\n  categoryName: Security\n";

const citation = {
  assessmentId: "plan-1",
  controlId: "pc-1",
  authorityDocument: "Common Controls",
  controlIdsInAuthorityDocument: ["10014"],
  sortId: "010 014",
  controlNames: ["Multifactor Authentication"],
};

const attachedCitation = {
  id: "cit-1",
  planControlID: "pc-1",
  authorityDocument: "Common Controls",
  controlNames: ["Multifactor Authentication"],
  controlsInAuthorityDocument: ["10014"],
  sortID: "010 014",
  status: "ACTIVE",
};

describe("control configs", () => {
  describe("createAssessment", () => {
    it("files the assessment under an existing category", async () => {
      const api = new FakeApi();
      api.respond("GET", "v1/assessment-categories", [{ id: "cat-1", name: " Security " }]);
      api.respond("POST", "v1/assessments", { id: "plan-9", name: "Access review" });

      expect(await createAssessment(api, ASSESSMENT_YAML)).to.deep.equal({
        assessment: { id: "plan-9", name: "Access review" },
        assessment_id: "plan-9",
        category_name: "Security",
        category_id: "cat-1",
        created_category: false,
      });
      expect(api.callsTo("POST", "v1/assessment-categories")).to.have.length(0);
      expect(api.callsTo("POST", "v1/assessments")[0]?.body).to.deep.equal({
        name: "Access review",
        fileType: "yaml",
        fileContent: encodeContent(ASSESSMENT_YAML),
        categoryId: "cat-1",
      });
    });

    it("creates a category nobody has yet", async () => {
      const api = new FakeApi();
      api.respond("GET", "v1/assessment-categories", []);
      api.respond("POST", "v1/assessment-categories", { id: 12 });
      api.respond("POST", "v1/assessments", { id: "plan-9" });

      const created = await createAssessment(api, ASSESSMENT_YAML);
      expect(created.created_category).to.equal(true);
      expect(created.category_id).to.equal("12");
      expect(api.callsTo("POST", "v1/assessment-categories")[0]?.body).to.deep.equal({ name: "Security" });
    });

    it("needs a name and a category in the metadata", async () => {
      const api = new FakeApi();
      const error = await rejectionOf(createAssessment(api, "metadata:\n  name: Access review\n"));
      expect(error).to.be.instanceOf(ValidationError);
      expect(error).to.have.deep.property("details", ["metadata.categoryName is required"]);

      const invalid = await rejectionOf(createAssessment(api, "metadata: [unclosed"));
      expect(invalid).to.have.property("message").that.matches(/^Invalid YAML: /);
      expect(api.calls).to.have.length(0);
    });
  });

  it("creates a control config with trimmed fields", async () => {
    const api = new FakeApi();
    api.respond("POST", "v1/plan-controls", { id: "pc-1", displayable: "AC-9", alias: "AC", planId: "plan-1" });

    const control = await createControlConfig(api, {
      assessmentId: " plan-1 ",
      name: " Access reviews ",
      alias: "AC",
      controlNumber: "AC-9",
    });
    expect(control).to.deep.equal({ id: "pc-1", displayable: "AC-9", alias: "AC" });
    expect(api.calls[0]?.body).to.deep.equal({
      name: "Access reviews",
      description: "",
      displayable: "AC-9",
      alias: "AC",
      planId: "plan-1",
      isPreRequisite: false,
    });
  });

  it("projects citation suggestions", async () => {
    const api = new FakeApi();
    api.respond("POST", "v1/controls/similar", {
      authorityDocument: "Common Controls",
      items: [
        {
          inputControlName: "MFA",
          controlId: "",
          suggestions: [
            {
              Name: "Multifactor Authentication",
              "Control ID": 10014,
              "Control Classification": "Preventive",
              "Impact Zone": "Identity",
              "Control Requirement": "Mandatory",
              "Sort ID": "010 014",
              "Control Type": "Technical",
              Score: 0.91,
            },
            "unreadable",
          ],
        },
      ],
    });

    const suggestions = await suggestControlCitations(api, { assessmentId: "plan-1", controlName: "MFA", controlId: "pc-1" });
    expect(suggestions).to.deep.equal({
      authority_document: "Common Controls",
      items: [
        {
          input_control_name: "MFA",
          control_id: "pc-1",
          suggestions: [
            {
              name: "Multifactor Authentication",
              controlId: "10014",
              classification: "Preventive",
              impactZone: "Identity",
              requirement: "Mandatory",
              sortId: "010 014",
              controlType: "Technical",
              score: 0.91,
            },
          ],
        },
      ],
    });
    expect(api.calls[0]?.body).to.deep.equal({
      assessment_type: "asset",
      assessment_id: "",
      assessment_name: "",
      use_default_authority_document: true,
      controls: [{ id: "", name: "MFA", description: "" }],
    });
  });

  describe("attachCitation", () => {
    it("only previews until confirmed", async () => {
      const api = new FakeApi();
      expect(await attachCitation(api, citation, false)).to.deep.equal({
        status: "preview",
        assessment_id: "plan-1",
        control_id: "pc-1",
        citation: {
          authorityDocument: "Common Controls",
          controlIdsInAuthorityDocument: ["10014"],
          sortId: "010 014",
          controlNames: ["Multifactor Authentication"],
        },
      });
      expect(api.calls).to.have.length(0);
    });

    it("attaches the citation and syncs control links", async () => {
      const api = new FakeApi();
      api.respond("POST", "v1/plan-control-citations/batch", { items: [attachedCitation] });
      api.respond("POST", "v1/plans/sync-ccf-ids", {});

      expect(await attachCitation(api, citation, true)).to.deep.equal({
        status: "done",
        citations: [attachedCitation],
        warnings: [],
      });
      expect(api.callsTo("POST", "v1/plan-control-citations/batch")[0]?.body).to.deep.equal({
        authorityDocument: "Common Controls",
        planControlCitations: [
          {
            planControlID: "pc-1",
            controlsInAuthorityDocument: ["10014"],
            sortID: "010 014",
            controlNames: ["Multifactor Authentication"],
          },
        ],
      });
      expect(api.callsTo("POST", "v1/plans/sync-ccf-ids")[0]?.body).to.deep.equal({
        planID: "plan-1",
        authorityDocument: "Common Controls",
        updateControlLinking: true,
        controlId: "pc-1",
      });
    });

    it("keeps the citation when the sync fails", async () => {
      const api = new FakeApi();
      api.respond("POST", "v1/plan-control-citations/batch", { items: [attachedCitation] });
      api.fail = (call) => (call.path === "v1/plans/sync-ccf-ids" ? new BackendError("sync down") : undefined);

      const attached = await attachCitation(api, citation, true);
      expect(attached).to.deep.equal({
        status: "done",
        citations: [attachedCitation],
        warnings: ["Citation attached, but syncing control links failed: sync down"],
      });
    });

    it("lists every missing field", async () => {
      const error = await rejectionOf(
        attachCitation(new FakeApi(), { ...citation, sortId: "", controlNames: [" "] }, true)
      );
      expect(error).to.be.instanceOf(ValidationError);
      expect(error).to.have.property("message", "Cannot attach the citation");
      expect(error).to.have.deep.property("details", [
        "sortId is required",
        "controlNames must list at least one value",
      ]);
    });
  });

  describe("fetchControlSourceSummary", () => {
    it("reports whether the control has lineage", async () => {
      const api = new FakeApi();
      const lineage = [
        {
          originType: "citation",
          recursionLevel: 1,
          linkedFrom: [
            {
              controlId: "pc-2",
              evidences: [{ name: "users", columnsInfo: [{ name: "email", type: "STRING" }] }],
              lineage: [],
            },
          ],
        },
      ];
      api.respond("POST", "v1/plan-controls/fetch-source-summary", { controlId: "pc-1", lineage });

      const linked = await fetchControlSourceSummary(api, "pc-1");
      expect(linked.has_lineage).to.equal(true);
      expect(linked.summary.lineage).to.deep.equal(lineage);
      expect(linked.summary.controlId).to.equal("pc-1");
      expect(api.calls[0]?.body).to.deep.equal({ controlID: "pc-1" });

      api.respond("POST", "v1/plan-controls/fetch-source-summary", { lineage: null });
      expect((await fetchControlSourceSummary(api, "pc-1")).has_lineage).to.equal(false);
    });

    it("rejects a lineage of the wrong shape", async () => {
      const api = new FakeApi();
      api.respond("POST", "v1/plan-controls/fetch-source-summary", { lineage: [{ recursionLevel: "one" }] });

      const error = await rejectionOf(fetchControlSourceSummary(api, "pc-1"));
      expect(error).to.be.instanceOf(BackendError);
      expect(error).to.have.property(
        "message",
        "Malformed control source summary response at lineage.0.recursionLevel: Expected number, received string"
      );
    });
  });

  it("keeps the sample size between one and ten", () => {
    expect(sampleRecordCount(undefined)).to.equal(3);
    expect(sampleRecordCount(0)).to.equal(3);
    expect(sampleRecordCount(11)).to.equal(3);
    expect(sampleRecordCount(2.5)).to.equal(3);
    expect(sampleRecordCount(10)).to.equal(10);
  });

  it("fetches evidence samples for the named evidence", async () => {
    const api = new FakeApi();
    api.respond("POST", "v1/plan-controls/fetch-sample-evidence-data", [{ evidenceName: "users", records: [] }]);

    const samples = await fetchEvidenceSamples(api, { controlConfigId: "pc-1", evidenceNames: [" users ", ""] });
    expect(samples).to.deep.equal({
      control_id: "pc-1",
      record_count: 3,
      evidences: [{ evidenceName: "users", records: [] }],
    });
    expect(api.calls[0]?.body).to.deep.equal({ controlID: "pc-1", records: 3, evidenceNames: ["users"] });

    api.respond("POST", "v1/plan-controls/fetch-sample-evidence-data", { items: [] });
    expect(await rejectionOf(fetchEvidenceSamples(api, { controlConfigId: "pc-1" }))).to.be.instanceOf(BackendError);
  });

  it("reads the assessment context", async () => {
    const api = new FakeApi();
    api.respond("GET", "v1/assessments/context", { entities: ["cmdb_ci"] });
    expect(await fetchAssessmentContext(api)).to.deep.equal({ entities: ["cmdb_ci"] });
  });

  describe("createSqlRule", () => {
    const request = {
      controlConfigId: "pc-1",
      sqlQuery: " SELECT email FROM users WHERE mfa = false ",
      referencedEvidenceNames: ["users"],
      newEvidenceName: "users_without_mfa",
    };

    it("previews the query before creating anything", async () => {
      const api = new FakeApi();
      expect(await createSqlRule(api, request, false)).to.deep.equal({
        status: "preview",
        control_config_id: "pc-1",
        sql_query: "SELECT email FROM users WHERE mfa = false",
        new_evidence_name: "users_without_mfa",
        referenced_evidence_names: ["users"],
      });
      expect(api.calls).to.have.length(0);
    });

    it("creates the rule on the control config", async () => {
      const api = new FakeApi();
      api.respond("POST", "v1/plan-controls/pc-1/create-sql-rule-evidence", { ruleId: "rule-5", evidenceId: "ev-7" });

      expect(await createSqlRule(api, request, true)).to.deep.equal({
        status: "done",
        rule_id: "rule-5",
        evidence_id: "ev-7",
      });
      expect(api.calls[0]?.body).to.deep.equal({
        sqlQuery: "SELECT email FROM users WHERE mfa = false",
        evidenceName: "users_without_mfa",
        referedEvidenceNames: ["users"],
      });

      api.respond("POST", "v1/plan-controls/pc-1/create-sql-rule-evidence", { evidenceId: "ev-7" });
      expect(await rejectionOf(createSqlRule(api, request, true))).to.have.property(
        "message",
        "Malformed SQL rule creation response at ruleId: Invalid input"
      );
    });
  });

  it("adds a note under the default topic", async () => {
    const api = new FakeApi();
    const request = { controlConfigId: "pc-1", assessmentId: "plan-1", notes: "# Query logic" };
    expect(await createControlNote(api, request, false)).to.deep.equal({
      status: "preview",
      control_config_id: "pc-1",
      topic: "SQL Rule Documentation",
      notes: "# Query logic",
    });
    expect(api.calls).to.have.length(0);

    api.respond("POST", "v1/plan-controls/pc-1/notes", { id: "note-1" });
    expect(await createControlNote(api, request, true)).to.deep.equal({ status: "done", note: { id: "note-1" } });
    expect(api.calls[0]?.body).to.deep.equal({
      topic: "SQL Rule Documentation",
      notes: "# Query logic",
      planId: "plan-1",
      planControlID: "pc-1",
    });
  });
});
