import { describe, it } from "mocha";
import { expect } from "chai";
import {
  fetchAssessmentRuns,
  fetchEvidenceRecords,
  fetchRecentAssessmentRuns,
  fetchRunControlPlanData,
  fetchRunDetails,
  fetchRunLeafControls,
  searchRunControls,
} from "../src/assessments/runs.js";
import { encodeContent } from "../src/catalog/task-content.js";
import { BackendError, ValidationError } from "../src/errors.js";
import { FakeApi } from "./helpers/fake-api.js";
import { rejectionOf } from "./helpers/fixtures.js";

const leafControl = {
  id: 7,
  name: "MFA enforced",
  displayable: "AC-2.1",
  alias: "AC-2",
  priority: "High",
  status: "Open",
  dueDate: "2026-04-01",
  complianceStatus: "NON_COMPLIANT",
  owner: "it-ops",
};

describe("assessment runs", () => {
  it("keeps only runs that carry both ids", async () => {
    const api = new FakeApi();
    api.respond("GET", "v1/plan-instances", {
      items: [
        {
          id: "run-1",
          planId: "plan-1",
          name: "Q1 run",
          status: "Completed",
          computedScore: 82.5,
          complianceStatus: "COMPLIANT",
          createdAt: "2026-03-01T00:00:00Z",
        },
        { id: "run-2" },
        { planId: "plan-1" },
      ],
    });

    expect(await fetchRecentAssessmentRuns(api, "plan-1")).to.deep.equal([
      {
        id: "run-1",
        assessmentId: "plan-1",
        name: "Q1 run",
        description: "",
        applicationType: "",
        configId: "",
        fromDate: "",
        toDate: "",
        started: "",
        ended: "",
        status: "Completed",
        computedScore: 82.5,
        computedWeight: null,
        complianceStatus: "COMPLIANT",
        createdAt: "2026-03-01T00:00:00Z",
      },
    ]);
    expect(api.callsTo("GET", "v1/plan-instances")[0]?.params).to.deep.equal({
      fields: "basic",
      page: 1,
      page_size: 10,
      plan_id: "plan-1",
    });
  });

  it("reads zero as the first page at full size", async () => {
    const api = new FakeApi();
    api.respond("GET", "v1/plan-instances", { items: [] });

    expect(await fetchAssessmentRuns(api, "plan-1", 0, 0)).to.deep.equal({ page: 1, page_size: 10, runs: [] });
    await fetchAssessmentRuns(api, "plan-1", 3, 5);
    expect(api.callsTo("GET", "v1/plan-instances")[1]?.params).to.include({ page: 3, page_size: 5 });
  });

  it("refuses pages larger than ten runs", async () => {
    const api = new FakeApi();
    const error = await rejectionOf(fetchAssessmentRuns(api, "plan-1", 1, 11));
    expect(error).to.be.instanceOf(ValidationError);
    expect(error).to.have.property("message", "Page size must be between 1 and 10, got 11");
    expect(api.calls).to.have.length(0);
  });

  it("projects a run's leaf controls", async () => {
    const api = new FakeApi();
    api.respond("GET", "v1/plan-instance-controls", { items: [leafControl, "junk"] });

    expect(await fetchRunLeafControls(api, "run-1")).to.deep.equal([
      {
        id: "7",
        name: "MFA enforced",
        controlNumber: "AC-2.1",
        alias: "AC-2",
        priority: "High",
        status: "Open",
        dueDate: "2026-04-01",
        complianceStatus: "NON_COMPLIANT",
      },
    ]);
    expect(await fetchRunDetails(api, "run-1")).to.deep.equal([leafControl]);
    expect(api.callsTo("GET", "v1/plan-instance-controls")[0]?.params).to.deep.equal({
      fields: "basic",
      is_leaf_control: true,
      plan_instance_id: "run-1",
    });
  });

  it("searches run controls by name", async () => {
    const api = new FakeApi();
    api.respond("GET", "v1/plan-instance-controls", { items: [leafControl] });

    const found = await searchRunControls(api, "MFA");
    expect(found.map((control) => control.controlNumber)).to.deep.equal(["AC-2.1"]);
    expect(api.calls[0]?.params).to.deep.equal({
      fields: "basic",
      control_name_contains: "MFA",
      page: 1,
      page_size: 50,
    });
  });

  it("escapes the run control id in the plan data path", async () => {
    const api = new FakeApi();
    api.respond("GET", "v1/plan-instance-controls/ctl%2F1/plan-data", { planControl: { id: "pc-1" } });

    expect(await fetchRunControlPlanData(api, "ctl/1")).to.deep.equal({ planControl: { id: "pc-1" } });

    api.respond("GET", "v1/plan-instance-controls/ctl-2/plan-data", ["not", "a", "record"]);
    const error = await rejectionOf(fetchRunControlPlanData(api, "ctl-2"));
    expect(error).to.be.instanceOf(BackendError);
    expect(error).to.have.property("message", "Malformed plan data response for run control ctl-2");
  });

  describe("fetchEvidenceRecords", () => {
    it("decodes the evidence file and projects its records", async () => {
      const api = new FakeApi();
      const file = [
        { id: "r1", ResourceID: "i-1", ResourceName: "web", ResourceType: "vm", ComplianceStatus: "COMPLIANT", zone: "a" },
        { ResourceID: "no-id" },
      ];
      api.respond("POST", "v1/datahandler/fetch-data", { fileBytes: encodeContent(JSON.stringify(file)) });

      expect(await fetchEvidenceRecords(api, "ev-1")).to.deep.equal([
        { id: "r1", ResourceID: "i-1", ResourceName: "web", ResourceType: "vm", ComplianceStatus: "COMPLIANT" },
      ]);
      expect(api.calls[0]?.body).to.deep.equal({
        evidenceID: "ev-1",
        templateType: "evidence",
        status: ["active"],
        returnFormat: "json",
        isSrcFetchCall: true,
        isUserPriority: true,
        considerFileSizeRestriction: true,
        viewEvidenceFlow: true,
      });
    });

    it("rejects files that are not a JSON list", async () => {
      const api = new FakeApi();
      api.respond("POST", "v1/datahandler/fetch-data", { fileBytes: encodeContent("not json") });
      expect(await rejectionOf(fetchEvidenceRecords(api, "ev-1"))).to.have.property(
        "message",
        "Evidence ev-1 is not a JSON file"
      );

      api.respond("POST", "v1/datahandler/fetch-data", { fileBytes: encodeContent('{"id":"r1"}') });
      expect(await rejectionOf(fetchEvidenceRecords(api, "ev-1"))).to.have.property(
        "message",
        "Evidence ev-1 does not hold a list of records"
      );

      api.respond("POST", "v1/datahandler/fetch-data", {});
      expect(await rejectionOf(fetchEvidenceRecords(api, "ev-1"))).to.have.property(
        "message",
        "Malformed evidence data response at fileBytes: Required"
      );
    });
  });
});
