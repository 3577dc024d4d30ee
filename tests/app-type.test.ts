import { describe, it } from "mocha";
import { expect } from "chai";
import { ValidationError } from "../src/errors.js";
import { determinePrimaryAppType } from "../src/rules/app-type.js";
import { thrownBy } from "./helpers/fixtures.js";

const tagged = (name: string, ...appType: string[]) => ({ name, appTags: { appType } });

describe("determinePrimaryAppType", () => {
  it("ignores tasks that need no credentials", () => {
    const result = determinePrimaryAppType([
      tagged("FetchData", "nocredapp"),
      tagged("NotifySlack", "Slack"),
      tagged("Transform", "NoCredApp"),
    ]);
    expect(result).to.deep.equal({
      status: "resolved",
      app_type: "Slack",
      source: "single",
      candidates: [{ app_type: "Slack", tasks: ["NotifySlack"] }],
    });
  });

  it("falls back to the generic type", () => {
    expect(determinePrimaryAppType([tagged("FetchData", "nocredapp")])).to.deep.equal({
      status: "default",
      app_type: "generic",
      candidates: [],
    });
  });

  it("asks when tasks target different applications", () => {
    const result = determinePrimaryAppType([tagged("NotifySlack", "Slack"), tagged("OpenJiraTicket", "Jira")]);
    expect(result.status).to.equal("ambiguous");
    if (result.status !== "ambiguous") return;
    expect(result.message).to.equal(
      [
        "The selected tasks target different applications:",
        "- Slack (used by NotifySlack)",
        "- Jira (used by OpenJiraTicket)",
        "Which application should this rule be labelled with?",
      ].join("\n")
    );
  });

  it("accepts a chosen candidate regardless of case", () => {
    const result = determinePrimaryAppType([tagged("NotifySlack", "Slack"), tagged("OpenJiraTicket", "Jira")], "jira");
    expect(result.status === "resolved" && result.app_type).to.equal("Jira");
    expect(result.status === "resolved" && result.source).to.equal("chosen");
  });

  it("rejects a choice no task uses", () => {
    const error = thrownBy(() =>
      determinePrimaryAppType([tagged("NotifySlack", "Slack"), tagged("OpenJiraTicket", "Jira")], "Teams")
    );
    expect(error).to.be.instanceOf(ValidationError);
    expect(error).to.have.property("message", "App type 'Teams' is not used by any selected task");
    expect(error).to.have.deep.property("context", { candidates: "Slack, Jira" });
  });
});
