import { describe, it } from "mocha";
import { expect } from "chai";
import { type IoMapContext, parseIoAddress, parseIoMapEntry, validateIoMap } from "../src/rules/io-map.js";

const context: IoMapContext = {
  tasks: [{ alias: "t1", inputs: ["Source"], outputs: ["Records"] }],
  ruleInputs: ["Source"],
  ruleOutputs: ["Report"],
};

describe("io map", () => {
  it("parses task and rule addresses", () => {
    expect(parseIoAddress("t1.Input.Source")).to.deep.equal({
      place: "t1",
      taskIndex: 1,
      direction: "Input",
      attribute: "Source",
    });
    expect(parseIoAddress("*.Output.Report.csv")).to.deep.equal({
      place: "*",
      direction: "Output",
      attribute: "Report.csv",
    });
  });

  it("rejects malformed addresses", () => {
    expect(parseIoAddress("t0.Input.Source")).to.equal(undefined);
    expect(parseIoAddress("t1.Inbound.Source")).to.equal(undefined);
    expect(parseIoAddress("t1.Input.")).to.equal(undefined);
    expect(parseIoAddress("task1.Input.Source")).to.equal(undefined);
  });

  it("parses quoted entries", () => {
    const parsed = parseIoMapEntry("'t1.Input.Source:=*.Input.Source'");
    expect(parsed.ok).to.equal(true);
    expect(parsed.ok && parsed.entry.source.place).to.equal("*");
  });

  it("requires the := separator", () => {
    expect(parseIoMapEntry("t1.Input.Source=*.Input.Source")).to.deep.equal({
      ok: false,
      error: "'t1.Input.Source=*.Input.Source' is not of the form destination:=source",
    });
  });

  it("accepts well-formed references", () => {
    expect(validateIoMap(["t1.Input.Source:=*.Input.Source", "*.Output.Report:=t1.Output.Records"], context)).to.deep.equal(
      []
    );
  });

  it("refuses task outputs as destinations", () => {
    expect(validateIoMap(["t1.Output.Records:=*.Input.Source"], context)).to.deep.equal([
      "t1.Output.Records in 't1.Output.Records:=*.Input.Source' is a task output and cannot be a destination",
    ]);
  });

  it("reports unknown aliases and rule inputs", () => {
    expect(validateIoMap(["t2.Input.Source:=*.Input.Missing"], context)).to.deep.equal([
      "t2.Input.Source in 't2.Input.Source:=*.Input.Missing' refers to unknown task alias t2",
      "*.Input.Missing in 't2.Input.Source:=*.Input.Missing' does not name a rule input",
    ]);
  });

  it("checks attributes against the task declaration", () => {
    expect(validateIoMap(["t1.Input.Nope:=*.Input.Source"], context)).to.deep.equal([
      "t1.Input.Nope in 't1.Input.Nope:=*.Input.Source' does not name a declared input of t1",
    ]);
  });
});
