import { describe, it } from "mocha";
import { expect } from "chai";
import { dataTypeLabel, isFileDataType, parseDataType, validateValue } from "../src/rules/data-types.js";

describe("data types", () => {
  it("normalises catalog type names and aliases", () => {
    expect(parseDataType("integer")).to.equal("INT");
    expect(parseDataType(" bool ")).to.equal("BOOLEAN");
    expect(parseDataType("http_config")).to.equal("HTTP_CONFIG");
    expect(parseDataType("weird")).to.equal("STRING");
    expect(parseDataType(null)).to.equal("STRING");
  });

  it("knows which types are stored as files", () => {
    expect(isFileDataType("FILE")).to.equal(true);
    expect(isFileDataType("HTTP_CONFIG")).to.equal(true);
    expect(isFileDataType("STRING")).to.equal(false);
    expect(dataTypeLabel("INT")).to.equal("integer");
  });

  it("coerces integers and rejects fractions", () => {
    expect(validateValue("12", "INT")).to.deep.equal({ valid: true, value: 12 });
    expect(validateValue(" 7 ", "INT")).to.deep.equal({ valid: true, value: 7 });
    expect(validateValue(5, "INT")).to.deep.equal({ valid: true, value: 5 });
    expect(validateValue("12.5", "INT")).to.deep.equal({ valid: false, error: "'12.5' is not a valid integer" });
  });

  it("rejects integers that would lose precision", () => {
    expect(validateValue("9007199254740991", "INT")).to.deep.equal({ valid: true, value: 9007199254740991 });
    expect(validateValue("9007199254740993", "INT")).to.deep.equal({
      valid: false,
      error: "'9007199254740993' is outside the safe integer range",
    });
  });

  it("rejects floats that overflow to infinity", () => {
    expect(validateValue("1e400", "FLOAT")).to.deep.equal({
      valid: false,
      error: "'1e400' is too large to store as a number",
    });
    expect(validateValue("-1.5e3", "FLOAT")).to.deep.equal({ valid: true, value: -1500 });
  });

  it("accepts floats in exponent form", () => {
    expect(validateValue("1e3", "FLOAT")).to.deep.equal({ valid: true, value: 1000 });
    expect(validateValue("abc", "FLOAT")).to.deep.equal({ valid: false, error: "'abc' is not a valid number" });
  });

  it("maps boolean words", () => {
    expect(validateValue("Yes", "BOOLEAN")).to.deep.equal({ valid: true, value: true });
    expect(validateValue("0", "BOOLEAN")).to.deep.equal({ valid: true, value: false });
    expect(validateValue("NO", "BOOLEAN")).to.deep.equal({ valid: true, value: false });
    expect(validateValue("TRUE", "BOOLEAN")).to.deep.equal({ valid: true, value: true });
    expect(validateValue("maybe", "BOOLEAN").valid).to.equal(false);
  });

  it("checks calendar dates", () => {
    expect(validateValue("2024-02-29", "DATE")).to.deep.equal({ valid: true, value: "2024-02-29" });
    expect(validateValue("2023-02-29", "DATE")).to.deep.equal({
      valid: false,
      error: "'2023-02-29' is not a valid date (expected YYYY-MM-DD)",
    });
  });

  it("checks datetimes with optional zone", () => {
    expect(validateValue("2024-05-01T10:30:00Z", "DATETIME").valid).to.equal(true);
    expect(validateValue("2024-05-01T10:30+02:00", "DATETIME").valid).to.equal(true);
    expect(validateValue("2024-05-01T24:00", "DATETIME").valid).to.equal(false);
  });

  it("keeps surrounding whitespace on free text only", () => {
    expect(validateValue(" keep ", "STRING")).to.deep.equal({ valid: true, value: " keep " });
    expect(validateValue("", "FILE")).to.deep.equal({ valid: false, error: "File content is empty" });
  });
});
