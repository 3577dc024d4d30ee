import { describe, it } from "mocha";
import { expect } from "chai";
import {
  DEFAULT_API_BASE_URL,
  DEFAULT_MODEL,
  DEFAULT_RULE_API_VERSION,
  loadConfig,
  readBool,
  readInt,
} from "../src/config.js";

describe("config", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).to.deep.equal({
      apiBaseUrl: DEFAULT_API_BASE_URL,
      apiToken: undefined,
      requestTimeoutMs: 60_000,
      maxControlPages: 10,
      sessionIdleTtlMs: 3_600_000,
      ruleApiVersion: DEFAULT_RULE_API_VERSION,
      model: DEFAULT_MODEL,
      maxTurns: 50,
      enableSubagents: true,
      claudeCodeExecutable: undefined,
    });
  });

  it("reads overrides and ignores unusable numbers", () => {
    const config = loadConfig({
      RULE_GATEWAY_API_URL: "http://backend.test/api",
      RULE_GATEWAY_API_TOKEN: "test-secret",
      RULE_GATEWAY_TIMEOUT_MS: "abc",
      RULE_GATEWAY_MAX_PAGES: "3",
      RULE_GATEWAY_ENABLE_SUBAGENTS: "off",
      CLAUDE_CODE_PATH: "/opt/claude",
    });
    expect(config.apiBaseUrl).to.equal("http://backend.test/api/");
    expect(config.apiToken).to.equal("test-secret");
    expect(config.requestTimeoutMs).to.equal(60_000);
    expect(config.maxControlPages).to.equal(3);
    expect(config.enableSubagents).to.equal(false);
    expect(config.claudeCodeExecutable).to.equal("/opt/claude");
  });

  it("parses boolean and integer flags", () => {
    expect(readBool({ FLAG: "Yes" }, "FLAG", false)).to.equal(true);
    expect(readBool({ FLAG: " off " }, "FLAG", true)).to.equal(false);
    expect(readBool({ FLAG: "sometimes" }, "FLAG", false)).to.equal(false);
    expect(readInt({ N: "-4" }, "N", 7)).to.equal(7);
    expect(readInt({ N: "12" }, "N", 7)).to.equal(12);
    expect(readInt({ N: "12.5" }, "N", 7)).to.equal(7);
    expect(readInt({ N: "9007199254740993" }, "N", 7)).to.equal(7);
    expect(readInt({ N: "0" }, "N", 7, { min: 0 })).to.equal(0);
  });

  it("keeps the page bound within range", () => {
    expect(loadConfig({ RULE_GATEWAY_MAX_PAGES: "500" }).maxControlPages).to.equal(10);
    expect(loadConfig({ RULE_GATEWAY_SESSION_TTL_MS: "1000" }).sessionIdleTtlMs).to.equal(1000);
  });
});
