import { describe, it } from "mocha";
import { expect } from "chai";
import { loadConfig } from "../src/config.js";
import { createToolContext } from "../src/mcp/tool-context.js";
import {
  ASSESSMENT_TOOL_NAMES,
  RULE_ALLOWED_TOOLS,
  RULE_TOOL_NAMES,
  buildQueryOptions,
  buildSubagentDefinitions,
  buildSystemPrompt,
  mcpToolName,
} from "../src/rule-agent.js";
import { FakeApi } from "./helpers/fake-api.js";

describe("rule agent options", () => {
  it("namespaces tools under the rule server", () => {
    expect(mcpToolName("create_rule")).to.equal("mcp__rule-tools__create_rule");
    expect(RULE_ALLOWED_TOOLS[0]).to.equal("Task");
    expect(RULE_ALLOWED_TOOLS).to.include("mcp__rule-tools__verify_collected_inputs");
    expect(RULE_ALLOWED_TOOLS).to.include("mcp__rule-tools__fetch_evidence_records");
    expect(RULE_ALLOWED_TOOLS).to.have.length(1 + RULE_TOOL_NAMES.length + ASSESSMENT_TOOL_NAMES.length);
  });

  it("gives each subagent only its own tools", () => {
    const agents = buildSubagentDefinitions();
    expect(Object.keys(agents)).to.deep.equal(["task-analyst", "io-mapper", "evidence-reviewer"]);
    expect(agents["io-mapper"]?.tools).to.deep.equal([
      "mcp__rule-tools__get_task_details",
      "mcp__rule-tools__build_rule_structure",
    ]);
    expect(agents["task-analyst"]?.model).to.equal("haiku");
    expect(agents["evidence-reviewer"]?.tools).to.not.include("mcp__rule-tools__execute_action");
  });

  it("states the rule API version in the system prompt", () => {
    const prompt = buildSystemPrompt(loadConfig({ RULE_GATEWAY_RULE_API_VERSION: "rule.test/v2" }));
    expect(prompt.split("\n").pop()).to.equal("- Rules are created with apiVersion rule.test/v2.");
  });

  it("builds query options from the config", () => {
    const ctx = createToolContext(
      loadConfig({ RULE_GATEWAY_ENABLE_SUBAGENTS: "false", RULE_GATEWAY_MAX_TURNS: "7", CLAUDE_MODEL: "test-model" }),
      new FakeApi()
    );
    const options = buildQueryOptions(ctx, "conversation-1");
    expect(options.model).to.equal("test-model");
    expect(options.maxTurns).to.equal(7);
    expect(options.permissionMode).to.equal("bypassPermissions");
    expect(options.resume).to.equal("conversation-1");
    expect(options.agents).to.equal(undefined);
    expect(Object.keys(options.mcpServers ?? {})).to.deep.equal(["rule-tools"]);

    const withAgents = buildQueryOptions(createToolContext(loadConfig({}), new FakeApi()));
    expect(Object.keys(withAgents.agents ?? {})).to.deep.equal(["task-analyst", "io-mapper", "evidence-reviewer"]);
    expect(withAgents).to.not.have.property("resume");
  });
});
