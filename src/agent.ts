#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { createRuleMcpServer } from "./mcp/rule-server.js";
import { createToolContext } from "./mcp/tool-context.js";

type CliOptions = {
  command?: string;
  apiUrl?: string;
  model?: string;
  help?: boolean;
};

// Manual argument parsing: a flag-value loop, no external dependency.
function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg) continue;
    if (arg === "--api-url") {
      options.apiUrl = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg === "--model") {
      options.model = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      options.help = true;
      continue;
    }
    if (!arg.startsWith("--") && !options.command) {
      options.command = arg;
    }
  }
  return options;
}

function usage(): string {
  return [
    "Usage:",
    "  rule-gateway serve [--api-url <url>]",
    "  rule-gateway chat [--api-url <url>] [--model <model>]",
    "",
    "Commands:",
    "  serve           Expose the rule-authoring tools as an MCP server on stdio",
    "  chat            Author a rule interactively with the assistant",
    "",
    "Options:",
    "  --api-url       Compliance backend base URL (default: RULE_GATEWAY_API_URL)",
    "  --model         Model for chat (default: CLAUDE_MODEL)",
    "",
    "Environment:",
    "  RULE_GATEWAY_API_URL, RULE_GATEWAY_API_TOKEN, RULE_GATEWAY_TIMEOUT_MS,",
    "  RULE_GATEWAY_MAX_PAGES, RULE_GATEWAY_RULE_API_VERSION, RULE_GATEWAY_MAX_TURNS,",
    "  RULE_GATEWAY_ENABLE_SUBAGENTS, CLAUDE_MODEL, CLAUDE_CODE_EXECUTABLE",
  ].join("\n");
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  if (options.help || !options.command) {
    console.error(usage());
    process.exit(options.help ? 0 : 1);
  }

  const config = loadConfig({
    ...process.env,
    ...(options.apiUrl ? { RULE_GATEWAY_API_URL: options.apiUrl } : {}),
    ...(options.model ? { CLAUDE_MODEL: options.model } : {}),
  });
  const ctx = createToolContext(config);

  if (options.command === "serve") {
    // stdout carries the protocol; all logging goes to stderr.
    const server = createRuleMcpServer(ctx);
    await server.instance.connect(new StdioServerTransport());
    console.error(`rule-tools MCP server listening on stdio (backend ${config.apiBaseUrl})`);
    return;
  }

  if (options.command === "chat") {
    // Dynamic import keeps the readline and agent query loop out of serve mode.
    const { runChatSession } = await import("./repl.js");
    await runChatSession(ctx);
    return;
  }

  console.error(`Unknown command: ${options.command}\n`);
  console.error(usage());
  process.exit(1);
}

main().catch((error) => {
  console.error("Gateway failed:", error);
  process.exit(1);
});
