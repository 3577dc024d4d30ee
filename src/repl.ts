/**
 * Interactive rule-authoring chat.
 *
 * Each line the user types becomes one query() call. The first call starts a
 * conversation; later calls resume it by session id so the agent keeps the
 * collected inputs and the workflow position in context. Tool state (workflow
 * sessions) lives in the shared ToolContext for the whole chat.
 */

import { createInterface, type Interface } from "node:readline/promises";
import { stdin, stdout } from "node:process";
import { query } from "@anthropic-ai/claude-agent-sdk";
import type { ToolContext } from "./mcp/tool-context.js";
import { buildQueryOptions, streamedText } from "./rule-agent.js";

const GREETING = [
  "Rule authoring assistant.",
  'Describe the rule you want to build, "session <id>" to show a workflow session, or "exit" to quit.',
  "",
].join("\n");

async function runTurn(ctx: ToolContext, prompt: string, conversationId: string): Promise<string> {
  let sessionId = conversationId;
  let gotText = false;

  for await (const message of query({ prompt, options: buildQueryOptions(ctx, conversationId || undefined) })) {
    // Capture the conversation id from the first message that carries one.
    if (!sessionId && "session_id" in message && message.session_id) {
      sessionId = message.session_id;
    }

    const text = streamedText(message);
    if (text) {
      process.stdout.write(text);
      gotText = true;
    }

    // Non-streaming fallback.
    if (message.type === "result" && message.subtype === "success" && !gotText && message.result) {
      process.stdout.write(message.result);
    }
    if (message.type === "result" && message.subtype !== "success") {
      console.error(`\nAgent stopped: ${message.subtype}`);
    }
  }

  console.log();
  return sessionId;
}

export async function runChatSession(ctx: ToolContext): Promise<void> {
  console.log(GREETING);

  const rl: Interface = createInterface({ input: stdin, output: stdout });
  let conversationId = "";

  try {
    while (true) {
      let line: string;
      try {
        line = await rl.question("rule> ");
      } catch {
        // readline closed (Ctrl-D)
        break;
      }

      const trimmed = line.trim();
      if (!trimmed) continue;
      if (trimmed === "exit" || trimmed === "quit") break;

      if (trimmed.startsWith("session ")) {
        const id = trimmed.slice("session ".length).trim();
        try {
          console.log(JSON.stringify(ctx.sessions.get(id).snapshot(), null, 2));
        } catch (err) {
          console.error(err instanceof Error ? err.message : String(err));
        }
        continue;
      }

      try {
        conversationId = await runTurn(ctx, trimmed, conversationId);
      } catch (err) {
        console.error(`Turn failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  } finally {
    rl.close();
  }

  console.log("Goodbye.");
}
