#!/usr/bin/env node
import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { resolveChatCompletionApi } from "../adapter/api/index.js";
import { loadConfig } from "../config/env.js";
import { UpstreamError, ValidationError, errorMessage } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { ChatService } from "../runtime/chat-service.js";
import { InMemorySessionStore } from "../runtime/session-store.js";

function parseArgs(argv: string[]): { sessionId?: string } {
  const sessionIdx = argv.indexOf("--session");
  if (sessionIdx >= 0 && argv[sessionIdx + 1]) {
    return { sessionId: argv[sessionIdx + 1] };
  }
  return {};
}

function formatTimestamp(seconds: number): string {
  return seconds > 0 ? new Date(seconds * 1000).toISOString() : "-";
}

async function main(): Promise<void> {
  const config = loadConfig();
  // console output belongs to the conversation; only warnings reach the log
  const logger = createLogger({ ...config, logLevel: "warn" });
  const chat = new ChatService({
    store: new InMemorySessionStore(),
    client: resolveChatCompletionApi(config, logger),
    model: config.openaiModel,
    logger,
  });

  const { sessionId } = chat.resolveSession(parseArgs(process.argv.slice(2)).sessionId);
  const rl = readline.createInterface({ input, output });

  output.write(`session: ${sessionId} (client: ${chat.clientKind})\n`);
  output.write("commands: /exit, /reset, /show, /stats, /sessions\n\n");

  while (true) {
    const line = (await rl.question("you> ")).trim();

    if (!line) {
      continue;
    }

    if (line === "/exit") {
      break;
    }

    if (line === "/reset") {
      chat.clear(sessionId);
      output.write("session reset complete\n");
      continue;
    }

    if (line === "/show") {
      output.write(JSON.stringify(chat.history(sessionId).messages, null, 2) + "\n");
      continue;
    }

    if (line === "/stats") {
      const stats = chat.stats(sessionId);
      output.write(
        `messages=${stats.messageCount} created=${formatTimestamp(stats.createdAt)} updated=${formatTimestamp(stats.updatedAt)}\n`,
      );
      continue;
    }

    if (line === "/sessions") {
      output.write(chat.listSessions().join("\n") + "\n");
      continue;
    }

    try {
      const turn = await chat.ask({ sessionToken: sessionId, body: { question: line } });
      output.write(`assistant> ${turn.answer}\n\n`);
    } catch (error) {
      if (error instanceof ValidationError) {
        output.write(`invalid> ${error.issues.map((issue) => issue.msg).join("; ")}\n\n`);
      } else if (error instanceof UpstreamError) {
        output.write(`error> ${error.message}\n\n`);
      } else {
        throw error;
      }
    }
  }

  rl.close();
}

main().catch((error) => {
  process.stderr.write(`fatal> ${errorMessage(error)}\n`);
  process.exit(1);
});
