import { loadConfig } from "../config/env.js";
import { createChatService } from "../runtime/chat-service.js";
import { createStderrLogger } from "../runtime/logger.js";
import { createEventPrinter } from "./chat-events.js";

function parseArgs(argv: string[]): { userId: string; message: string; json: boolean } {
  const userIdx = argv.indexOf("--user");
  const msgIdx = argv.indexOf("--message");

  const userId = userIdx >= 0 && argv[userIdx + 1] ? argv[userIdx + 1] : "local";
  const message = msgIdx >= 0 && argv[msgIdx + 1] ? argv[msgIdx + 1] : "";

  if (!message.trim()) {
    throw new Error("--message is required");
  }

  return { userId, message, json: argv.includes("--json") };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const { userId, message, json } = parseArgs(process.argv.slice(2));
  const logger = createStderrLogger(config.logLevel);
  const service = await createChatService(config, {
    logger,
    onEvent: json ? undefined : createEventPrinter((line) => process.stderr.write(line)),
  });

  const result = await service.chat(userId, message);
  if (json) {
    process.stdout.write(JSON.stringify(result, null, 2) + "\n");
  } else if (result.success) {
    process.stdout.write((result.message ?? "") + "\n");
  }

  if (!result.success) {
    throw new Error(result.error ?? "chat turn failed");
  }
}

main().catch((error: unknown) => {
  process.stderr.write(`fatal> ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
