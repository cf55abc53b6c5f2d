import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { loadConfig } from "../config/env.js";
import { createChatService } from "../runtime/chat-service.js";
import { createStderrLogger } from "../runtime/logger.js";
import { createEventPrinter } from "./chat-events.js";

/**
 * 파일 목적:
 * - 한 사용자로 코치와 대화하는 대화형 REPL.
 *
 * 역의존성:
 * - package.json의 `npm run chat` 스크립트
 */
function parseArgs(argv: string[]): { userId: string } {
  const userIdx = argv.indexOf("--user");
  if (userIdx >= 0 && argv[userIdx + 1]) {
    return { userId: argv[userIdx + 1] };
  }
  return { userId: "local" };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const { userId } = parseArgs(process.argv.slice(2));
  const logger = createStderrLogger(config.logLevel);
  const service = await createChatService(config, {
    logger,
    onEvent: createEventPrinter((line) => output.write(line)),
  });

  const rl = readline.createInterface({ input, output });

  output.write(`user: ${userId}\n`);
  output.write("commands: /exit, /reset, /status, /show\n\n");

  while (true) {
    const line = (await rl.question("you> ")).trim();

    if (!line) {
      continue;
    }

    if (line === "/exit") {
      break;
    }

    if (line === "/reset") {
      service.resetSession(userId);
      output.write("session reset complete\n");
      continue;
    }

    if (line === "/status") {
      const info = service.sessionInfo(userId);
      output.write(`messages=${info.messageCount} active=${info.active}\n`);
      continue;
    }

    if (line === "/show") {
      output.write(JSON.stringify(await service.loadUserContext(userId), null, 2) + "\n");
      continue;
    }

    const result = await service.chat(userId, line);
    if (result.success) {
      output.write(`assistant> ${result.message ?? ""}\n\n`);
    } else {
      output.write(`error> ${result.error ?? "unknown error"}\n\n`);
    }
  }

  rl.close();
  service.shutdown();
}

main().catch((error: unknown) => {
  process.stderr.write(`fatal> ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
