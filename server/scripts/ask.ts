/**
 * Interactive question loop over the proposal records.
 *
 * Usage:
 *   npm run ask
 *
 * Type a question and press enter. "reload" re-reads the data files,
 * "reset" clears the conversation, "exit" quits.
 */

import * as readline from "readline/promises";
import { getEnv } from "../config/env";
import { createEngine } from "../resolution";
import { logError } from "../utils/errorHandler";

const CLI_SESSION_ID = "cli";

async function main(): Promise<void> {
  const { engine, loadSnapshot } = createEngine(getEnv());
  const status = await engine.initialize(loadSnapshot);
  console.log(`Loaded ${status.records} proposals (${status.indexedBlocks} indexed sections). Type "exit" to quit.\n`);

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      const line = (await rl.question("> ")).trim();
      if (!line) continue;

      const command = line.toLowerCase();
      if (command === "exit" || command === "quit") break;

      if (command === "reload") {
        try {
          const reloaded = await engine.reload(loadSnapshot);
          console.log(`Reloaded snapshot v${reloaded.snapshotVersion}: ${reloaded.records} proposals\n`);
        } catch (error) {
          logError("Ask reload", error);
        }
        continue;
      }

      if (command === "reset") {
        engine.endSession(CLI_SESSION_ID);
        console.log("Conversation cleared.\n");
        continue;
      }

      const answer = await engine.resolve(line, CLI_SESSION_ID);
      console.log(`\n${answer.text}`);
      const evidence = answer.evidence.length > 0 ? ` | evidence: ${answer.evidence.join(", ")}` : "";
      const reason = answer.refusalReason ? ` | ${answer.refusalReason}` : "";
      console.log(`[${answer.strategy}${reason}${evidence}]\n`);
    }
  } finally {
    rl.close();
  }
}

main().catch(error => {
  logError("Ask", error);
  process.exit(1);
});
