/**
 * Evaluate the engine against data/evaluation_set.json
 *
 * Usage:
 *   npm run evaluate [-- --verbose]
 *
 * Options:
 *   --verbose    Print every mismatch with the expected and actual answer
 */

import { getEnv } from "../config/env";
import { loadEvaluationSet, runEvaluation } from "../evaluation/evaluator";
import { createEngine } from "../resolution";
import { logError } from "../utils/errorHandler";

async function main(): Promise<void> {
  const verbose = process.argv.includes("--verbose");
  const env = getEnv();
  const { engine, loadSnapshot } = createEngine(env);
  await engine.initialize(loadSnapshot);

  const cases = loadEvaluationSet(env.EVALUATION_SET_PATH);
  const report = await runEvaluation(engine, cases);

  console.log("\n📊 Evaluation");
  console.log("=".repeat(50));
  console.log(`Cases: ${report.total}`);
  console.log(`Exact match: ${report.exactMatches}/${report.total} (${(report.accuracy * 100).toFixed(1)}%)`);
  console.log("\nStrategy distribution:");
  for (const [strategy, count] of Object.entries(report.strategyDistribution)) {
    console.log(`  ${strategy.padEnd(14)} ${count}`);
  }

  const strategyMisses = report.results.filter(r => r.strategyMatch === false);
  if (strategyMisses.length > 0) {
    console.log(`\nStrategy mismatches: ${strategyMisses.length}`);
  }

  if (verbose) {
    for (const result of report.results.filter(r => !r.exactMatch)) {
      console.log("\n" + "-".repeat(50));
      console.log(`Q: ${result.case.question}`);
      console.log(`Expected: ${result.case.expectedAnswer}`);
      console.log(`Actual (${result.answer.strategy}): ${result.answer.text}`);
    }
  }
  console.log("=".repeat(50));
}

main().catch(error => {
  logError("Evaluate", error);
  process.exit(1);
});
