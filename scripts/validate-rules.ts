// ─── Validate Rules ────────────────────────────────────────────────
// CLI script that parses and compiles every .rules.json file in rules/.
// Prints one report per file covering every rule that fails to compile.
// Exits 0 if all pass, 1 if any fail.

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  RuleCompiler,
  RuleSetParseError,
  formatRuleFailures,
  parseRuleSetJson,
} from "../packages/engine/src/index";

const RULES_DIR = fileURLToPath(new URL("../rules/", import.meta.url));

async function validateFile(compiler: RuleCompiler, file: string): Promise<boolean> {
  const text = await readFile(join(RULES_DIR, file), "utf-8");

  try {
    const ruleSet = parseRuleSetJson(text);
    const { rules, failures } = compiler.compileAll(ruleSet.rules);

    if (failures.length === 0) {
      console.log(`  ✅ ${file} (${rules.length} rule(s))`);
      return true;
    }

    console.error(`  ❌ ${file}: ${failures.length} of ${ruleSet.rules.length} rule(s) failed\n`);
    console.error(formatRuleFailures(failures));
    return false;
  } catch (error) {
    if (!(error instanceof RuleSetParseError)) throw error;
    console.error(`  ❌ ${file}`);
    for (const issue of error.issues) {
      console.error(`     ${issue}`);
    }
    return false;
  }
}

async function main(): Promise<void> {
  const entries = await readdir(RULES_DIR);
  const files = entries.filter((f) => f.endsWith(".rules.json")).sort();

  if (files.length === 0) {
    console.error("No .rules.json files found in rules/");
    process.exitCode = 1;
    return;
  }

  console.log(`\nValidating ${files.length} rule set(s)...\n`);

  const compiler = new RuleCompiler();
  let failed = 0;
  for (const file of files) {
    if (!(await validateFile(compiler, file))) failed++;
  }

  console.log();

  if (failed > 0) {
    console.error(`${failed} of ${files.length} rule set(s) failed validation.`);
    process.exitCode = 1;
    return;
  }

  console.log(`All ${files.length} rule set(s) passed validation.`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
