import { parseOperatorArgs, toFlag } from "../lib/operators/argv";
import { defaultContext, invokeOperator } from "../lib/operators/dispatch";
import { describeOperators, getAllOperatorNames, getOperator } from "../lib/operators/registry";
import { ToolkitError } from "../lib/errors";

function printOperators() {
  for (const op of describeOperators()) {
    console.log(`\n${op.name}: ${op.description}`);
    for (const p of op.params) {
      const req = p.required ? " (required)" : p.default !== undefined ? ` [default: ${p.default}]` : "";
      const choices = p.choices ? ` {${p.choices.join("|")}}` : "";
      console.log(`  ${toFlag(p.name)} <${p.type}>${choices}  ${p.help}${req}`);
    }
  }
  console.log(`\nEvery operator also takes --database <path>.`);
}

async function main() {
  const [name, ...rest] = process.argv.slice(2);

  if (!name || name === "--list" || name === "--help") {
    console.log(`Usage: run-operator <operator> [--flag value ...]`);
    printOperators();
    process.exit(name ? 0 : 1);
  }

  const { values, database } = parseOperatorArgs(getOperator(name), rest);
  const context = defaultContext();
  if (database) context.database = { path: database };

  const result = await invokeOperator(name, values, context);

  console.log(`\n=== ${result.operator}${result.dryRun ? " (dry run)" : ""} ===`);
  for (const [key, count] of Object.entries(result.summary)) {
    console.log(`${key}: ${count}`);
  }
  for (const change of result.preview) {
    console.log(`  ${change.sourceId} ${change.field}: "${change.before}" → "${change.after}"`);
  }
  if (result.output) console.log(`Output: ${result.output}`);
  process.exit(0);
}

main().catch((err) => {
  if (err instanceof ToolkitError) {
    console.error(`[${err.stage}] ${err.code}: ${err.message}`);
    if (err.code === "UNKNOWN_OPERATOR") {
      console.error(`Available: ${getAllOperatorNames().join(", ")}`);
    }
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
