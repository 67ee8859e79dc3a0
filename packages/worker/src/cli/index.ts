import { debugExtractionCommand } from "./commands/debug-extraction";
import { evaluateCommand } from "./commands/evaluate";
import { extractCommand } from "./commands/extract";
import { quickTestCommand } from "./commands/quick-test";

export async function runCli() {
  const command = process.argv[2];

  const runners: Record<string, () => Promise<void>> = {
    evaluate: () => evaluateCommand(),
    "debug-extraction": () => debugExtractionCommand(),
    "quick-test": quickTestCommand,
    extract: () => extractCommand(),
  };

  const runner = runners[command || ""];
  if (!runner) {
    console.error(`Unknown command: ${command || "(none)"}`);
    console.error("Available commands:");
    Object.keys(runners).forEach((c) => console.error(`  ${c}`));
    process.exit(1);
  }

  try {
    await runner();
  } catch (error) {
    console.error("Fatal error:", error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
