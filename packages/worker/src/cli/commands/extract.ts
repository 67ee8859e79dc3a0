import minimist from "minimist";
import { getConfig } from "@rebus-eval/core";
import { IdiomExtractor } from "../../extraction/extractIdiom";

function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    process.stdin.setEncoding("utf8");
    process.stdin.on("data", (chunk) => (data += chunk));
    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

export async function extractCommand(args: string[] = process.argv.slice(3)) {
  const config = getConfig();
  const argv = minimist(args, { string: ["text"], boolean: ["stdin"] });
  let text: string = argv.text ?? "";
  if ((!text || argv.stdin) && process.stdin.isTTY !== true) {
    text = await readStdin();
  }
  if (!text.trim()) {
    throw new Error("Usage: extract --text '<model response>'  or  echo '<model response>' | extract --stdin");
  }

  const extractor = new IdiomExtractor({ fallbackMaxChars: config.extraction.fallbackMaxChars });
  const trace = extractor.trace(text);
  console.log(JSON.stringify(trace, null, 2));
}
