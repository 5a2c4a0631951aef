import { NoTargetsError } from "../lib/errors";
import { createPipelineContext, runSessions } from "../lib/pipeline";

interface CliArgs {
  sites: string[];
  terms: string[];
  aiEnabled: boolean | undefined;
}

function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = { sites: [], terms: [], aiEnabled: undefined };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--site" && args[i + 1]) {
      parsed.sites.push(args[i + 1]);
      i++;
    } else if (args[i] === "--terms" && args[i + 1]) {
      parsed.terms.push(...args[i + 1].split(",").map((t) => t.trim()).filter(Boolean));
      i++;
    } else if (args[i] === "--no-ai") {
      parsed.aiEnabled = false;
    }
  }
  return parsed;
}

async function main() {
  const { sites, terms, aiEnabled } = parseArgs(process.argv.slice(2));
  if (terms.length === 0) {
    console.warn("No search terms given; sites will only be discovered and configured");
  }

  const ctx = createPipelineContext({ aiEnabled });
  try {
    const reports = await runSessions(ctx, sites, terms);

    console.log(`\n=== Summary ===`);
    for (const r of reports) {
      const status = r.fatal ? `FAILED: ${r.fatal}` : `${r.records.length} records (${r.resolution ?? "not validated"})`;
      console.log(`${r.siteKey}: ${status}`);
    }

    process.stdout.write(JSON.stringify(reports, null, 2) + "\n");
  } finally {
    await ctx.driver.close();
  }
}

main().catch((err) => {
  if (err instanceof NoTargetsError) {
    console.error(`${err.message}. Usage: scrape-locators --site <url> [--site <url>] --terms 02134,10001 [--no-ai]`);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
