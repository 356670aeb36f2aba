#!/usr/bin/env tsx
import { getConfig } from "./config";
import { TOOLS, ToolDispatcher } from "./dispatcher";
import { getAbout } from "./tools/meta";
import { createToolContext } from "./tools/context";
import { runServer } from "./server";

const args = process.argv.slice(2);
const command = args[0];

function printUsage(): void {
  console.log(`
animanga-mcp <command>

Commands:
  serve   Run the MCP server on stdio
  about   Print name, version, endpoints and limits
  help    Show this message and the available tools

Tools:
${TOOLS.map((tool) => `  ${tool.name.padEnd(14)}${tool.description ?? ""}`).join("\n")}

Environment:
  ANIMANGA_MAX_PER_PAGE      Largest accepted limit (default: 25)
  ANIMANGA_TIMEOUT_SEC       Per-request timeout in seconds (default: 15)
  ANIMANGA_MAX_ATTEMPTS      Attempts per source, including the first (default: 3)
  ANIMANGA_RETRY_BASE_MS     Backoff base delay (default: 700)
  ANIMANGA_RETRY_JITTER_MS   Backoff jitter ceiling (default: 400)
  ANIMANGA_RETRY_BUDGET_MS   Total time allowed for retries (default: 30000)
  ANIMANGA_RECOMMENDATIONS   Recommendations per detail lookup (default: 10)
  ANILIST_URL                AniList GraphQL endpoint
  JIKAN_URL                  Jikan REST endpoint
`);
}

async function main(): Promise<void> {
  if (!command || command === "help" || command === "--help") {
    printUsage();
    process.exit(0);
  }

  const config = getConfig();

  switch (command) {
    case "serve": {
      await runServer(new ToolDispatcher(createToolContext(config)));
      break;
    }

    case "about": {
      console.log(JSON.stringify(getAbout(config), null, 2));
      break;
    }

    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

main().catch((err) => {
  console.error("Error:", err);
  process.exit(1);
});
