import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  type CallToolRequest,
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { TOOLS, type ToolDispatcher } from "./dispatcher";

export function createServer(dispatcher: ToolDispatcher): Server {
  const { name, version } = dispatcher.context.config;
  const server = new Server({ name, version }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest, extra) => {
    const { name: tool, arguments: args } = request.params;
    const envelope = await dispatcher.dispatch(tool, args ?? {}, extra.signal);

    return {
      content: [
        {
          type: "text",
          text: JSON.stringify(envelope, null, 2),
        },
      ],
      isError: "error" in envelope,
    };
  });

  return server;
}

export async function runServer(dispatcher: ToolDispatcher): Promise<void> {
  const server = createServer(dispatcher);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${dispatcher.context.config.name} ${dispatcher.context.config.version} listening on stdio`);
}
