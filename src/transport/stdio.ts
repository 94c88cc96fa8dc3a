import { createMcpServer } from "../server";
import type { Services } from "../services";
import { StdioServerTransport } from "../mcp-sdk";

/**
 * Serve the MCP tools over stdio. stdout carries protocol frames only, which
 * is why all logging in this project goes to stderr.
 *
 * @returns Promise resolving once the server is connected.
 */
export async function startStdioTransport(services: Services) {
  const server = createMcpServer(services);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
