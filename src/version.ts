/** Package version reported by the CLI, the health endpoint and the MCP server. */
export const VERSION = '0.1.0';
