/**
 * MCP server exposing the execution engine to LLM agents.
 *
 * Tools: list_tools, get_tool_info, run_tool. Results travel as JSON text;
 * rejections and non-success outcomes set isError.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import type { ExecutionCoordinator } from '../execution/coordinator.js';
import { toWireRejection, toWireResult } from '../execution/wire.js';
import { createModuleLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

const log = createModuleLogger('mcp');

interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

function jsonResponse(payload: unknown, isError: boolean = false): ToolResponse {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(payload, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

export function createMcpServer(coordinator: ExecutionCoordinator): McpServer {
  const server = new McpServer({ name: 'toolwarden', version: VERSION });

  server.tool(
    'list_tools',
    'List the permitted security tools with their category, availability and version',
    {},
    async () => {
      const tools = coordinator.catalog();
      return jsonResponse({ tools, total: tools.length });
    },
  );

  server.tool(
    'get_tool_info',
    'Describe one permitted tool',
    { tool: z.string().describe('Tool name, e.g. nmap') },
    async ({ tool }) => {
      const descriptor = coordinator.describe(tool);
      if (descriptor === undefined) {
        return jsonResponse({ error: `Tool '${tool}' is not permitted` }, true);
      }
      return jsonResponse({
        name: descriptor.name,
        category: descriptor.category,
        description: descriptor.description,
        available: descriptor.available,
        version: descriptor.version,
        path: descriptor.binaryPath,
        default_timeout: descriptor.defaultTimeoutSec,
      });
    },
  );

  server.tool(
    'run_tool',
    'Run a permitted tool with a pre-tokenized argument list. No shell is involved: pass each argument as its own string.',
    {
      tool: z.string().describe('Tool name, e.g. nmap'),
      args: z.array(z.string()).default([]).describe('Argument tokens, e.g. ["-sV", "10.0.0.1"]'),
      timeout: z.number().int().positive().optional().describe('Timeout in seconds, capped by the server maximum'),
      working_dir: z.string().optional().describe('Working directory inside the sandbox'),
    },
    async ({ tool, args, timeout, working_dir }) => {
      const response = await coordinator.execute({
        tool,
        args,
        ...(timeout !== undefined ? { timeoutSec: timeout } : {}),
        ...(working_dir !== undefined ? { workingDir: working_dir } : {}),
      });

      if (response.status === 'rejected') {
        return jsonResponse(toWireRejection(response), true);
      }
      return jsonResponse(toWireResult(response), response.outcome !== 'success');
    },
  );

  return server;
}

/**
 * Serve over stdio until the transport closes.
 */
export async function runMcpStdioServer(coordinator: ExecutionCoordinator): Promise<McpServer> {
  const server = createMcpServer(coordinator);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info('MCP server listening on stdio');
  return server;
}
