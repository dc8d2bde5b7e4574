export { createMcpServer, runMcpStdioServer } from './server.js';
