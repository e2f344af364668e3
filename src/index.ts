#!/usr/bin/env node

/**
 * Holster MCP Server
 *
 * Main entry point for the MCP server that manages the active/inactive
 * server lists of an MCP client config file and discovers server projects
 * on disk. Uses stdio transport for Claude Desktop integration.
 *
 * @module index
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
  ErrorCode,
  McpError,
  CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';

import { HolsterSettings, loadSettings } from './config/settings';
import { DirectoryScanner } from './discovery/directory-scanner';
import { DEFAULT_HEURISTICS } from './discovery/heuristics';
import { ReadmeConfigExtractor } from './discovery/readme-extractor';
import { ServerDiscovery } from './discovery/server-discovery';
import { ErrorHandler } from './errors/handler';
import { HolsterError } from './errors/holster-error';
import { ErrorLogger } from './errors/logger';
import type { JsonValue } from './errors/types';
import { ServerRegistry } from './registry/server-registry';
import { ConfigStore } from './store/config-store';
import { CreateServerToolImpl, createServerToolDefinition } from './tools/create-server';
import { DeleteServersToolImpl, deleteServersToolDefinition } from './tools/delete-servers';
import {
  DiscoverCommonLocationsToolImpl,
  discoverCommonLocationsToolDefinition,
} from './tools/discover-common-locations';
import {
  ListPotentialServersToolImpl,
  listPotentialServersToolDefinition,
} from './tools/list-potential-servers';
import { toLocationsPayload, toServersPayload } from './tools/formatters/discovered-servers';
import { ListServersToolImpl, listServersToolDefinition } from './tools/list-servers';
import { ping, pingToolDefinition } from './tools/ping';
import { ScanDirectoryToolImpl, scanDirectoryToolDefinition } from './tools/scan-directory';
import {
  ScanSpecificDirectoriesToolImpl,
  scanSpecificDirectoriesToolDefinition,
} from './tools/scan-specific-directories';
import {
  UpdateServerStatusToolImpl,
  updateServerStatusToolDefinition,
} from './tools/update-server-status';

/**
 * MCP Server Configuration
 */
const SERVER_CONFIG = {
  name: 'mcp-holster',
  version: '1.0.0',
} as const;

/**
 * Main server instance
 */
const server = new Server(
  {
    name: SERVER_CONFIG.name,
    version: SERVER_CONFIG.version,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

const errorLogger = new ErrorLogger();
ErrorHandler.useLogger(errorLogger);

/**
 * Server context shared across handlers
 */
export interface HolsterContext {
  settings: HolsterSettings;
  registry: ServerRegistry;
  discovery: ServerDiscovery;
  createServerTool: CreateServerToolImpl;
  listServersTool: ListServersToolImpl;
  updateServerStatusTool: UpdateServerStatusToolImpl;
  deleteServersTool: DeleteServersToolImpl;
  scanDirectoryTool: ScanDirectoryToolImpl;
  discoverCommonLocationsTool: DiscoverCommonLocationsToolImpl;
  listPotentialServersTool: ListPotentialServersToolImpl;
  scanSpecificDirectoriesTool: ScanSpecificDirectoriesToolImpl;
}

const TOOL_DEFINITIONS = [
  pingToolDefinition,
  createServerToolDefinition,
  listServersToolDefinition,
  updateServerStatusToolDefinition,
  deleteServersToolDefinition,
  scanDirectoryToolDefinition,
  discoverCommonLocationsToolDefinition,
  listPotentialServersToolDefinition,
  scanSpecificDirectoriesToolDefinition,
] as const;

export type ToolDefinitions = typeof TOOL_DEFINITIONS;

export function getToolDefinitions(): ToolDefinitions {
  return TOOL_DEFINITIONS;
}

export function summarizeValue(value: unknown): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (Array.isArray(value)) {
    return value.slice(0, 5).map((item) => summarizeValue(item));
  }
  if (typeof value === 'object') {
    return '[object]';
  }
  if (typeof value === 'string') {
    return value.length > 200 ? `${value.slice(0, 197)}…` : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return String(value);
}

export function sanitizeArgs(args: unknown): Record<string, JsonValue> | undefined {
  if (!args || typeof args !== 'object') {
    return undefined;
  }
  const entries = Object.entries(args).slice(0, 10);
  const sanitized: Record<string, JsonValue> = {};
  for (const [key, value] of entries) {
    sanitized[key] = summarizeValue(value);
  }
  return sanitized;
}

export async function buildHolsterContext(options?: {
  settings?: HolsterSettings;
  logger?: ErrorLogger;
}): Promise<HolsterContext> {
  const settings = options?.settings ?? loadSettings();
  const logger = options?.logger ?? errorLogger;

  // Creates the config file on first run
  const store = await ConfigStore.open(settings.configPath);
  const registry = new ServerRegistry(store);

  const discovery = new ServerDiscovery(
    new DirectoryScanner(DEFAULT_HEURISTICS),
    new ReadmeConfigExtractor(DEFAULT_HEURISTICS),
    logger
  );

  return {
    settings,
    registry,
    discovery,
    createServerTool: new CreateServerToolImpl(registry),
    listServersTool: new ListServersToolImpl(registry),
    updateServerStatusTool: new UpdateServerStatusToolImpl(registry),
    deleteServersTool: new DeleteServersToolImpl(registry),
    scanDirectoryTool: new ScanDirectoryToolImpl(discovery, settings),
    discoverCommonLocationsTool: new DiscoverCommonLocationsToolImpl(discovery, settings),
    listPotentialServersTool: new ListPotentialServersToolImpl(discovery, settings),
    scanSpecificDirectoriesTool: new ScanSpecificDirectoriesToolImpl(discovery, settings),
  };
}

let contextBuilder: typeof buildHolsterContext = buildHolsterContext;

/**
 * Tool result for a failure the caller can act on (unknown name, duplicate,
 * corrupt config, scan timeout, bad input).
 */
export function toToolErrorResult(toolName: string, error: HolsterError): CallToolResult {
  const publicError = ErrorHandler.toPublicError(error);
  return {
    content: [
      {
        type: 'text',
        text: ErrorHandler.describe(`${toolName} failed [${publicError.code}]`, error),
      },
    ],
    structuredContent: {
      success: false,
      error: { ...publicError },
    },
    isError: true,
  };
}

/**
 * Register tool handlers
 */
function registerToolHandlers(context: HolsterContext): void {
  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [...getToolDefinitions()],
    };
  });

  // Handle tool execution
  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;

    try {
      return await executeHolsterTool(name, args, context, extra.signal);
    } catch (error) {
      if (error instanceof McpError) {
        throw error;
      }

      const sanitizedArgs = sanitizeArgs(args);
      const data: Record<string, JsonValue> = {
        tool: name,
      };
      if (sanitizedArgs) {
        data.args = sanitizedArgs;
      }

      const holsterError = ErrorHandler.handle(error, 'server.execute_tool', {
        module: 'server',
        data,
      });

      if (holsterError.exposable) {
        return toToolErrorResult(name, holsterError);
      }

      throw new McpError(
        ErrorCode.InternalError,
        ErrorHandler.describe('Tool execution failed', holsterError)
      );
    }
  });
}

function textResult(text: string, structuredContent: Record<string, unknown>): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
    structuredContent: {
      success: true,
      ...structuredContent,
    },
  };
}

export async function executeHolsterTool(
  name: string,
  args: unknown,
  context: HolsterContext,
  signal?: AbortSignal
): Promise<CallToolResult> {
  switch (name) {
    case 'ping': {
      const message = ping();
      return textResult(message, { message });
    }

    case 'create_server': {
      const created = await context.createServerTool.execute(args);
      return textResult(context.createServerTool.formatForLLM(created), { server: created });
    }

    case 'list_servers': {
      const listing = await context.listServersTool.execute();
      return textResult(context.listServersTool.formatForLLM(listing), {
        active: listing.active,
        inactive: listing.inactive,
      });
    }

    case 'update_server_status': {
      const result = await context.updateServerStatusTool.execute(args);
      return textResult(context.updateServerStatusTool.formatForLLM(result), {
        updated: result.updated,
        active_count: result.activeCount,
        inactive_count: result.inactiveCount,
      });
    }

    case 'delete_servers': {
      const result = await context.deleteServersTool.execute(args);
      return textResult(context.deleteServersTool.formatForLLM(result), {
        deleted: result.deleted,
        remaining_active: result.remainingActive,
        remaining_inactive: result.remainingInactive,
      });
    }

    case 'scan_directory': {
      const result = await context.scanDirectoryTool.execute(args, signal);
      return textResult(context.scanDirectoryTool.formatForLLM(result), {
        servers: toServersPayload(result.servers),
        count: result.count,
        scanned_directory: result.scannedDirectory,
        warnings: result.warnings,
      });
    }

    case 'discover_common_locations': {
      const result = await context.discoverCommonLocationsTool.execute(args, signal);
      return textResult(context.discoverCommonLocationsTool.formatForLLM(result), {
        locations: toLocationsPayload(result.locations),
        summary: result.summary,
      });
    }

    case 'list_potential_servers': {
      const result = await context.listPotentialServersTool.execute();
      return textResult(context.listPotentialServersTool.formatForLLM(result), {
        locations: result.locations,
        directories: result.directories,
        summary: result.summary,
      });
    }

    case 'scan_specific_directories': {
      const result = await context.scanSpecificDirectoriesTool.execute(args, signal);
      return textResult(context.scanSpecificDirectoriesTool.formatForLLM(result), {
        servers: toServersPayload(result.servers),
        count: result.count,
        warnings: result.warnings,
      });
    }

    default:
      throw new McpError(
        ErrorCode.MethodNotFound,
        `Unknown tool: ${name}`
      );
  }
}

/**
 * Initialize server components
 */
async function initializeServer(): Promise<HolsterContext> {
  try {
    console.error(`[INFO] Initializing MCP server...`);
    const context = await contextBuilder();

    console.error(`[INFO] Config file: ${context.settings.configPath}`);
    console.error(`[INFO] Discovery home directory: ${context.settings.homeDir}`);
    console.error(
      `[INFO] Scan defaults: maxDepth=${context.settings.scanMaxDepth}, timeoutMs=${context.settings.scanTimeoutMs}`
    );
    console.error(`[INFO] Server components initialized successfully`);

    return context;
  } catch (error) {
    throw ErrorHandler.handle(error, 'server.initialize', { module: 'server' });
  }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  try {
    // Initialize all server components
    const context = await initializeServer();

    // Register tool handlers
    registerToolHandlers(context);

    // Create stdio transport
    const transport = new StdioServerTransport();

    // Connect server to transport
    await server.connect(transport);

    console.error(`[INFO] Holster MCP server running on stdio`);
    console.error(`[INFO] Server: ${SERVER_CONFIG.name} v${SERVER_CONFIG.version}`);
  } catch (error) {
    const holsterError = ErrorHandler.handle(error, 'server.startup', { module: 'server' });
    console.error(`[FATAL] ${ErrorHandler.describe('Server startup failed', holsterError)}`);
    process.exit(1);
  }
}


async function shutdown(signal: NodeJS.Signals): Promise<void> {
  console.error(`[INFO] Received ${signal}, shutting down gracefully...`);
  try {
    await server.close();
  } catch (error) {
    ErrorHandler.handle(
      error,
      'server.shutdown',
      { module: 'server', data: { signal } },
      { userMessage: 'Graceful shutdown encountered an issue.' }
    );
  }
  process.exit(0);
}

export const __test__ = {
  registerToolHandlers,
  initializeServer,
  main,
  shutdown,
  server,
  setContextBuilder: (builder: typeof buildHolsterContext) => {
    contextBuilder = builder;
  },
  resetContextBuilder: () => {
    contextBuilder = buildHolsterContext;
  },
};

// Start the server
if (require.main === module) {
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  main().catch((error) => {
    const holsterError = ErrorHandler.handle(
      error,
      'server.unhandled',
      { module: 'server' },
      { userMessage: 'Holster encountered an unrecoverable error.' }
    );
    console.error(`[FATAL] ${ErrorHandler.describe('Unhandled error', holsterError)}`);
    process.exit(1);
  });
}
