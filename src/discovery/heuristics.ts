/**
 * Discovery Heuristics
 *
 * Substring and pattern rules used to decide whether a directory holds an
 * MCP server and where its README keeps a config snippet. Scanner and
 * extractor take a `DiscoveryHeuristics` value, so the rules can be replaced
 * without touching traversal or registry code.
 *
 * @module discovery/heuristics
 */

export interface DiscoveryHeuristics {
  /** Extensions (with leading dot) of files searched for markers */
  sourceExtensions: readonly string[];
  /** A source file must contain one of these ... */
  frameworkMarkers: readonly string[];
  /** ... and one of these to count as a server */
  toolMarkers: readonly string[];
  /** Dependency manifests checked directly inside a directory */
  manifestFiles: readonly string[];
  /** Matched case-insensitively against manifest contents */
  frameworkName: string;
  /** Directory names never descended into */
  ignoredDirectories: readonly string[];
  readmePattern: RegExp;
  /** Object fields of a config snippet that hold the server map */
  serverMapFields: readonly string[];
  defaultCommand: string;
}

export const DEFAULT_HEURISTICS: DiscoveryHeuristics = {
  sourceExtensions: ['.py', '.ts', '.js', '.mjs'],
  frameworkMarkers: [
    'from mcp.server.fastmcp import',
    'from mcp.server import',
    'from fastmcp import',
    '@modelcontextprotocol/sdk',
  ],
  toolMarkers: ['@mcp.tool', '.tool(', 'registerTool(', 'CallToolRequestSchema'],
  manifestFiles: ['requirements.txt', 'pyproject.toml', 'package.json'],
  frameworkName: 'mcp',
  ignoredDirectories: ['node_modules', '__pycache__', 'venv', 'dist', 'build', 'site-packages'],
  readmePattern: /^readme/i,
  serverMapFields: ['mcpServers', 'servers'],
  defaultCommand: 'uv',
};

export function hasSourceExtension(fileName: string, heuristics: DiscoveryHeuristics): boolean {
  const lower = fileName.toLowerCase();
  return heuristics.sourceExtensions.some((ext) => lower.endsWith(ext));
}

/**
 * Both a framework import and a tool registration must appear in `content`.
 */
export function containsServerMarkers(content: string, heuristics: DiscoveryHeuristics): boolean {
  return (
    heuristics.frameworkMarkers.some((marker) => content.includes(marker)) &&
    heuristics.toolMarkers.some((marker) => content.includes(marker))
  );
}

export function mentionsFramework(manifest: string, heuristics: DiscoveryHeuristics): boolean {
  return manifest.toLowerCase().includes(heuristics.frameworkName.toLowerCase());
}

/**
 * Hidden entries and dependency/build folders are skipped during traversal.
 */
export function isTraversable(directoryName: string, heuristics: DiscoveryHeuristics): boolean {
  return !directoryName.startsWith('.') && !heuristics.ignoredDirectories.includes(directoryName);
}
