/**
 * Server Type Definitions
 *
 * Shapes shared by the config store, the registry and discovery.
 *
 * @module types/servers
 */

/**
 * Launch specification persisted under a server name. Client-specific keys
 * (`cwd`, `type`, ...) ride along and are written back as read.
 */
export interface ServerEntry {
  command: string;
  args: string[];
  /** Environment passed to the server process, kept when present */
  env?: Record<string, string>;
  [key: string]: unknown;
}

/**
 * A server entry together with its unique name.
 */
export interface ServerDescriptor extends ServerEntry {
  name: string;
}

export type ServerMap = Record<string, ServerEntry>;

/**
 * In-memory view of the persisted document.
 *
 * A name appears in at most one of `active` and `inactive`.
 */
export interface ConfigDocument {
  /** `mcpServers` */
  active: ServerMap;
  /** `unusedMcpServers` */
  inactive: ServerMap;
  /** Any other top-level keys of the file, written back untouched */
  extras: Record<string, unknown>;
}

export interface ServerListing {
  active: ServerMap;
  inactive: ServerMap;
}

/**
 * Descriptor proposed for a discovered directory.
 */
export interface ExtractedDescriptor {
  path: string;
  suggestedName: string;
  command: string;
  args: string[];
  /** Full README text, set only when a config block was parsed from it */
  rawInstructions?: string;
}

export type CandidateIndicator = 'source' | 'manifest' | 'src';

export interface CandidateDirectory {
  path: string;
  indicators: CandidateIndicator[];
}
