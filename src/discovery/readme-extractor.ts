/**
 * README Config Extractor
 *
 * Looks for an MCP config snippet (a fenced block holding an object with a
 * server map, e.g. `{"mcpServers": {"name": {"command": ..., "args": [...]}}}`)
 * in a project's README and turns its first entry into a descriptor.
 *
 * @module discovery/readme-extractor
 */

import * as path from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { ExtractedDescriptor } from '../types/servers';
import { readDirSafe, readTextSafe } from '../utils/fs';
import { DEFAULT_HEURISTICS, DiscoveryHeuristics } from './heuristics';

const FENCED_BLOCK = /```([\w-]*)[^\n]*\n([\s\S]*?)```/g;
const JSON_LANGUAGES = new Set(['', 'json', 'jsonc', 'json5']);
const YAML_LANGUAGES = new Set(['yaml', 'yml']);

const SnippetEntrySchema = z.object({
  command: z.string().optional().catch(undefined),
  args: z.array(z.string()).optional().catch(undefined),
});

type SnippetEntry = z.infer<typeof SnippetEntrySchema>;

export interface FencedBlock {
  language: string;
  body: string;
}

export function findFencedBlocks(markdown: string): FencedBlock[] {
  const blocks: FencedBlock[] = [];
  for (const match of markdown.matchAll(FENCED_BLOCK)) {
    blocks.push({ language: match[1].toLowerCase(), body: match[2] });
  }
  return blocks;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseBlock(block: FencedBlock): unknown {
  try {
    if (JSON_LANGUAGES.has(block.language)) {
      return JSON.parse(block.body);
    }
    if (YAML_LANGUAGES.has(block.language)) {
      return YAML.parse(block.body);
    }
  } catch {
    return undefined;
  }
  return undefined;
}

export class ReadmeConfigExtractor {
  constructor(private readonly heuristics: DiscoveryHeuristics = DEFAULT_HEURISTICS) {}

  /**
   * Descriptor for `dir`. Without a README, or without a parseable config
   * block in it, the default descriptor (directory name, default command,
   * no args) is returned.
   */
  async extract(dir: string): Promise<ExtractedDescriptor> {
    const resolved = path.resolve(dir);
    const fallback = this.defaultDescriptor(resolved);

    const readme = await this.findReadme(resolved);
    if (!readme) {
      return fallback;
    }
    const text = await readTextSafe(readme);
    if (text === null) {
      return fallback;
    }

    const match = this.firstServerEntry(text);
    if (!match) {
      return fallback;
    }

    return {
      path: resolved,
      suggestedName: match.name,
      command: match.entry.command ?? this.heuristics.defaultCommand,
      args: match.entry.args ?? [],
      rawInstructions: text,
    };
  }

  defaultDescriptor(dir: string): ExtractedDescriptor {
    return {
      path: dir,
      suggestedName: path.basename(dir),
      command: this.heuristics.defaultCommand,
      args: [],
    };
  }

  /**
   * First entry of the first fenced block that parses into a server map.
   */
  firstServerEntry(markdown: string): { name: string; entry: SnippetEntry } | undefined {
    for (const block of findFencedBlocks(markdown)) {
      const parsed = parseBlock(block);
      if (!isRecord(parsed)) {
        continue;
      }
      for (const field of this.heuristics.serverMapFields) {
        const servers = parsed[field];
        if (!isRecord(servers)) {
          continue;
        }
        for (const [name, value] of Object.entries(servers)) {
          const entry = SnippetEntrySchema.safeParse(value);
          if (entry.success) {
            return { name, entry: entry.data };
          }
        }
      }
    }
    return undefined;
  }

  private async findReadme(dir: string): Promise<string | undefined> {
    const entries = await readDirSafe(dir);
    if (!entries) {
      return undefined;
    }
    const names = entries
      .filter((entry) => entry.isFile() && this.heuristics.readmePattern.test(entry.name))
      .map((entry) => entry.name)
      .sort();
    return names.length > 0 ? path.join(dir, names[0]) : undefined;
  }
}
