import path from 'path';
import { DiscoverySettings } from '../../src/config/settings';
import { DirectoryScanner } from '../../src/discovery/directory-scanner';
import { ReadmeConfigExtractor } from '../../src/discovery/readme-extractor';
import { ServerDiscovery } from '../../src/discovery/server-discovery';
import { ErrorLogger } from '../../src/errors/logger';
import { NotFoundError } from '../../src/errors/registry-error';
import { DiscoverCommonLocationsToolImpl } from '../../src/tools/discover-common-locations';
import {
  formatDiscoveredServers,
  pluralize,
  toLocationsPayload,
  toServersPayload,
} from '../../src/tools/formatters/discovered-servers';
import { ListPotentialServersToolImpl } from '../../src/tools/list-potential-servers';
import { ScanDirectoryToolImpl } from '../../src/tools/scan-directory';
import { ScanSpecificDirectoriesToolImpl } from '../../src/tools/scan-specific-directories';
import { ensureTempDir, removeDir } from '../../src/utils/fs';
import {
  FileTree,
  PYTHON_SERVER_SOURCE,
  SCAN_FIXTURE,
  readmeWithConfig,
  writeTree,
} from '../utils/server-fixtures';

const WEATHER_PROJECT: FileTree = {
  'weather.py': PYTHON_SERVER_SOURCE,
  'README.md': readmeWithConfig('weather-tools', 'uv', ['run', 'weather.py']),
};

describe('discovery tools', () => {
  let sandbox: string;
  let home: string;
  let settings: DiscoverySettings;
  let discovery: ServerDiscovery;

  beforeEach(async () => {
    sandbox = await ensureTempDir('discovery-tools-test-');
    home = path.join(sandbox, 'home');
    settings = { homeDir: home, scanMaxDepth: 2, scanTimeoutMs: 0 };
    const silent = new ErrorLogger({ warn: () => undefined, error: () => undefined });
    discovery = new ServerDiscovery(new DirectoryScanner(), new ReadmeConfigExtractor(), silent);
  });

  afterEach(async () => {
    await removeDir(sandbox);
  });

  describe('scan_directory', () => {
    it('scans with the configured depth and reports the resolved root', async () => {
      const root = path.join(sandbox, 'workspace');
      await writeTree(root, SCAN_FIXTURE);
      const tool = new ScanDirectoryToolImpl(discovery, settings);

      const result = await tool.execute({ path: `${root}${path.sep}` });

      expect(result.scannedDirectory).toBe(root);
      expect(result.count).toBe(4);
      expect(Object.keys(result.servers)).toEqual(['notes', 'weather-tools', 'tools', 'beta']);
      expect(result.warnings).toEqual([]);
    });

    it('honours an explicit maxDepth', async () => {
      const root = path.join(sandbox, 'workspace');
      await writeTree(root, SCAN_FIXTURE);
      const tool = new ScanDirectoryToolImpl(discovery, settings);

      const result = await tool.execute({ path: root, maxDepth: 0 });
      expect(Object.keys(result.servers)).toEqual(['servers', 'work']);
    });

    it('rejects a missing directory', async () => {
      const tool = new ScanDirectoryToolImpl(discovery, settings);
      await expect(tool.execute({ path: path.join(sandbox, 'missing') })).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it('rejects an out-of-range depth', async () => {
      const tool = new ScanDirectoryToolImpl(discovery, settings);
      await expect(tool.execute({ path: sandbox, maxDepth: 11 })).rejects.toThrow(
        'maxDepth must be at most 10'
      );
    });

    it('stops when the caller cancels', async () => {
      const root = path.join(sandbox, 'workspace');
      await writeTree(root, SCAN_FIXTURE);
      const tool = new ScanDirectoryToolImpl(discovery, settings);
      const controller = new AbortController();
      controller.abort(new Error('client cancelled'));

      await expect(tool.execute({ path: root }, controller.signal)).rejects.toThrow('client cancelled');
    });

    it('formats empty and populated results', () => {
      const tool = new ScanDirectoryToolImpl(discovery, settings);
      expect(
        tool.formatForLLM({ servers: {}, count: 0, scannedDirectory: '/srv', warnings: [] })
      ).toBe('No MCP servers found in /srv.');

      expect(
        tool.formatForLLM({
          servers: {
            calc: { path: '/srv/calc', suggestedName: 'calc', command: 'uvx', args: ['calc'], rawInstructions: '# calc' },
          },
          count: 1,
          scannedDirectory: '/srv',
          warnings: [],
        })
      ).toBe('Found 1 MCP server in /srv:\n\n- **calc** at /srv/calc\n  Command: uvx calc');
    });
  });

  describe('scan_specific_directories', () => {
    it('describes qualifying directories and counts them', async () => {
      const weather = path.join(sandbox, 'weather');
      await writeTree(weather, WEATHER_PROJECT);
      const tool = new ScanSpecificDirectoriesToolImpl(discovery, settings);

      const result = await tool.execute({ paths: [weather, path.join(sandbox, 'missing')] });

      expect(result.count).toBe(1);
      expect(result.servers['weather-tools'].path).toBe(weather);
      expect(result.warnings).toEqual([]);
    });

    it('requires at least one path', async () => {
      const tool = new ScanSpecificDirectoriesToolImpl(discovery, settings);
      await expect(tool.execute({ paths: [] })).rejects.toThrow('paths must contain at least 1 items');
    });

    it('lists warnings after the servers', () => {
      const tool = new ScanSpecificDirectoriesToolImpl(discovery, settings);
      expect(
        tool.formatForLLM({
          servers: { geo: { path: '/b/geo', suggestedName: 'geo', command: 'uv', args: [] } },
          count: 1,
          warnings: ["Server name 'geo' found in both /a/geo and /b/geo; keeping /b/geo"],
        })
      ).toBe(
        [
          'Found 1 MCP server:',
          '',
          '- **geo** at /b/geo',
          '  Command: uv',
          '  (no config snippet found in README; defaults used)',
          "⚠ Server name 'geo' found in both /a/geo and /b/geo; keeping /b/geo",
        ].join('\n')
      );
    });
  });

  describe('discover_common_locations', () => {
    it('summarizes servers found under home', async () => {
      await writeTree(home, { 'mcp-servers': { weather: WEATHER_PROJECT }, code: {} });
      const tool = new DiscoverCommonLocationsToolImpl(discovery, settings);

      const result = await tool.execute();

      expect(result.summary).toBe('Found 1 MCP server in 1 location.');
      expect(Object.keys(result.locations)).toEqual([path.join(home, 'mcp-servers')]);
    });

    it('reports when nothing is found', async () => {
      await writeTree(home, { code: {} });
      const tool = new DiscoverCommonLocationsToolImpl(discovery, settings);

      const result = await tool.execute({});
      expect(result).toEqual({ locations: {}, summary: 'No MCP servers found in common locations.' });
      expect(tool.formatForLLM(result)).toBe('No MCP servers found in common locations.');
    });
  });

  describe('list_potential_servers', () => {
    it('summarizes candidate folders', async () => {
      await writeTree(home, { 'mcp-servers': { weather: WEATHER_PROJECT }, code: {} });
      const tool = new ListPotentialServersToolImpl(discovery, settings);

      const result = await tool.execute();

      expect(result.summary).toBe('Checked 2 locations; 1 potential server directory found.');
      expect(tool.formatForLLM(result)).toBe(
        [
          result.summary,
          '',
          `${path.join(home, 'mcp-servers')}:`,
          `  - ${path.join(home, 'mcp-servers', 'weather')} [source]`,
        ].join('\n')
      );
    });
  });

  describe('formatters', () => {
    it('pluralizes nouns', () => {
      expect(pluralize(1, 'location')).toBe('1 location');
      expect(pluralize(0, 'location')).toBe('0 locations');
    });

    it('indents server blocks', () => {
      expect(
        formatDiscoveredServers(
          { a: { path: '/a', suggestedName: 'a', command: 'uv', args: ['run', 'a.py'], rawInstructions: '' } },
          '  '
        )
      ).toEqual(['  - **a** at /a', '    Command: uv run a.py']);
    });

    it('renames descriptor fields to snake_case for structured content', () => {
      expect(
        toServersPayload({
          calc: { path: '/srv/calc', suggestedName: 'calc', command: 'uvx', args: ['calc'], rawInstructions: '# calc' },
          bare: { path: '/srv/bare', suggestedName: 'bare', command: 'uv', args: [] },
        })
      ).toEqual({
        calc: { path: '/srv/calc', suggested_name: 'calc', command: 'uvx', args: ['calc'], raw_instructions: '# calc' },
        bare: { path: '/srv/bare', suggested_name: 'bare', command: 'uv', args: [] },
      });
    });

    it('renames descriptors inside every location', () => {
      expect(
        toLocationsPayload({
          '/home/mcp-servers': {
            count: 1,
            servers: { geo: { path: '/home/mcp-servers/geo', suggestedName: 'geo', command: 'uv', args: [] } },
          },
        })
      ).toEqual({
        '/home/mcp-servers': {
          count: 1,
          servers: { geo: { path: '/home/mcp-servers/geo', suggested_name: 'geo', command: 'uv', args: [] } },
        },
      });
    });
  });
});
