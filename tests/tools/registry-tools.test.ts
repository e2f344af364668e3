import { promises as fs } from 'fs';
import path from 'path';
import { DuplicateNameError, NotFoundError } from '../../src/errors/registry-error';
import { ServerRegistry } from '../../src/registry/server-registry';
import { ConfigStore } from '../../src/store/config-store';
import { buildServerArgs, CreateServerToolImpl } from '../../src/tools/create-server';
import { DeleteServersToolImpl } from '../../src/tools/delete-servers';
import { ListServersToolImpl } from '../../src/tools/list-servers';
import { ping, PING_RESPONSE } from '../../src/tools/ping';
import { UpdateServerStatusToolImpl } from '../../src/tools/update-server-status';
import { ensureTempDir, removeDir } from '../../src/utils/fs';
import { ValidationError } from '../../src/validation/errors';

describe('registry tools', () => {
  let sandbox: string;
  let configPath: string;
  let createTool: CreateServerToolImpl;
  let listTool: ListServersToolImpl;
  let updateTool: UpdateServerStatusToolImpl;
  let deleteTool: DeleteServersToolImpl;

  beforeEach(async () => {
    sandbox = await ensureTempDir('registry-tools-test-');
    configPath = path.join(sandbox, 'config.json');
    const registry = new ServerRegistry(await ConfigStore.open(configPath));
    createTool = new CreateServerToolImpl(registry);
    listTool = new ListServersToolImpl(registry);
    updateTool = new UpdateServerStatusToolImpl(registry);
    deleteTool = new DeleteServersToolImpl(registry);
  });

  afterEach(async () => {
    await removeDir(sandbox);
  });

  it('ping answers Pong!', () => {
    expect(ping()).toBe(PING_RESPONSE);
    expect(PING_RESPONSE).toBe('Pong!');
  });

  describe('create_server', () => {
    it('builds uv-style args', () => {
      expect(buildServerArgs('/srv/weather', 'server.py')).toEqual([
        '--directory',
        '/srv/weather',
        'run',
        'server.py',
      ]);
    });

    it('persists a trimmed, resolved entry', async () => {
      const created = await createTool.execute({
        name: ' weather ',
        command: 'uv',
        directory: '/srv/weather/',
        script: 'server.py',
        env: { WEATHER_API_KEY: 'test-secret' },
      });

      expect(created).toEqual({
        name: 'weather',
        command: 'uv',
        args: ['--directory', path.resolve('/srv/weather'), 'run', 'server.py'],
        env: { WEATHER_API_KEY: 'test-secret' },
      });

      const saved = JSON.parse(await fs.readFile(configPath, 'utf8'));
      expect(saved.mcpServers.weather).toEqual({
        command: 'uv',
        args: ['--directory', path.resolve('/srv/weather'), 'run', 'server.py'],
        env: { WEATHER_API_KEY: 'test-secret' },
      });
    });

    it('formats the created server', () => {
      expect(
        createTool.formatForLLM({
          name: 'weather',
          command: 'uv',
          args: ['--directory', '/srv/weather', 'run', 'server.py'],
        })
      ).toBe('✓ Created server **weather** (active)\n   Command: uv --directory /srv/weather run server.py');
    });

    it('rejects duplicates', async () => {
      const params = { name: 'weather', command: 'uv', directory: '/srv/weather', script: 'server.py' };
      await createTool.execute(params);
      await expect(createTool.execute(params)).rejects.toBeInstanceOf(DuplicateNameError);
    });

    it('rejects the reserved name __proto__ before reading the config', async () => {
      await expect(
        createTool.execute({ name: '__proto__', command: 'uv', directory: '/srv/x', script: 'x.py' })
      ).rejects.toThrow("Server name '__proto__' is reserved");
    });

    it('rejects incomplete or unexpected params', async () => {
      await expect(createTool.execute({ name: 'weather', command: 'uv' })).rejects.toThrow(
        'Parameter "directory" is required; Parameter "script" is required'
      );
      await expect(
        createTool.execute({
          name: 'weather',
          command: 'uv',
          directory: '/srv',
          script: 'a.py',
          port: 8080,
        })
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('list_servers', () => {
    it('formats both buckets', async () => {
      await createTool.execute({ name: 'alpha', command: 'uv', directory: '/srv/alpha', script: 'a.py' });
      await createTool.execute({ name: 'bravo', command: 'uv', directory: '/srv/bravo', script: 'b.py' });
      await updateTool.execute({ names: ['bravo'], active: false });

      const listing = await listTool.execute();
      expect(listTool.formatForLLM(listing)).toBe(
        [
          'Active servers (1):',
          `- **alpha**: uv --directory ${path.resolve('/srv/alpha')} run a.py`,
          '',
          'Inactive servers (1):',
          `- **bravo**: uv --directory ${path.resolve('/srv/bravo')} run b.py`,
        ].join('\n')
      );
    });

    it('reports empty buckets', async () => {
      const listing = await listTool.execute();
      expect(listTool.formatForLLM(listing)).toBe('Active servers: none\n\nInactive servers: none');
    });
  });

  describe('update_server_status', () => {
    it('moves servers and echoes the target bucket', async () => {
      await createTool.execute({ name: 'alpha', command: 'uv', directory: '/srv/alpha', script: 'a.py' });

      const result = await updateTool.execute({ names: ['alpha'], active: false });

      expect(result).toEqual({ updated: ['alpha'], activeCount: 0, inactiveCount: 1, active: false });
      expect(updateTool.formatForLLM(result)).toBe(
        '✓ Moved 1 server(s) to inactive: alpha\nActive: 0, inactive: 1'
      );
    });

    it('requires at least one name and a boolean flag', async () => {
      await expect(updateTool.execute({ names: [], active: true })).rejects.toThrow(
        'names must contain at least 1 items'
      );
      await expect(updateTool.execute({ names: ['alpha'], active: 'yes' })).rejects.toThrow(
        'Parameter "active" must be of type boolean'
      );
    });

    it('surfaces unknown names', async () => {
      await expect(updateTool.execute({ names: ['ghost'], active: true })).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });

  describe('delete_servers', () => {
    it('deletes and reports remaining counts', async () => {
      await createTool.execute({ name: 'alpha', command: 'uv', directory: '/srv/alpha', script: 'a.py' });
      await createTool.execute({ name: 'bravo', command: 'uv', directory: '/srv/bravo', script: 'b.py' });

      const result = await deleteTool.execute({ names: ['alpha'] });

      expect(result).toEqual({ deleted: ['alpha'], remainingActive: 1, remainingInactive: 0 });
      expect(deleteTool.formatForLLM(result)).toBe(
        '✓ Deleted 1 server(s): alpha\nRemaining active: 1, inactive: 0'
      );
    });

    it('leaves the file untouched when a name is unknown', async () => {
      await createTool.execute({ name: 'alpha', command: 'uv', directory: '/srv/alpha', script: 'a.py' });
      const before = await fs.readFile(configPath, 'utf8');

      await expect(deleteTool.execute({ names: ['alpha', 'ghost'] })).rejects.toThrow(
        "Server 'ghost' not found"
      );
      await expect(fs.readFile(configPath, 'utf8')).resolves.toBe(before);
    });
  });
});
