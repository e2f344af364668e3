import { describe, expect, test } from '@jest/globals';
import { getToolDefinitions } from '../../src/index';

describe('Tool definitions contract', () => {
  test('exposes every holster tool in a stable order', () => {
    expect(getToolDefinitions().map((definition) => definition.name)).toEqual([
      'ping',
      'create_server',
      'list_servers',
      'update_server_status',
      'delete_servers',
      'scan_directory',
      'discover_common_locations',
      'list_potential_servers',
      'scan_specific_directories',
    ]);
  });

  test('every input schema is a closed object', () => {
    for (const definition of getToolDefinitions()) {
      expect(definition.inputSchema.type).toBe('object');
      expect(definition.inputSchema.additionalProperties).toBe(false);
      expect(definition.description.length).toBeGreaterThan(0);
    }
  });

  test('required arguments match the documented ones', () => {
    const required = Object.fromEntries(
      getToolDefinitions().map((definition) => [
        definition.name,
        'required' in definition.inputSchema ? [...definition.inputSchema.required] : [],
      ])
    );

    expect(required).toEqual({
      ping: [],
      create_server: ['name', 'command', 'directory', 'script'],
      list_servers: [],
      update_server_status: ['names', 'active'],
      delete_servers: ['names'],
      scan_directory: ['path'],
      discover_common_locations: [],
      list_potential_servers: [],
      scan_specific_directories: ['paths'],
    });
  });
});
