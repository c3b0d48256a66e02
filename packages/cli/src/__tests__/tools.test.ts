import { describe, it, expect, afterEach, vi } from 'vitest';
import { listTools } from '../commands/tools.js';
import { createCommandRegistry } from '../registry.js';
import { createStubRegistry } from './fixtures.js';

describe('listTools', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print prefixed tool names with descriptions', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const { registry } = createStubRegistry();

    listTools({}, registry);

    expect(info.mock.calls).toEqual([['stub_ping - Answers'], ['stub_explode']]);
  });

  it('should print definitions as JSON', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const { registry } = createStubRegistry();

    listTools({ json: true }, registry);

    expect(info).toHaveBeenCalledWith(
      JSON.stringify(registry.getAllMCPDefinitions(), null, 2),
    );
  });
});

describe('createCommandRegistry', () => {
  it('should register the kv command', () => {
    const registry = createCommandRegistry();

    expect(registry.getAllCommandNames()).toEqual(['kv']);
    expect(registry.getAllMCPDefinitions().map((tool) => tool.name)).toContain(
      'kv_namespace_delete',
    );
  });
});
