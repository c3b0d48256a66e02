import { describe, it, expect, vi } from 'vitest';
import { BaseCommand } from '../base-command.js';
import { CommandRegistry } from '../registry.js';
import type { CallToolResult, ICommandOptions, Tool } from '../interfaces.js';

class EchoCommand extends BaseCommand {
  public readonly name = 'echo';
  public readonly description = 'Echoes its input';
  public readonly cliCalls: string[][] = [];

  public async executeToolViaMCP(
    toolName: string,
    args: Record<string, unknown>,
  ): Promise<CallToolResult> {
    return {
      content: [{ type: 'text', text: `${toolName}:${String(args.text)}` }],
    };
  }

  public async executeViaCLI(args: string[]): Promise<void> {
    this.cliCalls.push(args);
  }

  public getMCPDefinitions(): Tool[] {
    return [
      { name: 'say', inputSchema: { type: 'object', properties: {} } },
      { name: 'shout', inputSchema: { type: 'object', properties: {} } },
    ];
  }

  public options(args: Record<string, unknown> | string[]): ICommandOptions {
    return this.parseCommonOptions(args);
  }

  public print(message: string, options?: ICommandOptions): void {
    this.log(message, options);
  }
}

describe('CommandRegistry', () => {
  it('should register and look up commands by name', () => {
    const registry = new CommandRegistry();
    const command = new EchoCommand();

    registry.register(command);

    expect(registry.getCommand('echo')).toBe(command);
    expect(registry.getCommand('missing')).toBeUndefined();
    expect(registry.getAllCommandNames()).toEqual(['echo']);
    expect(registry.size()).toBe(1);
  });

  it('should prefix tool names with the command name', () => {
    const registry = new CommandRegistry();
    registry.register(new EchoCommand());

    expect(registry.getAllMCPDefinitions().map((tool) => tool.name)).toEqual([
      'echo_say',
      'echo_shout',
    ]);
  });

  it('should route prefixed tool calls to the original tool name', async () => {
    const registry = new CommandRegistry();
    registry.register(new EchoCommand());

    const result = await registry.callTool('echo_shout', { text: 'hi' });

    expect(result.content).toEqual([{ type: 'text', text: 'shout:hi' }]);
  });

  it('should return an error result for unknown tools', async () => {
    const registry = new CommandRegistry();

    const result = await registry.callTool('echo_whisper', {});

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      { type: 'text', text: 'Tool not found: echo_whisper' },
    ]);
  });

  it('should empty on clear', () => {
    const registry = new CommandRegistry();
    registry.register(new EchoCommand());

    registry.clear();

    expect(registry.size()).toBe(0);
  });
});

describe('BaseCommand', () => {
  it('should parse CLI options', () => {
    const command = new EchoCommand();

    expect(command.options(['list', '-v', '--format', 'json'])).toEqual({
      verbose: true,
      format: 'json',
    });
  });

  it('should ignore unknown formats', () => {
    const command = new EchoCommand();

    expect(command.options({ format: 'yaml' })).toEqual({ verbose: false });
  });

  it('should derive metadata from the tool definitions', () => {
    expect(new EchoCommand().getMetadata()).toEqual({
      name: 'echo',
      description: 'Echoes its input',
      tools: ['say', 'shout'],
    });
  });

  it('should suppress log output in JSON mode', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const command = new EchoCommand();

    command.print('hidden', { format: 'json' });
    command.print('shown');

    expect(info).toHaveBeenCalledTimes(1);
    expect(info).toHaveBeenCalledWith('shown');
    info.mockRestore();
  });
});
