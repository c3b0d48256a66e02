import {
  BaseCommand,
  CommandRegistry,
  type CallToolResult,
  type Tool,
} from '@kvctl/commands-core';

export class StubCommand extends BaseCommand {
  public readonly name = 'stub';
  public readonly description = 'Records its calls';
  public readonly cliCalls: string[][] = [];

  public async executeToolViaMCP(
    toolName: string,
    args: Record<string, unknown>,
  ): Promise<CallToolResult> {
    if (toolName === 'explode') {
      throw new Error('boom');
    }
    return {
      content: [{ type: 'text', text: `${toolName}:${JSON.stringify(args)}` }],
    };
  }

  public async executeViaCLI(args: string[]): Promise<void> {
    this.cliCalls.push(args);
  }

  public getMCPDefinitions(): Tool[] {
    return [
      {
        name: 'ping',
        description: 'Answers',
        inputSchema: { type: 'object', properties: {} },
      },
      { name: 'explode', inputSchema: { type: 'object', properties: {} } },
    ];
  }
}

export function createStubRegistry(): { registry: CommandRegistry; command: StubCommand } {
  const registry = new CommandRegistry();
  const command = new StubCommand();
  registry.register(command);
  return { registry, command };
}
