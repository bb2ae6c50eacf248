import { CommandRegistry, formatUsage, registerCommandSafely, type CommandDefinition } from '../src/cli/registry';
import { captureConsole } from './test-helpers';

function definition(name: string, overrides: Partial<CommandDefinition> = {}): CommandDefinition {
  return {
    name,
    description: `${name} things`,
    subcommands: {
      run: { synopsis: 'run [--fast]', description: 'Run it', run: jest.fn(async () => undefined) },
    },
    ...overrides,
  };
}

describe('CommandRegistry', () => {
  it('registers and looks up commands', () => {
    const registry = new CommandRegistry();
    const command = definition('thumbnail');

    registry.add(command);

    expect(registry.get('thumbnail')).toBe(command);
    expect(registry.get('other')).toBeUndefined();
    expect(registry.list()).toEqual([command]);
  });

  it('rejects duplicate names', () => {
    const registry = new CommandRegistry();
    registry.add(definition('thumbnail'));

    expect(() => registry.add(definition('thumbnail'))).toThrow('Command "thumbnail" is already registered');
  });

  it('rejects invalid names and empty commands', () => {
    const registry = new CommandRegistry();

    expect(() => registry.add(definition('Bad Name'))).toThrow('Invalid command name "Bad Name"');
    expect(() => registry.add(definition('empty', { subcommands: {} }))).toThrow('Command "empty" has no subcommands');
  });
});

describe('registerCommandSafely', () => {
  let output: ReturnType<typeof captureConsole>;

  beforeEach(() => {
    output = captureConsole();
  });

  afterEach(() => {
    output.restore();
  });

  it('returns true when registration succeeds', () => {
    const registry = new CommandRegistry();

    expect(registerCommandSafely(registry, definition('thumbnail'))).toBe(true);
    expect(output.lines).toEqual([]);
  });

  it('logs a warning instead of throwing when registration fails', () => {
    const registry = new CommandRegistry();
    registry.add(definition('thumbnail'));

    expect(registerCommandSafely(registry, definition('thumbnail'))).toBe(false);
    expect(output.lines).toEqual([
      '⚠️  Could not register command "thumbnail": Command "thumbnail" is already registered',
    ]);
    expect(registry.list()).toHaveLength(1);
  });
});

describe('formatUsage', () => {
  it('lists every subcommand with its synopsis', () => {
    const usage = formatUsage('post-thumbs', [definition('thumbnail')]);

    expect(usage.split('\n').slice(0, 5)).toEqual([
      'Usage:',
      '',
      '  thumbnail - thumbnail things',
      '    post-thumbs thumbnail run [--fast]',
      '        Run it',
    ]);
  });
});
