import { describe, it, expect, vi } from 'vitest';

vi.mock('conf', () => ({
  default: class MockConf {
    get() {
      return undefined;
    }
    set() {}
    clear() {}
  },
}));

describe('commands/index.ts exports', () => {
  it('exports all command functions', async () => {
    const commands = await import('../../src/commands/index.js');

    expect(typeof commands.cleanCommand).toBe('function');
    expect(typeof commands.configCommand).toBe('function');
    expect(typeof commands.getGlobalConcurrency).toBe('function');
    expect(typeof commands.getGlobalAssumeYes).toBe('function');
    expect(typeof commands.validateConcurrency).toBe('function');
    expect(typeof commands.groupByExtension).toBe('function');
    expect(typeof commands.toJsonReport).toBe('function');
  });
});
