import { beforeAll, describe, expect, it, vi } from 'vitest';

// Mock commander to avoid real CLI execution side-effects
class FakeCommand {
  name(): this {
    return this;
  }
  description(): this {
    return this;
  }
  version(): this {
    return this;
  }
  command(): this {
    return this;
  }
  option(): this {
    return this;
  }
  action(): this {
    return this;
  }
  parseAsync(): Promise<this> {
    return Promise.resolve(this);
  }
}

vi.mock('commander', () => ({ Command: FakeCommand }));

// Avoid accidental process.exit when error paths are exercised
beforeAll(() => {
  vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new Error(`process.exit(${String(code ?? 0)}) intercepted in tests`);
  });
});

describe('CLI index smoke: imports without executing actions', () => {
  it('imports the CLI module with mocked commander', async () => {
    const mod = await import('../index.js');
    expect(mod.program).toBeInstanceOf(FakeCommand);
    await expect(mod.main(['node', 'subarray'])).resolves.toBeUndefined();
  });
});
