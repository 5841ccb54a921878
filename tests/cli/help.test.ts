import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { printHelp, printVersion } from '../../src/cli/help.js';

describe('help output', () => {
  let errSpy: ReturnType<typeof vi.spyOn>;
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    errSpy.mockRestore();
    logSpy.mockRestore();
  });

  it('lists the debug flag', () => {
    printHelp();
    const out = errSpy.mock.calls.map((c: unknown[]) => String(c[0] ?? '')).join('\n');
    expect(out).toContain('Usage: tasktui [options]');
    expect(out).toContain('  --debug              Show the debug log pane');
  });

  it('prints the message before the help text', () => {
    printHelp("Unknown argument 'x'.");
    expect(errSpy.mock.calls[0]?.[0]).toBe("Unknown argument 'x'.");
    expect(errSpy.mock.calls[1]?.[0]).toBe('');
  });

  it('prints the version on stdout', () => {
    printVersion('1.2.3');
    expect(logSpy).toHaveBeenCalledWith('1.2.3');
  });
});
