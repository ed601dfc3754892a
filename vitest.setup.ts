import { beforeEach, afterEach, vi } from 'vitest';

const spies: Array<{ mockRestore(): void }> = [];

// Expected log lines from the catalog and its stores; anything else still prints.
const SUPPRESSED_PREFIXES = [
  '[Catalog]',
  '[Discovery]',
  '[IndexCache]',
  '[Icons]',
  '[Config]',
  '[Win]',
  'Discovered ',
];

function quiet(method: 'log' | 'warn' | 'error'): void {
  const passthrough = console[method].bind(console);
  spies.push(
    vi.spyOn(console, method).mockImplementation((...args: unknown[]) => {
      const first = String(args[0] ?? '');
      if (SUPPRESSED_PREFIXES.some((prefix) => first.startsWith(prefix))) {
        return;
      }
      passthrough(...args);
    })
  );
}

beforeEach(() => {
  quiet('log');
  quiet('warn');
  quiet('error');
});

afterEach(() => {
  for (const spy of spies.splice(0)) spy.mockRestore();
});
