import { afterEach, beforeEach, vi } from 'vitest';
import { setLogLevel } from '@/utils/logger';

// Every log level reaches the console spies; output itself is suppressed.
beforeEach(() => {
  setLogLevel('debug');

  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'info').mockImplementation(() => {});
  vi.spyOn(console, 'debug').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});

  vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
});

afterEach(() => {
  vi.restoreAllMocks();
  setLogLevel('warn');
});
