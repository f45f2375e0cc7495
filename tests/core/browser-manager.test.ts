import { describe, it, expect, vi, beforeEach } from 'vitest';
import { BrowserManager } from '../../src/core/browser-manager.js';

// Mock the logger to avoid noise in tests
vi.mock('../../src/utils/logger.js', () => {
  const mockLogger = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    timed: vi.fn(),
    child: vi.fn(),
  };
  return {
    logger: {
      browser: mockLogger,
      create: vi.fn(() => mockLogger),
    },
  };
});

interface FakeContext {
  close: ReturnType<typeof vi.fn>;
  newPage: ReturnType<typeof vi.fn>;
}

const { contexts, browserClose, launch } = vi.hoisted(() => {
  const contexts: FakeContext[] = [];
  const browserClose = vi.fn(async () => undefined);
  const launch = vi.fn(async () => ({
    close: browserClose,
    newContext: vi.fn(async () => {
      const context: FakeContext = {
        close: vi.fn(async () => undefined),
        newPage: vi.fn(async () => ({
          setDefaultTimeout: vi.fn(),
          setDefaultNavigationTimeout: vi.fn(),
        })),
      };
      contexts.push(context);
      return context;
    }),
  }));
  return { contexts, browserClose, launch };
});

vi.mock('playwright', () => ({ chromium: { launch } }));

describe('BrowserManager', () => {
  beforeEach(() => {
    contexts.length = 0;
    browserClose.mockClear();
    launch.mockClear();
  });

  it('should give each driver its own context on one shared browser', async () => {
    const manager = new BrowserManager({ timeout: 1000 });

    await manager.openDriver();
    await manager.openDriver();

    expect(launch).toHaveBeenCalledTimes(1);
    expect(manager.openContexts).toBe(2);
  });

  it('should close the remaining contexts and the browser when one context fails to close', async () => {
    const manager = new BrowserManager();
    await manager.openDriver();
    await manager.openDriver();
    await manager.openDriver();
    contexts[0]?.close.mockRejectedValueOnce(new Error('Target closed'));

    await manager.cleanup();

    expect(contexts[1]?.close).toHaveBeenCalledTimes(1);
    expect(contexts[2]?.close).toHaveBeenCalledTimes(1);
    expect(browserClose).toHaveBeenCalledTimes(1);
    expect(manager.openContexts).toBe(0);
  });

  it('should close a driver context exactly once through the driver', async () => {
    const manager = new BrowserManager();
    const driver = await manager.openDriver();

    await driver.close();
    await manager.cleanup();

    expect(contexts[0]?.close).toHaveBeenCalledTimes(1);
    expect(manager.openContexts).toBe(0);
  });
});
