import { PlaywrightEngineAdapter } from '../../../src/infrastructure/browser/PlaywrightEngineAdapter';
import { chromium, Browser, BrowserContext, Page } from 'playwright-core';

// Mock playwright-core
jest.mock('playwright-core', () => ({
  chromium: {
    launch: jest.fn(),
  },
}));

describe('PlaywrightEngineAdapter', () => {
  let adapter: PlaywrightEngineAdapter;
  let mockBrowser: jest.Mocked<Browser>;
  let mockContext: jest.Mocked<BrowserContext>;
  let mockPage: jest.Mocked<Page>;
  let extraPage: jest.Mocked<Page>;
  let browserListeners: Record<string, () => void>;

  const locatorFor = (texts: string[], attributes: Array<string | null> = []) => {
    const elements = attributes.map(value => ({ getAttribute: jest.fn().mockResolvedValue(value) }));
    return {
      first: () => ({
        count: jest.fn().mockResolvedValue(texts.length),
        textContent: jest.fn().mockResolvedValue(texts[0] ?? null),
        getAttribute: jest.fn().mockResolvedValue(attributes[0] ?? null),
      }),
      allTextContents: jest.fn().mockResolvedValue(texts),
      all: jest.fn().mockResolvedValue(elements),
    };
  };

  beforeEach(() => {
    jest.clearAllMocks();
    browserListeners = {};

    mockPage = {
      setDefaultTimeout: jest.fn(),
      goto: jest.fn().mockResolvedValue(null),
      url: jest.fn().mockReturnValue('https://shop.test/cart'),
      title: jest.fn().mockResolvedValue('Cart'),
      click: jest.fn().mockResolvedValue(undefined),
      fill: jest.fn().mockResolvedValue(undefined),
      selectOption: jest.fn().mockResolvedValue([]),
      hover: jest.fn().mockResolvedValue(undefined),
      waitForSelector: jest.fn().mockResolvedValue(null),
      locator: jest.fn().mockReturnValue(locatorFor([])),
      evaluate: jest.fn().mockResolvedValue(undefined),
      screenshot: jest.fn().mockResolvedValue(Buffer.from('png-bytes')),
      isClosed: jest.fn().mockReturnValue(false),
      close: jest.fn().mockResolvedValue(undefined),
    } as unknown as jest.Mocked<Page>;

    extraPage = {
      close: jest.fn().mockResolvedValue(undefined),
    } as unknown as jest.Mocked<Page>;

    mockContext = {
      newPage: jest.fn().mockResolvedValue(mockPage),
      clearCookies: jest.fn().mockResolvedValue(undefined),
      pages: jest.fn().mockReturnValue([mockPage, extraPage]),
    } as unknown as jest.Mocked<BrowserContext>;

    mockBrowser = {
      newContext: jest.fn().mockResolvedValue(mockContext),
      close: jest.fn().mockResolvedValue(undefined),
      isConnected: jest.fn().mockReturnValue(true),
      on: jest.fn((event: string, listener: () => void) => {
        browserListeners[event] = listener;
      }),
    } as unknown as jest.Mocked<Browser>;

    (chromium.launch as jest.Mock).mockResolvedValue(mockBrowser);

    adapter = new PlaywrightEngineAdapter({
      headless: true,
      actionTimeoutMs: 5000,
      viewportWidth: 800,
      viewportHeight: 600,
      launchArgs: ['--no-sandbox'],
    });
  });

  describe('launch', () => {
    it('should start a browser with its own context and page', async () => {
      const handle = await adapter.launch();

      expect(chromium.launch).toHaveBeenCalledWith({
        headless: true,
        executablePath: undefined,
        args: ['--no-sandbox'],
      });
      expect(mockBrowser.newContext).toHaveBeenCalledWith({ viewport: { width: 800, height: 600 } });
      expect(mockPage.setDefaultTimeout).toHaveBeenCalledWith(5000);
      expect(mockBrowser.on).toHaveBeenCalledWith('disconnected', expect.any(Function));
      expect(handle.id).toEqual(expect.any(String));
      expect(adapter.size).toBe(1);
    });

    it('should close the browser when the context cannot be created', async () => {
      mockBrowser.newContext.mockRejectedValueOnce(new Error('context failed'));

      await expect(adapter.launch()).rejects.toThrow('context failed');

      expect(mockBrowser.close).toHaveBeenCalled();
      expect(adapter.size).toBe(0);
    });
  });

  describe('session', () => {
    it('should navigate with the default wait condition and timeout', async () => {
      const { session } = await adapter.launch();

      await session.navigate('https://shop.test/');

      expect(mockPage.goto).toHaveBeenCalledWith('https://shop.test/', {
        waitUntil: 'domcontentloaded',
        timeout: 5000,
      });
    });

    it('should report the response status of a navigation', async () => {
      mockPage.goto.mockResolvedValueOnce({ status: () => 503 } as unknown as Awaited<ReturnType<Page['goto']>>);
      const { session } = await adapter.launch();

      expect(await session.navigate('https://shop.test/')).toEqual({ status: 503 });
      expect(await session.navigate('about:blank')).toEqual({ status: null });
    });

    it('should pass explicit wait options through', async () => {
      const { session } = await adapter.launch();

      await session.waitForSelector('#results', { state: 'attached', timeout: 100 });

      expect(mockPage.waitForSelector).toHaveBeenCalledWith('#results', { state: 'attached', timeout: 100 });
    });

    it('should return null text when nothing matches', async () => {
      const { session } = await adapter.launch();

      expect(await session.textContent('.missing')).toBeNull();
      expect(await session.getAttribute('.missing', 'href')).toBeNull();
    });

    it('should read text and attributes of matching elements', async () => {
      mockPage.locator.mockReturnValue(
        locatorFor(['First', 'Second'], ['/a', null, '/b']) as unknown as ReturnType<Page['locator']>
      );
      const { session } = await adapter.launch();

      expect(await session.textContent('li')).toBe('First');
      expect(await session.allTextContents('li')).toEqual(['First', 'Second']);
      expect(await session.allAttributeValues('li a', 'href')).toEqual(['/a', '/b']);
    });

    it('should read fields row by row and leave missing cells null', async () => {
      const cell = (text: string | null, href: string | null = null) => ({
        first: () => ({
          count: jest.fn().mockResolvedValue(text === null ? 0 : 1),
          innerText: jest.fn().mockResolvedValue(text ?? ''),
          getAttribute: jest.fn().mockResolvedValue(href),
        }),
      });
      const row = (cells: Record<string, ReturnType<typeof cell>>) => ({
        locator: jest.fn((selector: string) => cells[selector] ?? cell(null)),
      });
      mockPage.locator.mockReturnValue({
        all: jest.fn().mockResolvedValue([
          row({ 'td.date': cell('1/2'), 'a.details': cell('View', '/sale?id=7') }),
          row({ 'a.details': cell('View', '/sale?id=8') }),
        ]),
      } as unknown as ReturnType<Page['locator']>);
      const { session } = await adapter.launch();

      const rows = await session.extractRows('tbody tr', {
        date: { selector: 'td.date' },
        link: { selector: 'a.details', attribute: 'href' },
      });

      expect(mockPage.locator).toHaveBeenCalledWith('tbody tr');
      expect(rows).toEqual([
        { date: '1/2', link: '/sale?id=7' },
        { date: null, link: '/sale?id=8' },
      ]);
    });

    it('should return screenshots as base64 when no path is given', async () => {
      const { session } = await adapter.launch();

      expect(await session.screenshot()).toBe(Buffer.from('png-bytes').toString('base64'));
      expect(await session.screenshot({ path: '/tmp/shot.png' })).toBe('/tmp/shot.png');
    });
  });

  describe('execute', () => {
    it('should run steps against the handle session', async () => {
      const handle = await adapter.launch();

      const title = await adapter.execute(handle, session => session.getTitle(), new AbortController().signal);

      expect(title).toBe('Cart');
    });

    it('should reject a terminated handle', async () => {
      const handle = await adapter.launch();
      await adapter.terminate(handle);

      await expect(
        adapter.execute(handle, session => session.getTitle(), new AbortController().signal)
      ).rejects.toThrow(`Unknown or terminated engine handle ${handle.id}`);
    });
  });

  describe('isHealthy', () => {
    it('should report a connected browser with an open page as healthy', async () => {
      const handle = await adapter.launch();

      expect(await adapter.isHealthy(handle)).toBe(true);
    });

    it('should report a disconnected browser as unhealthy', async () => {
      const handle = await adapter.launch();

      browserListeners['disconnected']();

      expect(await adapter.isHealthy(handle)).toBe(false);
    });

    it('should report a closed page as unhealthy', async () => {
      const handle = await adapter.launch();
      mockPage.isClosed.mockReturnValue(true);

      expect(await adapter.isHealthy(handle)).toBe(false);
    });
  });

  describe('reset', () => {
    it('should clear cookies, storage and extra pages', async () => {
      const handle = await adapter.launch();

      await adapter.reset(handle);

      expect(mockContext.clearCookies).toHaveBeenCalled();
      expect(mockPage.evaluate).toHaveBeenCalledWith(
        'window.localStorage.clear(); window.sessionStorage.clear();'
      );
      expect(extraPage.close).toHaveBeenCalled();
      expect(mockPage.close).not.toHaveBeenCalled();
      expect(mockPage.goto).toHaveBeenLastCalledWith('about:blank');
    });

    it('should skip storage on pages without a web origin', async () => {
      mockPage.url.mockReturnValue('about:blank');
      const handle = await adapter.launch();

      await adapter.reset(handle);

      expect(mockPage.evaluate).not.toHaveBeenCalled();
    });
  });

  describe('terminate', () => {
    it('should close the browser process once', async () => {
      const handle = await adapter.launch();

      await adapter.terminate(handle);
      await adapter.terminate(handle);

      expect(mockBrowser.close).toHaveBeenCalledTimes(1);
      expect(adapter.size).toBe(0);
    });

    it('should not throw when the browser is already gone', async () => {
      const handle = await adapter.launch();
      mockBrowser.close.mockRejectedValueOnce(new Error('Target closed'));

      await expect(adapter.terminate(handle)).resolves.toBeUndefined();
      expect(adapter.size).toBe(0);
    });
  });
});
