import { chromium, Browser, BrowserContext, Page } from 'playwright-core';
import { randomUUID } from 'crypto';
import {
  AutomationSession,
  AutomationSteps,
  BrowserEnginePort,
  EngineHandle,
  NavigateOptions,
  NavigationResult,
  RowFieldSelector,
  ScreenshotOptions,
  WaitForSelectorOptions,
} from '../../application/ports/BrowserEnginePort';
import { describeError } from '../../domain/errors/OrchestratorErrors';
import { Logger, getLogger } from '../logging';

/**
 * Configuration for the PlaywrightEngineAdapter.
 */
export interface PlaywrightEngineConfig {
  /** Run browser in headless mode */
  headless?: boolean;
  /** Default timeout for page actions in milliseconds */
  actionTimeoutMs?: number;
  viewportWidth?: number;
  viewportHeight?: number;
  /** Chromium binary to launch instead of the bundled lookup */
  executablePath?: string;
  /** Extra command-line switches for the browser process */
  launchArgs?: string[];
}

const DEFAULT_CONFIG: Required<Omit<PlaywrightEngineConfig, 'executablePath'>> = {
  headless: true,
  actionTimeoutMs: 15000,
  viewportWidth: 1280,
  viewportHeight: 720,
  launchArgs: [],
};

interface EngineInstance {
  browser: Browser;
  context: BrowserContext;
  page: Page;
  disconnected: boolean;
}

/**
 * Page-level primitives over a single Playwright page.
 */
export class PlaywrightSession implements AutomationSession {
  constructor(
    private readonly page: Page,
    private readonly actionTimeoutMs: number
  ) {}

  async navigate(url: string, options: NavigateOptions = {}): Promise<NavigationResult> {
    const response = await this.page.goto(url, {
      waitUntil: options.waitUntil ?? 'domcontentloaded',
      timeout: options.timeout ?? this.actionTimeoutMs,
    });
    return { status: response ? response.status() : null };
  }

  async click(selector: string, options: { timeout?: number } = {}): Promise<void> {
    await this.page.click(selector, { timeout: options.timeout ?? this.actionTimeoutMs });
  }

  async fill(selector: string, value: string, options: { timeout?: number } = {}): Promise<void> {
    await this.page.fill(selector, value, { timeout: options.timeout ?? this.actionTimeoutMs });
  }

  async select(selector: string, value: string): Promise<void> {
    await this.page.selectOption(selector, value);
  }

  async hover(selector: string): Promise<void> {
    await this.page.hover(selector);
  }

  async waitForSelector(selector: string, options: WaitForSelectorOptions = {}): Promise<void> {
    await this.page.waitForSelector(selector, {
      state: options.state ?? 'visible',
      timeout: options.timeout ?? this.actionTimeoutMs,
    });
  }

  async textContent(selector: string): Promise<string | null> {
    const locator = this.page.locator(selector).first();
    if ((await locator.count()) === 0) {
      return null;
    }
    return locator.textContent();
  }

  allTextContents(selector: string): Promise<string[]> {
    return this.page.locator(selector).allTextContents();
  }

  async getAttribute(selector: string, name: string): Promise<string | null> {
    const locator = this.page.locator(selector).first();
    if ((await locator.count()) === 0) {
      return null;
    }
    return locator.getAttribute(name);
  }

  async allAttributeValues(selector: string, name: string): Promise<string[]> {
    const values = await Promise.all(
      (await this.page.locator(selector).all()).map(element => element.getAttribute(name))
    );
    return values.filter((value): value is string => value !== null);
  }

  async extractRows(
    rowSelector: string,
    fields: Record<string, RowFieldSelector>
  ): Promise<Array<Record<string, string | null>>> {
    const rows = await this.page.locator(rowSelector).all();
    const records: Array<Record<string, string | null>> = [];
    for (const row of rows) {
      const record: Record<string, string | null> = {};
      for (const [name, field] of Object.entries(fields)) {
        const cell = row.locator(field.selector).first();
        if ((await cell.count()) === 0) {
          record[name] = null;
        } else if (field.attribute) {
          record[name] = await cell.getAttribute(field.attribute);
        } else {
          record[name] = await cell.innerText();
        }
      }
      records.push(record);
    }
    return records;
  }

  evaluate<T>(script: string | (() => T)): Promise<T> {
    return this.page.evaluate(script);
  }

  async screenshot(options: ScreenshotOptions = {}): Promise<string> {
    const buffer = await this.page.screenshot({
      path: options.path,
      fullPage: options.fullPage ?? false,
      type: options.type ?? 'png',
    });
    return options.path ?? buffer.toString('base64');
  }

  async getCurrentUrl(): Promise<string> {
    return this.page.url();
  }

  getTitle(): Promise<string> {
    return this.page.title();
  }
}

/**
 * Playwright implementation of the browser engine port.
 *
 * Every handle owns its own browser process, browser context and page, so a crash
 * or leaked state in one execution context cannot reach another.
 */
export class PlaywrightEngineAdapter implements BrowserEnginePort {
  private readonly config: Required<Omit<PlaywrightEngineConfig, 'executablePath'>> &
    Pick<PlaywrightEngineConfig, 'executablePath'>;
  private readonly instances: Map<string, EngineInstance> = new Map();
  private readonly logger: Logger;

  constructor(config: PlaywrightEngineConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = getLogger('Engine');
  }

  async launch(): Promise<EngineHandle> {
    const browser = await chromium.launch({
      headless: this.config.headless,
      executablePath: this.config.executablePath,
      args: this.config.launchArgs,
    });

    let context: BrowserContext;
    let page: Page;
    try {
      context = await browser.newContext({
        viewport: {
          width: this.config.viewportWidth,
          height: this.config.viewportHeight,
        },
      });
      page = await context.newPage();
    } catch (error) {
      await browser.close().catch((closeError: unknown) => {
        this.logger.debug('Closing half-launched browser failed', { error: describeError(closeError) });
      });
      throw error;
    }
    page.setDefaultTimeout(this.config.actionTimeoutMs);

    const id = randomUUID();
    const instance: EngineInstance = { browser, context, page, disconnected: false };
    browser.on('disconnected', () => {
      instance.disconnected = true;
      if (this.instances.has(id)) {
        this.logger.warn('Browser process disconnected', { handleId: id });
      }
    });
    this.instances.set(id, instance);

    return { id, session: new PlaywrightSession(page, this.config.actionTimeoutMs) };
  }

  async execute<T>(handle: EngineHandle, steps: AutomationSteps<T>, signal: AbortSignal): Promise<T> {
    this.instance(handle);
    return steps(handle.session, signal);
  }

  async isHealthy(handle: EngineHandle): Promise<boolean> {
    const instance = this.instances.get(handle.id);
    if (!instance || instance.disconnected || !instance.browser.isConnected()) {
      return false;
    }
    return !instance.page.isClosed();
  }

  async reset(handle: EngineHandle): Promise<void> {
    const instance = this.instance(handle);
    await instance.context.clearCookies();
    if (/^https?:/.test(instance.page.url())) {
      await instance.page.evaluate('window.localStorage.clear(); window.sessionStorage.clear();');
    }
    for (const page of instance.context.pages()) {
      if (page !== instance.page) {
        await page.close();
      }
    }
    await instance.page.goto('about:blank');
  }

  async terminate(handle: EngineHandle): Promise<void> {
    const instance = this.instances.get(handle.id);
    if (!instance) {
      return;
    }
    this.instances.delete(handle.id);
    try {
      await instance.browser.close();
    } catch (error) {
      this.logger.debug('Browser close failed', { handleId: handle.id, error: describeError(error) });
    }
  }

  /**
   * Number of live browser processes.
   */
  get size(): number {
    return this.instances.size;
  }

  private instance(handle: EngineHandle): EngineInstance {
    const instance = this.instances.get(handle.id);
    if (!instance) {
      throw new Error(`Unknown or terminated engine handle ${handle.id}`);
    }
    return instance;
  }
}
