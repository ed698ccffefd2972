/**
 * Options for browser navigation.
 */
export interface NavigateOptions {
  /** Wait for navigation to complete */
  waitUntil?: 'load' | 'domcontentloaded' | 'networkidle';
  /** Timeout in milliseconds */
  timeout?: number;
}

/**
 * What a navigation returned. `status` is null when there was no HTTP response
 * (same-document navigations, `about:` and `data:` URLs).
 */
export interface NavigationResult {
  status: number | null;
}

/**
 * Where a row field is read from, relative to its row.
 */
export interface RowFieldSelector {
  selector: string;
  /** Read this attribute instead of the rendered text */
  attribute?: string;
}

/**
 * Options for waiting on an element.
 */
export interface WaitForSelectorOptions {
  timeout?: number;
  state?: 'visible' | 'hidden' | 'attached' | 'detached';
}

/**
 * Options for screenshot capture.
 */
export interface ScreenshotOptions {
  /** Full page screenshot or viewport only */
  fullPage?: boolean;
  /** File path to save the screenshot */
  path?: string;
  /** Image type */
  type?: 'png' | 'jpeg';
}

/**
 * Page-level primitives exposed to automation steps.
 * Every method throws on failure; the orchestrator reports the error as a fault.
 */
export interface AutomationSession {
  navigate(url: string, options?: NavigateOptions): Promise<NavigationResult>;

  click(selector: string, options?: { timeout?: number }): Promise<void>;

  fill(selector: string, value: string, options?: { timeout?: number }): Promise<void>;

  /**
   * Selects an option from a dropdown by value or label.
   */
  select(selector: string, value: string): Promise<void>;

  hover(selector: string): Promise<void>;

  waitForSelector(selector: string, options?: WaitForSelectorOptions): Promise<void>;

  /**
   * Text of the first matching element, or null when nothing matches.
   */
  textContent(selector: string): Promise<string | null>;

  allTextContents(selector: string): Promise<string[]>;

  /**
   * Attribute of the first matching element, or null when absent.
   */
  getAttribute(selector: string, name: string): Promise<string | null>;

  /**
   * Attribute of every matching element; elements without it are skipped.
   */
  allAttributeValues(selector: string, name: string): Promise<string[]>;

  /**
   * One record per element matching `rowSelector`, keyed like `fields`.
   * A field whose selector matches nothing in its row is null.
   */
  extractRows(
    rowSelector: string,
    fields: Record<string, RowFieldSelector>
  ): Promise<Array<Record<string, string | null>>>;

  /**
   * Executes JavaScript in the page context.
   */
  evaluate<T>(script: string | (() => T)): Promise<T>;

  /**
   * Takes a screenshot; returns the saved path or base64 data when no path is given.
   */
  screenshot(options?: ScreenshotOptions): Promise<string>;

  getCurrentUrl(): Promise<string>;

  getTitle(): Promise<string>;
}

/**
 * Automation work run against one execution context.
 * Long-running steps should observe `signal` and stop once it aborts.
 */
export type AutomationSteps<T> = (session: AutomationSession, signal: AbortSignal) => Promise<T>;

/**
 * Opaque handle to a launched engine instance.
 */
export interface EngineHandle {
  readonly id: string;
  readonly session: AutomationSession;
}

/**
 * Port interface for the browser engine capability the pool depends on.
 */
export interface BrowserEnginePort {
  /**
   * Starts a new isolated engine instance.
   */
  launch(): Promise<EngineHandle>;

  /**
   * Runs automation steps against a launched instance.
   * Deadline enforcement belongs to the caller; the signal aborts when it passes.
   */
  execute<T>(handle: EngineHandle, steps: AutomationSteps<T>, signal: AbortSignal): Promise<T>;

  /**
   * Confirms the instance is still usable (e.g. after a step error).
   */
  isHealthy(handle: EngineHandle): Promise<boolean>;

  /**
   * Clears per-job state (cookies, storage, extra pages) before reuse.
   */
  reset(handle: EngineHandle): Promise<void>;

  /**
   * Forcibly tears the instance down. Must be safe to call on a crashed instance.
   */
  terminate(handle: EngineHandle): Promise<void>;
}
