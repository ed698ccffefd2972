import { AutomationSession, AutomationSteps, RowFieldSelector } from '../../ports/BrowserEnginePort';
import { GotoStep, RowField, Step, stepListSchema } from '../../../domain/automation/StepScript';
import {
  InvalidJobError,
  StepExecutionError,
  describeError,
} from '../../../domain/errors/OrchestratorErrors';
import { abortableSleep } from '../../utils/timing';
import { MAX_TIMER_DELAY_MS } from '../../../domain/shared/Timers';
import { Logger, getLogger } from '../../../infrastructure/logging';

/**
 * Named extractions collected while a script runs.
 */
export type ExtractionResult = Record<string, unknown>;

/**
 * Collapse runs of whitespace and trim.
 */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Resolve hrefs against the page URL. Empty or unparseable hrefs are skipped;
 * with `queryParam`, the parameter's value is returned instead (links without it are skipped).
 */
export function resolveLinks(hrefs: string[], baseUrl: string, queryParam?: string): string[] {
  const links: string[] = [];
  for (const href of hrefs) {
    const trimmed = href.trim();
    if (!trimmed) {
      continue;
    }
    let url: URL;
    try {
      url = new URL(trimmed, baseUrl);
    } catch {
      continue;
    }
    if (queryParam) {
      const value = url.searchParams.get(queryParam);
      if (value) {
        links.push(value);
      }
    } else {
      links.push(url.toString());
    }
  }
  return links;
}

function toRowSelector(field: RowField): RowFieldSelector {
  return typeof field === 'string' ? { selector: field } : field;
}

/**
 * Turns declarative step scripts into automation steps.
 */
export class StepScriptCompiler {
  private readonly logger: Logger = getLogger('Engine');

  /**
   * Validate raw input as a step list.
   */
  parse(input: unknown): Step[] {
    const parsed = stepListSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new InvalidJobError(`invalid step script: ${issues}`);
    }
    return parsed.data;
  }

  compile(steps: Step[]): AutomationSteps<ExtractionResult> {
    const script = [...steps];
    return async (session, signal) => {
      const result: ExtractionResult = {};
      for (let index = 0; index < script.length; index++) {
        signal.throwIfAborted();
        const step = script[index];
        try {
          await this.runStep(step, session, signal, result);
        } catch (error) {
          if (signal.aborted) {
            throw error;
          }
          throw new StepExecutionError(index, step.type, error);
        }
      }
      return result;
    };
  }

  private async runStep(
    step: Step,
    session: AutomationSession,
    signal: AbortSignal,
    result: ExtractionResult
  ): Promise<void> {
    switch (step.type) {
      case 'goto':
        await this.navigate(step, session, signal);
        return;
      case 'click': {
        const { selector, timeout } = step;
        await this.attempt(step.optional, step.type, signal, () => session.click(selector, { timeout }));
        return;
      }
      case 'fill':
        await session.fill(step.selector, step.value, { timeout: step.timeout });
        return;
      case 'select':
        await session.select(step.selector, step.value);
        return;
      case 'hover':
        await session.hover(step.selector);
        return;
      case 'wait_for': {
        const { selector, state, timeout } = step;
        await this.attempt(step.optional, step.type, signal, () =>
          session.waitForSelector(selector, { state, timeout })
        );
        return;
      }
      case 'wait':
        await abortableSleep(step.ms, signal);
        return;
      case 'extract_text':
        if (step.all) {
          const texts = await session.allTextContents(step.selector);
          result[step.as] = texts.map(normalizeText).filter(text => text.length > 0);
        } else {
          const text = await session.textContent(step.selector);
          result[step.as] = text === null ? null : normalizeText(text);
        }
        return;
      case 'extract_attribute':
        result[step.as] = step.all
          ? await session.allAttributeValues(step.selector, step.attribute)
          : await session.getAttribute(step.selector, step.attribute);
        return;
      case 'extract_links': {
        const hrefs = await session.allAttributeValues(step.selector, 'href');
        const baseUrl = await session.getCurrentUrl();
        result[step.as] = resolveLinks(hrefs, baseUrl, step.queryParam);
        return;
      }
      case 'extract_rows': {
        const fields: Record<string, RowFieldSelector> = {};
        for (const [name, field] of Object.entries(step.fields)) {
          fields[name] = toRowSelector(field);
        }
        const rows = await session.extractRows(step.selector, fields);
        result[step.as] = rows.map(row => {
          const record: Record<string, string | null> = {};
          for (const [name, value] of Object.entries(row)) {
            record[name] = value !== null && !fields[name]?.attribute ? normalizeText(value) : value;
          }
          return record;
        });
        return;
      }
      case 'evaluate': {
        const value = await session.evaluate<unknown>(step.script);
        if (step.as) {
          result[step.as] = value;
        }
        return;
      }
    }
  }

  /**
   * Navigate, treating a non-2xx response like an error, with exponential backoff between attempts.
   */
  private async navigate(step: GotoStep, session: AutomationSession, signal: AbortSignal): Promise<void> {
    let lastError: unknown;
    for (let attempt = 0; attempt <= step.retries; attempt++) {
      if (attempt > 0) {
        const delayMs = Math.min(step.retryDelayMs * 2 ** (attempt - 1), MAX_TIMER_DELAY_MS);
        this.logger.debug('Retrying navigation', { url: step.url, attempt, delayMs });
        await abortableSleep(delayMs, signal);
      }
      try {
        const { status } = await session.navigate(step.url, {
          waitUntil: step.waitUntil,
          timeout: step.timeout,
        });
        if (status === null || (status >= 200 && status < 300)) {
          return;
        }
        lastError = new Error(`HTTP ${status} for ${step.url}`);
      } catch (error) {
        if (signal.aborted) {
          throw error;
        }
        lastError = error;
      }
    }
    throw lastError;
  }

  /**
   * Run an interaction; when the step is optional its failure is logged and skipped.
   */
  private async attempt(
    optional: boolean,
    type: Step['type'],
    signal: AbortSignal,
    action: () => Promise<void>
  ): Promise<void> {
    try {
      await action();
    } catch (error) {
      if (!optional || signal.aborted) {
        throw error;
      }
      this.logger.debug('Optional step skipped', { type, error: describeError(error) });
    }
  }
}
