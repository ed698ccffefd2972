/**
 * Browser Validation Script
 * Checks the Playwright setup end to end: launches a context through the pool,
 * runs one job against the target URL, and tears everything down again.
 */

import * as dotenv from 'dotenv';
import { PlaywrightEngineAdapter } from '../src/infrastructure/browser/PlaywrightEngineAdapter';
import { InMemoryEventBus } from '../src/infrastructure/events/InMemoryEventBus';
import { Orchestrator } from '../src/application/services/Orchestrator';
import { StepScriptCompiler } from '../src/application/services/automation/StepScriptCompiler';
import { describeError } from '../src/domain/errors/OrchestratorErrors';

// Load environment variables
dotenv.config();

const TARGET_URL = process.env.TARGET_URL ?? 'https://example.com';
const HEADLESS = process.env.HEADLESS !== 'false';

interface ValidationResult {
  step: string;
  success: boolean;
  message: string;
  duration?: number;
}

async function validateBrowser(): Promise<void> {
  const results: ValidationResult[] = [];
  const engine = new PlaywrightEngineAdapter({
    headless: HEADLESS,
    executablePath: process.env.CHROMIUM_PATH || undefined,
  });
  const orchestrator = new Orchestrator(engine, new InMemoryEventBus(), { pool: { capacity: 1 } });
  const compiler = new StepScriptCompiler();

  console.log('\n🔍 Starting Browser Validation...\n');
  console.log(`   Target URL: ${TARGET_URL}`);
  console.log(`   Headless: ${HEADLESS}\n`);

  try {
    orchestrator.start();

    console.log(`1. Running a job against ${TARGET_URL}...`);
    const steps = compiler.parse([
      { type: 'goto', url: TARGET_URL },
      { type: 'extract_text', selector: 'title', as: 'title' },
      { type: 'extract_links', as: 'links' },
    ]);
    const handle = orchestrator.submit({ steps: compiler.compile(steps), timeoutMs: 60000 });
    const outcome = await handle.outcome;

    if (outcome.status === 'succeeded') {
      const links = outcome.result.links;
      results.push({
        step: 'Run Job',
        success: true,
        message: `Title "${String(outcome.result.title)}", ${Array.isArray(links) ? links.length : 0} links`,
        duration: outcome.durationMs,
      });
      console.log(`   ✓ Job succeeded (${outcome.durationMs}ms)\n`);
    } else {
      results.push({
        step: 'Run Job',
        success: false,
        message: `${outcome.status}: ${outcome.fault.message}`,
        duration: outcome.durationMs,
      });
      console.log(`   ✗ Job ${outcome.status}: ${outcome.fault.message}\n`);
    }

    const status = orchestrator.status();
    results.push({
      step: 'Pool Status',
      success: status.pool.busy === 0,
      message: `ready=${status.pool.ready} busy=${status.pool.busy} health=${status.health}`,
    });
  } catch (error) {
    results.push({
      step: 'Validation',
      success: false,
      message: `Validation failed: ${describeError(error)}`,
    });
    console.error(`\n❌ Validation failed: ${describeError(error)}\n`);
  } finally {
    console.log('2. Draining pool...');
    await orchestrator.drainAndStop('validation finished');
    results.push({
      step: 'Teardown',
      success: engine.size === 0,
      message: `${engine.size} browser process(es) left`,
    });
    console.log('   ✓ Pool drained\n');
  }

  printSummary(results);
}

function printSummary(results: ValidationResult[]): void {
  console.log('═'.repeat(60));
  console.log('                    VALIDATION SUMMARY');
  console.log('═'.repeat(60));

  const failed = results.filter(r => !r.success);

  results.forEach(result => {
    const icon = result.success ? '✓' : '✗';
    const duration = result.duration ? ` (${result.duration}ms)` : '';
    console.log(`${icon} ${result.step}: ${result.message}${duration}`);
  });

  console.log('─'.repeat(60));
  console.log(`Total: ${results.length} checks | Failed: ${failed.length}`);
  console.log('═'.repeat(60));

  process.exit(failed.length > 0 ? 1 : 0);
}

// Run validation
validateBrowser().catch(error => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
