import { ContextRunner } from '../../../../src/application/services/context/ContextRunner';
import { ContextLease } from '../../../../src/application/services/pool/ContextPool';
import { FakeBrowserEngine, sleepingSteps } from '../../../fakes/FakeBrowserEngine';

describe('ContextRunner', () => {
  let engine: FakeBrowserEngine;
  let runner: ContextRunner;
  let lease: ContextLease;

  beforeEach(async () => {
    engine = new FakeBrowserEngine();
    runner = new ContextRunner(engine);
    const handle = await engine.launch();
    lease = { contextId: 'ctx-1', slot: 0, holder: 'job-1', handle };
  });

  const inMs = (ms: number): number => Date.now() + ms;

  it('should return the result of the steps', async () => {
    const outcome = await runner.run(lease, async () => 42, { deadline: inMs(1000) });

    expect(outcome).toEqual({ kind: 'succeeded', result: 42 });
  });

  it('should report a step error on a context that is still healthy as clean', async () => {
    const error = new Error('selector not found');

    const outcome = await runner.run(
      lease,
      async () => {
        throw error;
      },
      { deadline: inMs(1000) }
    );

    expect(outcome).toEqual({ kind: 'failed', error, clean: true });
  });

  it('should report a crashed context as not clean', async () => {
    engine.crash(lease.handle.id);

    const outcome = await runner.run(lease, async () => 'never', { deadline: inMs(1000) });

    expect(outcome).toMatchObject({ kind: 'failed', clean: false });
  });

  it('should treat a failing health check as not clean', async () => {
    jest.spyOn(engine, 'isHealthy').mockRejectedValue(new Error('engine unreachable'));

    const outcome = await runner.run(
      lease,
      async () => {
        throw new Error('boom');
      },
      { deadline: inMs(1000) }
    );

    expect(outcome).toMatchObject({ kind: 'failed', clean: false });
  });

  it('should report a step error as failed when the health check outlasts the deadline', async () => {
    jest.spyOn(engine, 'isHealthy').mockImplementation(
      () => new Promise(resolve => setTimeout(() => resolve(true), 100))
    );
    const error = new Error('navigation failed');

    const outcome = await runner.run(
      lease,
      () => new Promise((_, reject) => setTimeout(() => reject(error), 20)),
      { deadline: inMs(60) }
    );

    expect(outcome).toEqual({ kind: 'failed', error, clean: true });
  });

  it('should time out steps that outlive the deadline and abort their signal', async () => {
    let stepSignal: AbortSignal | null = null;

    const outcome = await runner.run(
      lease,
      async (session, signal) => {
        stepSignal = signal;
        return sleepingSteps(300, 'late')(session, signal);
      },
      { deadline: inMs(50) }
    );

    expect(outcome).toEqual({ kind: 'timed_out' });
    expect(stepSignal).not.toBeNull();
    expect(stepSignal).toHaveProperty('aborted', true);
    expect(stepSignal).toHaveProperty('reason', 'deadline exceeded');
  });

  it('should not start steps once the deadline has passed', async () => {
    const steps = jest.fn(async () => 'never');

    const outcome = await runner.run(lease, steps, { deadline: Date.now() - 1 });

    expect(outcome).toEqual({ kind: 'timed_out' });
    expect(steps).not.toHaveBeenCalled();
  });

  it('should cancel a run when its signal aborts', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort('operator stop'), 20);

    const outcome = await runner.run(lease, sleepingSteps(300, 'late'), {
      deadline: inMs(1000),
      signal: controller.signal,
    });

    expect(outcome).toEqual({ kind: 'cancelled', reason: 'operator stop' });
  });

  it('should not start steps when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort('too late');
    const steps = jest.fn(async () => 'never');

    const outcome = await runner.run(lease, steps, { deadline: inMs(1000), signal: controller.signal });

    expect(outcome).toEqual({ kind: 'cancelled', reason: 'too late' });
    expect(steps).not.toHaveBeenCalled();
  });
});
