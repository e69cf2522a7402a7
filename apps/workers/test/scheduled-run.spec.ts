import { ScheduledRun } from '../src/pipeline/scheduled-run';

function deferred() {
  let resolve: () => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<void>((res, rej) => {
    resolve = () => res();
    reject = error => rej(error);
  });
  return { promise, resolve, reject };
}

describe('ScheduledRun', () => {
  it('should skip a trigger that arrives while a run is in progress', async () => {
    const pending = deferred();
    const task = jest.fn(() => pending.promise);
    const run = new ScheduledRun(task);

    const first = run.trigger('initial run');
    const second = await run.trigger('scheduled run');

    expect(second).toBe(false);
    expect(run.isRunning).toBe(true);
    expect(task).toHaveBeenCalledTimes(1);

    pending.resolve();
    await expect(first).resolves.toBe(true);
    expect(run.isRunning).toBe(false);
  });

  it('should run again once the previous run has finished', async () => {
    const task = jest.fn(async () => undefined);
    const run = new ScheduledRun(task);

    await run.trigger('initial run');
    await run.trigger('scheduled run');

    expect(task).toHaveBeenCalledTimes(2);
  });

  it('should pass on a failed run and accept the next trigger', async () => {
    const pending = deferred();
    const task = jest.fn(() => pending.promise);
    const run = new ScheduledRun(task);

    const first = run.trigger('initial run');
    pending.reject(new Error('market data unavailable'));

    await expect(first).rejects.toThrow('market data unavailable');
    expect(run.isRunning).toBe(false);

    task.mockImplementationOnce(async () => undefined);
    await expect(run.trigger('scheduled run')).resolves.toBe(true);
    expect(task).toHaveBeenCalledTimes(2);
  });
});
