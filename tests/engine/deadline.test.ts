import { RunDeadline, linkedTimeout, sleep } from '../../src/engine/deadline';

describe('RunDeadline', () => {
  test('aborts its signal when the budget runs out', async () => {
    const deadline = new RunDeadline(20);
    expect(deadline.expired).toBe(false);
    await sleep(60);
    expect(deadline.expired).toBe(true);
    expect(deadline.signal.aborted).toBe(true);
    deadline.dispose();
  });

  test('expire() ends the run early', () => {
    const deadline = new RunDeadline(60_000);
    deadline.expire();
    expect(deadline.expired).toBe(true);
    deadline.dispose();
  });

  test('reports elapsed and remaining time from its clock', () => {
    let now = 1_000;
    const deadline = new RunDeadline(5_000, () => now);
    now = 3_500;
    expect(deadline.elapsedMs()).toBe(2_500);
    expect(deadline.remainingMs()).toBe(2_500);
    now = 9_000;
    expect(deadline.remainingMs()).toBe(0);
    deadline.dispose();
  });
});

describe('linkedTimeout', () => {
  test('fires on its own timeout and says so', async () => {
    const parent = new AbortController();
    const linked = linkedTimeout(parent.signal, 10);
    await sleep(40);
    expect(linked.signal.aborted).toBe(true);
    expect(linked.timedOut()).toBe(true);
    linked.dispose();
  });

  test('follows the parent without counting as a timeout', () => {
    const parent = new AbortController();
    const linked = linkedTimeout(parent.signal, 60_000);
    parent.abort(new Error('run over'));
    expect(linked.signal.aborted).toBe(true);
    expect(linked.timedOut()).toBe(false);
    linked.dispose();
  });

  test('starts aborted when the parent already is', () => {
    const parent = new AbortController();
    parent.abort();
    const linked = linkedTimeout(parent.signal, 60_000);
    expect(linked.signal.aborted).toBe(true);
    linked.dispose();
  });
});

describe('sleep', () => {
  test('rejects as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(60_000, controller.signal);
    setTimeout(() => controller.abort(new Error('stop')), 10);
    await expect(pending).rejects.toThrow('stop');
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  test('rejects immediately on an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('already'));
    await expect(sleep(10, controller.signal)).rejects.toThrow('already');
  });
});
