import { RateGate } from '../../../src/utils/RateGate';

describe('RateGate', () => {
  test('should hold the gate for the configured delay on each pass', async () => {
    const sleepFn = jest.fn().mockResolvedValue(undefined);
    const gate = new RateGate(500, sleepFn);

    await gate.pass();
    await gate.pass();

    expect(sleepFn).toHaveBeenCalledTimes(2);
    expect(sleepFn).toHaveBeenNthCalledWith(1, 500);
    expect(gate.getDelay()).toBe(500);
  });

  test('should let only one holder sleep at a time', async () => {
    const events: string[] = [];
    let active = 0;
    const sleepFn = jest.fn(async () => {
      active++;
      events.push(`start:${active}`);
      await new Promise<void>((resolve) => setImmediate(resolve));
      active--;
      events.push('end');
    });
    const gate = new RateGate(10, sleepFn);

    await Promise.all([gate.pass(), gate.pass(), gate.pass()]);

    expect(events).toEqual(['start:1', 'end', 'start:1', 'end', 'start:1', 'end']);
  });

  test('should release waiters in arrival order', async () => {
    const order: number[] = [];
    const gate = new RateGate(0, () => Promise.resolve());

    await Promise.all([1, 2, 3].map((n) => gate.pass().then(() => order.push(n))));

    expect(order).toEqual([1, 2, 3]);
  });

  describe('with fake timers', () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    test('should release the last of N queued tasks after N delays', async () => {
      const gate = new RateGate(500);
      const released: number[] = [];

      const passes = [1, 2, 3].map((n) => gate.pass().then(() => released.push(n)));

      await jest.advanceTimersByTimeAsync(1000);
      expect(released).toEqual([1, 2]);

      await jest.advanceTimersByTimeAsync(500);
      await Promise.all(passes);
      expect(released).toEqual([1, 2, 3]);
    });
  });
});
