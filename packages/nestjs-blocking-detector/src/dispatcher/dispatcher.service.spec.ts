import { Logger } from '@nestjs/common';
import { DispatcherService, FormulaBlockedEvent } from './dispatcher.service';
import { DetectorRegistry } from './detector.registry';
import { DetectorState } from '../detector/detector-state.enum';
import { UnknownFormulaError } from '../common/errors/detector.errors';
import { ResolvedDetectorOptions } from '../common/interfaces/detector-module-options.interface';
import { FakeFormulaWorkerFactory } from '../testing/fake-formula-worker.factory';

const options: ResolvedDetectorOptions = {
  formulaIds: ['formula-a', 'formula-b'],
  redis: { host: 'localhost', port: 6379, db: 0 },
  formulaQueuePrefix: 'test-queue',
  supervisionInterval: 1000,
};

describe('DispatcherService', () => {
  let registry: DetectorRegistry;
  let factory: FakeFormulaWorkerFactory;
  let dispatcher: DispatcherService;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(() => {
    registry = new DetectorRegistry();
    factory = new FakeFormulaWorkerFactory();
    dispatcher = new DispatcherService(options, registry, factory);
  });

  async function failReports(formulaId: string, count: number): Promise<void> {
    dispatcher.registerHandler(async () => {
      throw new Error('formula crashed');
    });
    for (let i = 0; i < count; i++) {
      await dispatcher.dispatch(formulaId, { sample: i });
    }
    await factory.drain(formulaId);
  }

  it('creates a worker, a queue and a detector per formula', async () => {
    await dispatcher.createFormulas(options.formulaIds);
    await dispatcher.createFormula('formula-a');

    expect(dispatcher.getFormulaIds()).toEqual(['formula-a', 'formula-b']);
    expect(registry.getFormulaIds()).toEqual(['formula-a', 'formula-b']);
    expect(factory.workers.size).toBe(2);
    expect(factory.queues.size).toBe(2);
  });

  it('tags every dispatched report with the next report id of its formula', async () => {
    await dispatcher.createFormulas(options.formulaIds);

    const first = await dispatcher.dispatch('formula-a', { value: 1 });
    const second = await dispatcher.dispatch('formula-a', { value: 2 });
    const other = await dispatcher.dispatch('formula-b', { value: 3 });

    expect(first).toEqual({ jobId: 'job-1', dispatcherReportId: 0 });
    expect(second).toEqual({ jobId: 'job-2', dispatcherReportId: 1 });
    expect(other).toEqual({ jobId: 'job-1', dispatcherReportId: 0 });
    expect(factory.queues.get('formula-a')?.reports[1]).toEqual({
      formulaId: 'formula-a',
      dispatcherReportId: 1,
      payload: { value: 2 },
    });
  });

  it('dispatches to every formula', async () => {
    await dispatcher.createFormulas(options.formulaIds);

    const receipts = await dispatcher.dispatchToAll({ value: 'all' });

    expect(receipts.map((receipt) => receipt.dispatcherReportId)).toEqual([0, 0]);
    expect(factory.queues.get('formula-b')?.reports).toHaveLength(1);
  });

  it('reuses the id of a report that could not be enqueued', async () => {
    await dispatcher.createFormula('formula-a');
    const queue = factory.queues.get('formula-a');
    const failure = new Error('redis unavailable');
    if (queue) {
      queue.failNextAdd = failure;
    }

    await expect(dispatcher.dispatch('formula-a', { value: 1 })).rejects.toBe(failure);
    expect(await dispatcher.dispatch('formula-a', { value: 2 })).toEqual({ jobId: 'job-1', dispatcherReportId: 0 });
    expect(await dispatcher.dispatch('formula-a', { value: 3 })).toEqual({ jobId: 'job-2', dispatcherReportId: 1 });
  });

  it('rejects a report for an unknown formula', async () => {
    await expect(dispatcher.dispatch('missing', {})).rejects.toBeInstanceOf(UnknownFormulaError);
  });

  it('runs the registered handler without touching the detector', async () => {
    await dispatcher.createFormula('formula-a');
    const handler = jest.fn().mockResolvedValue('ok');
    dispatcher.registerHandler(handler);

    await dispatcher.dispatch('formula-a', { value: 1 });
    await factory.drain('formula-a');

    expect(handler).toHaveBeenCalledWith({ formulaId: 'formula-a', dispatcherReportId: 0, payload: { value: 1 } });
    expect(registry.get('formula-a')?.getState()).toBe(DetectorState.INIT);
  });

  it('treats a report without a handler as poison', async () => {
    await dispatcher.createFormula('formula-a');

    await dispatcher.dispatch('formula-a', { value: 1 });
    await factory.drain('formula-a');

    expect(registry.get('formula-a')?.getState()).toBe(DetectorState.BLOCKED_INTER_1);
  });

  it('signals a formula once after three consecutive failed reports', async () => {
    await dispatcher.createFormulas(options.formulaIds);
    const events: FormulaBlockedEvent[] = [];
    dispatcher.onFormulaBlocked((event) => {
      events.push(event);
    });

    await failReports('formula-a', 3);

    expect(registry.isBlocked('formula-a')).toBe(true);
    expect(await dispatcher.superviseFormulas()).toEqual(['formula-a']);
    expect(await dispatcher.superviseFormulas()).toEqual([]);
    expect(events).toHaveLength(1);
    expect(events[0].formulaId).toBe('formula-a');
    expect(events[0].lastPoisonId).toBe(2);
  });

  it('signals a formula that went past BLOCKED to FINAL between two passes', async () => {
    await dispatcher.createFormulas(options.formulaIds);
    const events: FormulaBlockedEvent[] = [];
    dispatcher.onFormulaBlocked((event) => {
      events.push(event);
    });

    await failReports('formula-a', 4);

    expect(registry.get('formula-a')?.getState()).toBe(DetectorState.FINAL);
    expect(registry.isBlocked('formula-a')).toBe(false);
    expect(await dispatcher.superviseFormulas()).toEqual(['formula-a']);
    expect(await dispatcher.superviseFormulas()).toEqual([]);
    expect(events).toHaveLength(1);
    expect(events[0].lastPoisonId).toBe(3);
  });

  it('does not signal formulas that are not blocked', async () => {
    await dispatcher.createFormulas(options.formulaIds);
    const listener = jest.fn();
    dispatcher.onFormulaBlocked(listener);

    await failReports('formula-a', 2);

    expect(await dispatcher.superviseFormulas()).toEqual([]);
    expect(listener).not.toHaveBeenCalled();
  });

  it('keeps notifying listeners after one of them throws', async () => {
    await dispatcher.createFormula('formula-a');
    const failing = jest.fn().mockRejectedValue(new Error('listener failed'));
    const healthy = jest.fn();
    dispatcher.onFormulaBlocked(failing);
    dispatcher.onFormulaBlocked(healthy);

    await failReports('formula-a', 3);
    await dispatcher.superviseFormulas();

    expect(failing).toHaveBeenCalledTimes(1);
    expect(healthy).toHaveBeenCalledTimes(1);
  });

  it('stops notifying an unsubscribed listener', async () => {
    await dispatcher.createFormula('formula-a');
    const listener = jest.fn();
    const unsubscribe = dispatcher.onFormulaBlocked(listener);
    unsubscribe();

    await failReports('formula-a', 3);
    await dispatcher.superviseFormulas();

    expect(listener).not.toHaveBeenCalled();
  });

  it('lets a listener replace the blocked formula with a fresh detector', async () => {
    await dispatcher.createFormula('formula-a');
    const oldWorker = factory.workers.get('formula-a');
    const oldQueue = factory.queues.get('formula-a');
    dispatcher.onFormulaBlocked((event) => dispatcher.replaceFormula(event.formulaId));

    await failReports('formula-a', 3);
    await dispatcher.superviseFormulas();

    expect(oldWorker?.isRunning()).toBe(false);
    expect(oldQueue?.closed).toBe(true);
    expect(factory.workers.get('formula-a')).not.toBe(oldWorker);
    expect(registry.get('formula-a')?.getState()).toBe(DetectorState.INIT);
    expect(await dispatcher.dispatch('formula-a', {})).toEqual({ jobId: 'job-1', dispatcherReportId: 0 });
  });

  it('drops reports still waiting in the queue when a formula is replaced', async () => {
    await dispatcher.createFormula('formula-a');
    const oldQueue = factory.queues.get('formula-a');
    const handler = jest.fn().mockRejectedValue(new Error('formula crashed'));
    dispatcher.registerHandler(handler);

    await dispatcher.dispatch('formula-a', { value: 1 });
    await dispatcher.dispatch('formula-a', { value: 2 });
    expect(factory.getWaitingCount('formula-a')).toBe(2);

    await dispatcher.replaceFormula('formula-a');

    expect(oldQueue?.obliterated).toBe(true);
    expect(factory.getWaitingCount('formula-a')).toBe(0);

    await dispatcher.dispatch('formula-a', { value: 3 });
    await factory.drain('formula-a');

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ formulaId: 'formula-a', dispatcherReportId: 0, payload: { value: 3 } });
    expect(registry.get('formula-a')?.getState()).toBe(DetectorState.BLOCKED_INTER_1);
    expect(registry.get('formula-a')?.getLastPoisonId()).toBe(0);
  });

  it('signals a replaced formula again when it blocks again', async () => {
    await dispatcher.createFormula('formula-a');
    const listener = jest.fn();
    dispatcher.onFormulaBlocked(listener);

    await failReports('formula-a', 3);
    await dispatcher.superviseFormulas();
    await dispatcher.replaceFormula('formula-a');
    await failReports('formula-a', 3);

    expect(await dispatcher.superviseFormulas()).toEqual(['formula-a']);
    expect(listener).toHaveBeenCalledTimes(2);
  });

  it('drops invalid poison notifications', async () => {
    await dispatcher.createFormulas(options.formulaIds);
    const error = new Error('formula crashed');

    dispatcher.handlePoison('formula-a', undefined, error);
    dispatcher.handlePoison('formula-a', { formulaId: 'formula-a', dispatcherReportId: 'seven' }, error);
    dispatcher.handlePoison('formula-a', { formulaId: 'formula-a', dispatcherReportId: 10001 }, error);
    dispatcher.handlePoison('formula-a', { formulaId: 'formula-b', dispatcherReportId: 3 }, error);

    expect(registry.get('formula-a')?.getState()).toBe(DetectorState.INIT);
    expect(registry.get('formula-b')?.getState()).toBe(DetectorState.INIT);
  });

  it('refuses to replace an unknown formula', async () => {
    await expect(dispatcher.replaceFormula('missing')).rejects.toBeInstanceOf(UnknownFormulaError);
  });

  it('destroys a formula together with its detector', async () => {
    await dispatcher.createFormula('formula-a');

    expect(await dispatcher.destroyFormula('formula-a')).toBe(true);
    expect(await dispatcher.destroyFormula('formula-a')).toBe(false);
    expect(registry.has('formula-a')).toBe(false);
    expect(factory.queues.get('formula-a')?.closed).toBe(true);
    expect(factory.queues.get('formula-a')?.obliterated).toBe(true);
  });

  it('reports runtime status per formula', async () => {
    await dispatcher.createFormulas(options.formulaIds);
    await failReports('formula-a', 1);

    expect(dispatcher.getFormulaStatus()).toEqual([
      {
        formulaId: 'formula-a',
        state: DetectorState.BLOCKED_INTER_1,
        blocked: false,
        lastPoisonId: 0,
        queueName: 'test-queue-formula-a',
        running: true,
      },
      {
        formulaId: 'formula-b',
        state: DetectorState.INIT,
        blocked: false,
        lastPoisonId: null,
        queueName: 'test-queue-formula-b',
        running: true,
      },
    ]);
  });

  describe('lifecycle', () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('supervises on an interval and cleans up on destroy', async () => {
      const listener = jest.fn();
      dispatcher.onFormulaBlocked(listener);
      await dispatcher.onModuleInit();

      await failReports('formula-b', 3);
      expect(listener).not.toHaveBeenCalled();

      await jest.advanceTimersByTimeAsync(options.supervisionInterval);
      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0].formulaId).toBe('formula-b');

      await dispatcher.onModuleDestroy();

      expect(jest.getTimerCount()).toBe(0);
      expect(dispatcher.getFormulaIds()).toEqual([]);
      expect(factory.workers.get('formula-a')?.isRunning()).toBe(false);
    });
  });
});
