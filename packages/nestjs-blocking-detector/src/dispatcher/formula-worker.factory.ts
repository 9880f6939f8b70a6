import { Injectable, Logger } from '@nestjs/common';
import { Job, Queue, Worker } from 'bullmq';
import { Redis } from 'ioredis';
import { DispatchedReport } from '../common/interfaces/dispatched-report.interface';

/**
 * Formula 执行队列句柄
 */
export interface FormulaQueue {
  add(report: DispatchedReport): Promise<string | undefined>;
  /**
   * 删除队列中的所有任务，包括等待中的报告
   */
  obliterate(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Formula Worker 句柄
 */
export interface FormulaWorker {
  isRunning(): boolean;
  close(): Promise<void>;
}

export interface FormulaWorkerHooks {
  /**
   * 处理一条报告，抛出的异常会使任务失败并产生 poison 通知
   */
  process(report: DispatchedReport): Promise<unknown>;

  /**
   * 任务失败。data 为失败任务的原始 job.data
   */
  onFailed(data: unknown, error: Error): void;

  onError(error: Error): void;
}

export interface FormulaWorkerFactory {
  getQueueName(formulaId: string): string;
  createQueue(formulaId: string): FormulaQueue;
  createWorker(formulaId: string, hooks: FormulaWorkerHooks): FormulaWorker;
}

/**
 * 基于 BullMQ 的 Formula 工厂
 * 每个 formula 拥有独立的执行队列和一个并发度为 1 的 Worker
 */
@Injectable()
export class BullFormulaWorkerFactory implements FormulaWorkerFactory {
  private readonly logger = new Logger(BullFormulaWorkerFactory.name);

  constructor(
    private readonly connection: Redis,
    private readonly queuePrefix: string,
  ) {}

  getQueueName(formulaId: string): string {
    return `${this.queuePrefix}-${formulaId}`;
  }

  createQueue(formulaId: string): FormulaQueue {
    const queue = new Queue<DispatchedReport>(this.getQueueName(formulaId), { connection: this.connection });

    return {
      add: async (report) => {
        const job = await queue.add('report', report, {
          removeOnComplete: 100,
          removeOnFail: 50,
          // 失败即 poison，不重试
          attempts: 1,
        });
        return job.id;
      },
      obliterate: () => queue.obliterate({ force: true }),
      close: () => queue.close(),
    };
  }

  createWorker(formulaId: string, hooks: FormulaWorkerHooks): FormulaWorker {
    const queueName = this.getQueueName(formulaId);
    const worker = new Worker<DispatchedReport>(
      queueName,
      async (job: Job<DispatchedReport>) => {
        return await hooks.process(job.data);
      },
      {
        connection: this.connection,
        concurrency: 1,
      },
    );

    worker.on('failed', (job, error) => {
      hooks.onFailed(job ? job.data : undefined, error);
    });

    worker.on('error', (error) => {
      hooks.onError(error);
    });

    this.logger.log(`Worker created for formula ${formulaId}, listening on queue: ${queueName}`);

    return {
      isRunning: () => worker.isRunning(),
      close: () => worker.close(),
    };
  }
}
