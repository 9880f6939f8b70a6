import { Injectable, Logger, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import { DetectorRegistry } from './detector.registry';
import { FormulaQueue, FormulaWorker, FormulaWorkerFactory } from './formula-worker.factory';
import { DispatchedReport, DispatchReceipt } from '../common/interfaces/dispatched-report.interface';
import { FormulaRuntimeStatus } from '../common/interfaces/formula-status.interface';
import { ResolvedDetectorOptions } from '../common/interfaces/detector-module-options.interface';
import { parsePoisonNotification } from '../common/dtos/poison-notification.dto';
import { UnknownFormulaError } from '../common/errors/detector.errors';
import { DetectorState } from '../detector/detector-state.enum';

export type ReportHandler = (report: DispatchedReport) => Promise<unknown>;

export interface FormulaBlockedEvent {
  formulaId: string;
  lastPoisonId: number | null;
  detectedAt: Date;
}

export type FormulaBlockedListener = (event: FormulaBlockedEvent) => void | Promise<void>;

interface FormulaHandle {
  queue: FormulaQueue;
  worker: FormulaWorker;
}

/**
 * Dispatcher 服务
 * 负责创建和管理 formula，把报告分发给 formula，并根据 poison 通知判断 formula 是否阻塞。
 * 阻塞的 formula 只会被通知给监听者，如何处理（替换、告警）由应用决定。
 */
@Injectable()
export class DispatcherService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DispatcherService.name);
  private readonly formulas = new Map<string, FormulaHandle>();
  private readonly blockedListeners = new Set<FormulaBlockedListener>();
  private readonly signalledFormulas = new Set<string>();
  // 通知时刚进入 BLOCKED 的 formula，即使轮询前已进入 FINAL 也要通知
  private readonly pendingBlocked = new Set<string>();
  private reportHandler: ReportHandler | null = null;
  private supervisionTimer: NodeJS.Timeout | null = null;
  private supervising = false;

  constructor(
    private readonly options: ResolvedDetectorOptions,
    private readonly registry: DetectorRegistry,
    private readonly workerFactory: FormulaWorkerFactory,
  ) {
    this.logger.log(`DispatcherService initialized, queue prefix: ${this.options.formulaQueuePrefix}`);
  }

  async onModuleInit() {
    await this.createFormulas(this.options.formulaIds);
    this.startSupervision();
  }

  /**
   * 注册报告处理器，所有 formula 共用
   */
  registerHandler(handler: ReportHandler): void {
    this.reportHandler = handler;
    this.logger.log('Report handler registered');
  }

  /**
   * 创建 formula 及其阻塞检测器
   * @param formulaId Formula ID
   * @returns Formula ID
   */
  async createFormula(formulaId: string): Promise<string> {
    if (this.formulas.has(formulaId)) {
      this.logger.warn(`Formula ${formulaId} already exists.`);
      return formulaId;
    }

    try {
      this.registry.register(formulaId);

      const queue = this.workerFactory.createQueue(formulaId);
      const worker = this.workerFactory.createWorker(formulaId, {
        process: (report) => this.processReport(formulaId, report),
        onFailed: (data, error) => this.handlePoison(formulaId, data, error),
        onError: (error) => {
          this.logger.error(`Formula ${formulaId} worker encountered an error:`, error);
        },
      });

      this.formulas.set(formulaId, { queue, worker });
      this.logger.log(`Formula created: ${formulaId}, queue: ${this.workerFactory.getQueueName(formulaId)}`);

      return formulaId;
    } catch (error) {
      this.registry.remove(formulaId);
      this.logger.error(`Failed to create formula ${formulaId}:`, error);
      throw error;
    }
  }

  async createFormulas(formulaIds: string[]): Promise<string[]> {
    for (const formulaId of formulaIds) {
      await this.createFormula(formulaId);
    }

    if (formulaIds.length > 0) {
      this.logger.log(`${formulaIds.length} formulas created: ${formulaIds.join(', ')}`);
    }
    return formulaIds;
  }

  /**
   * 分发一条报告，报告携带检测器分配的 dispatcher report id
   */
  async dispatch(formulaId: string, payload: unknown): Promise<DispatchReceipt> {
    const handle = this.formulas.get(formulaId);
    if (!handle) {
      throw new UnknownFormulaError(formulaId);
    }

    const dispatcherReportId = this.registry.allocateProbeId(formulaId);
    let jobId: string | undefined;
    try {
      jobId = await handle.queue.add({ formulaId, dispatcherReportId, payload });
    } catch (error) {
      // 未送达的 ID 归还给分配器，否则下一条 poison 会被误判为不连续
      if (!this.registry.releaseProbeId(formulaId, dispatcherReportId)) {
        this.logger.warn(`Report id ${dispatcherReportId} of ${formulaId} lost after a failed enqueue`);
      }
      throw error;
    }

    this.logger.debug(`Report ${dispatcherReportId} dispatched to ${formulaId} -> Job ${jobId}`);
    return { jobId, dispatcherReportId };
  }

  async dispatchToAll(payload: unknown): Promise<DispatchReceipt[]> {
    const receipts: DispatchReceipt[] = [];
    for (const formulaId of this.formulas.keys()) {
      receipts.push(await this.dispatch(formulaId, payload));
    }
    return receipts;
  }

  /**
   * 任务失败回调：把失败报告的 dispatcher report id 作为 poison 通知转发给检测器
   */
  handlePoison(formulaId: string, data: unknown, error: Error): void {
    const parsed = parsePoisonNotification(data);
    if (!parsed.ok) {
      this.logger.warn(`Dropping invalid poison notification from ${formulaId}: ${parsed.errors.join('; ')}`);
      return;
    }

    const { notification } = parsed;
    if (notification.formulaId !== formulaId) {
      this.logger.warn(
        `Dropping poison notification addressed to ${notification.formulaId} received on ${formulaId}`,
      );
      return;
    }

    this.logger.warn(
      `Formula ${formulaId} failed on report ${notification.dispatcherReportId}: ${error.message}`,
    );
    const state = this.registry.notifyPoisonReceived(formulaId, notification.dispatcherReportId);
    if (state === DetectorState.BLOCKED) {
      this.pendingBlocked.add(formulaId);
    }
  }

  /**
   * 订阅 formula 阻塞事件
   * @returns 取消订阅函数
   */
  onFormulaBlocked(listener: FormulaBlockedListener): () => void {
    this.blockedListeners.add(listener);
    return () => {
      this.blockedListeners.delete(listener);
    };
  }

  /**
   * 通知进入过 BLOCKED 的 formula，每个检测器只通知一次
   * @returns 本轮被通知的 formula ID
   */
  async superviseFormulas(): Promise<string[]> {
    if (this.supervising) {
      return [];
    }

    this.supervising = true;
    const signalled: string[] = [];

    try {
      const candidates = new Set([...this.pendingBlocked, ...this.registry.getBlockedFormulaIds()]);
      this.pendingBlocked.clear();

      for (const formulaId of candidates) {
        if (!this.registry.has(formulaId) || this.signalledFormulas.has(formulaId)) {
          continue;
        }

        this.signalledFormulas.add(formulaId);
        signalled.push(formulaId);

        const detector = this.registry.get(formulaId);
        const event: FormulaBlockedEvent = {
          formulaId,
          lastPoisonId: detector ? detector.getLastPoisonId() : null,
          detectedAt: new Date(),
        };

        this.logger.warn(`Formula ${formulaId} is blocked`);
        await this.notifyBlockedListeners(event);
      }
    } finally {
      this.supervising = false;
    }

    return signalled;
  }

  /**
   * 关闭 formula 的 Worker，清空并关闭队列，丢弃其检测器
   * @returns formula 是否存在
   */
  async destroyFormula(formulaId: string): Promise<boolean> {
    const handle = this.formulas.get(formulaId);
    this.formulas.delete(formulaId);
    this.registry.remove(formulaId);
    this.signalledFormulas.delete(formulaId);
    this.pendingBlocked.delete(formulaId);

    if (!handle) {
      return false;
    }

    try {
      try {
        await handle.worker.close();
      } finally {
        // 清空仍在等待的报告，新实例不会处理旧实例的 ID
        try {
          await handle.queue.obliterate();
        } finally {
          await handle.queue.close();
        }
      }
    } catch (error) {
      this.logger.error(`Failed to close formula ${formulaId}:`, error);
      throw error;
    }

    this.logger.log(`Formula destroyed: ${formulaId}`);
    return true;
  }

  /**
   * 用新的 Worker 和全新的检测器替换 formula
   */
  async replaceFormula(formulaId: string): Promise<void> {
    if (!this.formulas.has(formulaId)) {
      throw new UnknownFormulaError(formulaId);
    }

    await this.destroyFormula(formulaId);
    await this.createFormula(formulaId);
    this.logger.log(`Formula replaced: ${formulaId}`);
  }

  async destroyAllFormulas(): Promise<void> {
    for (const formulaId of Array.from(this.formulas.keys())) {
      await this.destroyFormula(formulaId);
    }
  }

  getFormulaIds(): string[] {
    return Array.from(this.formulas.keys());
  }

  getFormulaStatus(): FormulaRuntimeStatus[] {
    return this.registry.getStatus().map((status) => {
      const handle = this.formulas.get(status.formulaId);
      return {
        ...status,
        queueName: this.workerFactory.getQueueName(status.formulaId),
        running: handle ? handle.worker.isRunning() : false,
      };
    });
  }

  async onModuleDestroy() {
    this.stopSupervision();
    await this.destroyAllFormulas();
    this.logger.log('DispatcherService destroyed');
  }

  private async processReport(formulaId: string, report: DispatchedReport): Promise<unknown> {
    if (!this.reportHandler) {
      throw new Error(`No report handler registered, formula ${formulaId} cannot process report`);
    }
    return await this.reportHandler(report);
  }

  private async notifyBlockedListeners(event: FormulaBlockedEvent): Promise<void> {
    for (const listener of Array.from(this.blockedListeners)) {
      try {
        await listener(event);
      } catch (error) {
        this.logger.error(`Blocked listener failed for formula ${event.formulaId}:`, error);
      }
    }
  }

  private startSupervision() {
    this.supervisionTimer = setInterval(async () => {
      try {
        await this.superviseFormulas();
      } catch (error) {
        this.logger.error('Supervision pass failed:', error);
      }
    }, this.options.supervisionInterval);
  }

  private stopSupervision() {
    if (this.supervisionTimer) {
      clearInterval(this.supervisionTimer);
      this.supervisionTimer = null;
    }
  }
}
