import { Injectable, Logger } from '@nestjs/common';
import { BlockingDetector } from '../detector/blocking-detector';
import { DetectorState } from '../detector/detector-state.enum';
import { UnknownFormulaError } from '../common/errors/detector.errors';
import { FormulaStatus } from '../common/interfaces/formula-status.interface';

/**
 * 检测器注册表
 * formula ID -> 阻塞检测器。formula 注册时创建，移除或替换时丢弃。
 */
@Injectable()
export class DetectorRegistry {
  private readonly logger = new Logger(DetectorRegistry.name);
  private readonly detectors = new Map<string, BlockingDetector>();

  /**
   * 为 formula 创建检测器
   * @param formulaId Formula ID
   * @returns 新建的检测器，已存在时返回现有实例
   */
  register(formulaId: string): BlockingDetector {
    const existing = this.detectors.get(formulaId);
    if (existing) {
      this.logger.warn(`Detector for formula ${formulaId} already registered`);
      return existing;
    }

    const detector = new BlockingDetector();
    this.detectors.set(formulaId, detector);
    this.logger.log(`Detector registered for formula ${formulaId}`);
    return detector;
  }

  /**
   * 丢弃 formula 的检测器
   * @returns 是否存在并被移除
   */
  remove(formulaId: string): boolean {
    const removed = this.detectors.delete(formulaId);
    if (removed) {
      this.logger.log(`Detector removed for formula ${formulaId}`);
    }
    return removed;
  }

  /**
   * 用全新的检测器替换旧实例，状态不会跨 formula 实例复用
   */
  replace(formulaId: string): BlockingDetector {
    this.detectors.delete(formulaId);
    const detector = new BlockingDetector();
    this.detectors.set(formulaId, detector);
    this.logger.log(`Detector replaced for formula ${formulaId}`);
    return detector;
  }

  get(formulaId: string): BlockingDetector | null {
    return this.detectors.get(formulaId) || null;
  }

  has(formulaId: string): boolean {
    return this.detectors.has(formulaId);
  }

  getFormulaIds(): string[] {
    return Array.from(this.detectors.keys());
  }

  /**
   * 转发 poison 通知
   * @returns 检测器的新状态，formula 未注册时返回 null
   */
  notifyPoisonReceived(formulaId: string, poisonId: number): DetectorState | null {
    const detector = this.detectors.get(formulaId);
    if (!detector) {
      this.logger.warn(`Poison ${poisonId} received for unknown formula ${formulaId}`);
      return null;
    }

    const previous = detector.getState();
    const next = detector.notifyPoisonReceived(poisonId);
    this.logger.debug(`Formula ${formulaId} poison ${poisonId}: ${previous} -> ${next}`);
    return next;
  }

  isBlocked(formulaId: string): boolean {
    const detector = this.detectors.get(formulaId);
    return detector ? detector.isBlocked() : false;
  }

  /**
   * 为发往 formula 的报告分配 dispatcher report id
   */
  allocateProbeId(formulaId: string): number {
    const detector = this.detectors.get(formulaId);
    if (!detector) {
      throw new UnknownFormulaError(formulaId);
    }
    return detector.allocateProbeId();
  }

  /**
   * 归还一个未能入队的 dispatcher report id
   */
  releaseProbeId(formulaId: string, reportId: number): boolean {
    const detector = this.detectors.get(formulaId);
    return detector ? detector.releaseProbeId(reportId) : false;
  }

  getBlockedFormulaIds(): string[] {
    const blocked: string[] = [];
    for (const [formulaId, detector] of this.detectors) {
      if (detector.isBlocked()) {
        blocked.push(formulaId);
      }
    }
    return blocked;
  }

  getStatus(): FormulaStatus[] {
    return Array.from(this.detectors.entries()).map(([formulaId, detector]) => ({
      formulaId,
      state: detector.getState(),
      blocked: detector.isBlocked(),
      lastPoisonId: detector.getLastPoisonId(),
    }));
  }
}
