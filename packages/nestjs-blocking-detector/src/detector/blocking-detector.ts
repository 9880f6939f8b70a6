import { DetectorState, MAX_DISPATCHER_REPORT_ID } from './detector-state.enum';
import { MessageIdAllocator } from './message-id-allocator';
import { InvalidPoisonIdError } from '../common/errors/detector.errors';

/**
 * 阻塞检测器
 * 每个 formula 对应一个实例。连续三条 dispatcher report 都在 formula 内失败时，
 * 该 formula 被视为阻塞。
 */
export class BlockingDetector {
  private state = DetectorState.INIT;
  // 收到 maxId 之后记为 -1，使下一条 0 被视为连续
  private lastPoisonId: number | null = null;
  private readonly allocator: MessageIdAllocator;

  constructor(readonly maxId: number = MAX_DISPATCHER_REPORT_ID) {
    this.allocator = new MessageIdAllocator(maxId);
  }

  /**
   * 处理一条 poison 通知，返回处理后的状态
   * @param poisonId 失败报告携带的 dispatcher report id
   */
  notifyPoisonReceived(poisonId: number): DetectorState {
    if (!Number.isInteger(poisonId) || poisonId < 0 || poisonId > this.maxId) {
      throw new InvalidPoisonIdError(poisonId, this.maxId);
    }

    if (this.state === DetectorState.INIT) {
      this.state = DetectorState.BLOCKED_INTER_1;
    } else if (this.lastPoisonId !== null && poisonId === this.lastPoisonId + 1) {
      this.state = this.advance(this.state);
    } else if (this.state !== DetectorState.BLOCKED && this.state !== DetectorState.FINAL) {
      this.state = DetectorState.BLOCKED_INTER_1;
    }

    this.lastPoisonId = poisonId === this.maxId ? -1 : poisonId;
    return this.state;
  }

  isBlocked(): boolean {
    return this.state === DetectorState.BLOCKED;
  }

  /**
   * 为下一条发往 formula 的报告分配 ID
   */
  allocateProbeId(): number {
    return this.allocator.next();
  }

  /**
   * 归还一个未发出的 ID
   */
  releaseProbeId(id: number): boolean {
    return this.allocator.release(id);
  }

  getState(): DetectorState {
    return this.state;
  }

  getLastPoisonId(): number | null {
    return this.lastPoisonId;
  }

  private advance(state: DetectorState): DetectorState {
    switch (state) {
      case DetectorState.BLOCKED_INTER_1:
        return DetectorState.BLOCKED_INTER_2;
      case DetectorState.BLOCKED_INTER_2:
        return DetectorState.BLOCKED;
      case DetectorState.BLOCKED:
      case DetectorState.FINAL:
        return DetectorState.FINAL;
      case DetectorState.INIT:
        return DetectorState.BLOCKED_INTER_1;
    }
  }
}
