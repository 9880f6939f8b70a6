import { MAX_DISPATCHER_REPORT_ID } from './detector-state.enum';

/**
 * 探测消息 ID 分配器
 * 按 0, 1, ..., maxId, 0, 1, ... 的顺序循环分配
 */
export class MessageIdAllocator {
  private nextId = 0;

  constructor(private readonly maxId: number = MAX_DISPATCHER_REPORT_ID) {}

  /**
   * 返回当前 ID 并前移计数器
   */
  next(): number {
    const id = this.nextId;
    this.nextId = id === this.maxId ? 0 : id + 1;
    return id;
  }

  /**
   * 归还最近一次分配的 ID，之后又分配过其他 ID 时不做任何事
   * @returns 是否已归还
   */
  release(id: number): boolean {
    const previous = this.nextId === 0 ? this.maxId : this.nextId - 1;
    if (previous !== id) {
      return false;
    }
    this.nextId = id;
    return true;
  }

  /**
   * 下一次 next() 将返回的 ID
   */
  peek(): number {
    return this.nextId;
  }
}
