/**
 * 阻塞检测器状态
 *
 * 只有连续的 poison 通知才会推进状态：
 * INIT -> BLOCKED_INTER_1 -> BLOCKED_INTER_2 -> BLOCKED -> FINAL
 */
export enum DetectorState {
  INIT = 'INIT',
  BLOCKED_INTER_1 = 'BLOCKED_INTER_1',
  BLOCKED_INTER_2 = 'BLOCKED_INTER_2',
  BLOCKED = 'BLOCKED',
  FINAL = 'FINAL',
}

/**
 * dispatcher report id 的上界（包含）
 */
export const MAX_DISPATCHER_REPORT_ID = 10000;
